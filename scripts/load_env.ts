/**
 * Loads .env.local first, then .env. Imported before anything that reads
 * process.env at module load (the logger does).
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
