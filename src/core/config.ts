/**
 * Application configuration loaded from JSON files under config/
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { Instrument } from '@/providers/types';
import type { RawInstrumentEntry, RawScreeningFile, RawUniverseFile } from '@/types/config';
import { validateScreeningFile, validateUniverseFile } from '@/validation/ajv_instance';
import { DEFAULT_CRITERIA, DEFAULT_RUN_OPTIONS, type MomentumCriteria, type ScreenRunOptions } from '@/screening/types';
import { normalizeSymbol, toDisplayCode } from './universe';

export interface UniverseConfig {
  name: string;
  description: string;
  version: string;
  exchangeSuffix: string;
  currency: string;
  instruments: ReadonlyArray<Instrument>;
}

export interface ScreeningSettings {
  criteria: MomentumCriteria;
  run: ScreenRunOptions;
}

export interface AppConfig {
  universe: UniverseConfig;
  screening: ScreeningSettings;
  universePath: string;
  projectRoot: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public filePath: string,
    public details: string[] = []
  ) {
    super(details.length > 0 ? `${message} (${filePath}): ${details.join('; ')}` : `${message} (${filePath})`);
    this.name = 'ConfigError';
  }
}

const DEFAULT_EXCHANGE_SUFFIX = '.JK';
const DEFAULT_CURRENCY = 'IDR';

function getProjectRoot(): string {
  return process.cwd();
}

function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError('Config file not readable', filePath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigError('Config file is not valid JSON', filePath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
}

function resolveUniverseByDisplayName(projectRoot: string, universeName: string): string | null {
  const normalized = universeName.trim().toLowerCase();
  if (!normalized) return null;

  const universeDir = join(projectRoot, 'config', 'universes');
  if (!existsSync(universeDir)) return null;

  const files = readdirSync(universeDir).filter((file) => file.endsWith('.json')).sort();
  for (const file of files) {
    const filePath = join(universeDir, file);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch {
      // Unreadable packs cannot match a display name; keep looking
      continue;
    }
    if (parsed && typeof parsed === 'object' && 'name' in parsed && typeof parsed.name === 'string') {
      if (parsed.name.trim().toLowerCase() === normalized) {
        return filePath;
      }
    }
  }

  return null;
}

/**
 * UNIVERSE_CONFIG / UNIVERSE_FILE / UNIVERSE may name a pack ("idx-liquid"),
 * a file under config/, an absolute path or a pack's display name.
 * Without an override: config/universe.json, then config/universes/default.json.
 */
export function resolveUniversePath(projectRoot: string, override?: string): string {
  const configDir = join(projectRoot, 'config');
  const envPath =
    override || process.env.UNIVERSE_CONFIG || process.env.UNIVERSE_FILE || process.env.UNIVERSE;

  if (envPath) {
    const asPack =
      envPath.endsWith('.json') || envPath.includes('/')
        ? envPath
        : join('universes', `${envPath}.json`);
    const packPath = isAbsolute(asPack)
      ? asPack
      : join(projectRoot, asPack.startsWith('config/') ? asPack : join('config', asPack));
    if (existsSync(packPath)) {
      return packPath;
    }

    const displayNamePath = resolveUniverseByDisplayName(projectRoot, envPath);
    if (displayNamePath) {
      return displayNamePath;
    }

    if (isAbsolute(envPath)) {
      return envPath;
    }
    if (envPath.startsWith('config/')) {
      return join(projectRoot, envPath);
    }
    return join(configDir, envPath);
  }

  const defaultPack = join(configDir, 'universe.json');
  if (existsSync(defaultPack)) return defaultPack;

  return join(configDir, 'universes', 'default.json');
}

export function normalizeUniverse(raw: RawUniverseFile): UniverseConfig {
  const exchangeSuffix = raw.exchange_suffix ?? DEFAULT_EXCHANGE_SUFFIX;
  const entries: RawInstrumentEntry[] = [
    ...(raw.instruments ?? []),
    ...(raw.symbols ?? []).map((symbol) => ({ symbol })),
  ];

  const instruments: Instrument[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const symbol = normalizeSymbol(entry.symbol, exchangeSuffix);
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    const name = entry.name?.trim() || toDisplayCode(symbol);
    const sector = entry.sector?.trim();
    instruments.push(sector ? { symbol, name, sector } : { symbol, name });
  }

  return {
    name: raw.name,
    description: raw.description ?? '',
    version: raw.version ?? '1',
    exchangeSuffix,
    currency: raw.currency ?? DEFAULT_CURRENCY,
    instruments,
  };
}

export function loadUniverseFile(filePath: string): UniverseConfig {
  const result = validateUniverseFile(readJson(filePath));
  if (!result.valid) {
    throw new ConfigError('Invalid universe file', filePath, result.errors);
  }
  return normalizeUniverse(result.data);
}

export function normalizeScreening(raw: RawScreeningFile): ScreeningSettings {
  const criteria = raw.criteria ?? {};
  const fetchCfg = raw.fetch ?? {};
  return {
    criteria: {
      minDailyGainPct: criteria.min_daily_gain_pct ?? DEFAULT_CRITERIA.minDailyGainPct,
      minTradedValue: criteria.min_traded_value ?? DEFAULT_CRITERIA.minTradedValue,
      consecutiveDays: criteria.consecutive_days ?? DEFAULT_CRITERIA.consecutiveDays,
    },
    run: {
      lookbackDays: fetchCfg.lookback_days ?? DEFAULT_RUN_OPTIONS.lookbackDays,
      indicatorLookbackDays: fetchCfg.indicator_lookback_days ?? DEFAULT_RUN_OPTIONS.indicatorLookbackDays,
      includeIndicators: raw.include_indicators ?? DEFAULT_RUN_OPTIONS.includeIndicators,
      maxConcurrency: fetchCfg.max_concurrency ?? DEFAULT_RUN_OPTIONS.maxConcurrency,
      maxRetries: fetchCfg.max_retries ?? DEFAULT_RUN_OPTIONS.maxRetries,
      retryBackoffMs: fetchCfg.retry_backoff_ms ?? DEFAULT_RUN_OPTIONS.retryBackoffMs,
      throttleMs: fetchCfg.throttle_ms ?? DEFAULT_RUN_OPTIONS.throttleMs,
      batchSize: fetchCfg.batch_size ?? DEFAULT_RUN_OPTIONS.batchSize,
      batchPauseMs: fetchCfg.batch_pause_ms ?? DEFAULT_RUN_OPTIONS.batchPauseMs,
      maxSymbols: raw.max_symbols ?? DEFAULT_RUN_OPTIONS.maxSymbols,
    },
  };
}

/** config/screening.json is optional; defaults apply when it is absent. */
export function loadScreeningSettings(projectRoot: string): ScreeningSettings {
  const filePath = join(projectRoot, 'config', 'screening.json');
  if (!existsSync(filePath)) {
    return normalizeScreening({});
  }
  const result = validateScreeningFile(readJson(filePath));
  if (!result.valid) {
    throw new ConfigError('Invalid screening config', filePath, result.errors);
  }
  return normalizeScreening(result.data);
}

export function loadConfig(universeOverride?: string): AppConfig {
  const projectRoot = getProjectRoot();
  const universePath = resolveUniversePath(projectRoot, universeOverride);

  return {
    universe: loadUniverseFile(universePath),
    screening: loadScreeningSettings(projectRoot),
    universePath,
    projectRoot,
  };
}
