import { describe, expect, it } from 'vitest';
import { createChildLogger, logger } from '@/utils/logger';

describe('logger', () => {
  it('tags child loggers with their module', () => {
    expect(createChildLogger('screen_runner').bindings()).toEqual({ module: 'screen_runner' });
  });

  it('writes nothing under test unless LOG_LEVEL asks for it', () => {
    expect(logger.level).toBe(process.env.LOG_LEVEL || 'silent');
  });
});
