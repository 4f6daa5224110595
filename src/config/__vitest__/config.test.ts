import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_DEFENCE_CONFIG,
  loadAndValidateConfig,
  loadDefenceConfig,
  validateDefenceConfig,
} from '../index.js';
import { logger } from '../../utils/logger.js';

const VARIABLES = [
  'DEFENCE_MASTER_KEY',
  'DEFENCE_LOG_LEVEL',
  'BLAST_MIN_RATIO',
  'BLAST_MAX_RATIO',
  'CURATION_EXAMPLE_LIMIT',
  'CURATION_TOP_PATTERNS',
];

describe('defence configuration', () => {
  let originalProcessEnv: NodeJS.ProcessEnv;
  let originalLevel: ReturnType<typeof logger.getLevel>;

  beforeEach(() => {
    originalProcessEnv = { ...process.env };
    originalLevel = logger.getLevel();
    for (const name of VARIABLES) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    process.env = originalProcessEnv;
    logger.setLevel(originalLevel);
  });

  it('uses defaults when nothing is set', () => {
    expect(loadDefenceConfig()).toEqual({ ...DEFAULT_DEFENCE_CONFIG, masterKeyPath: undefined });
  });

  it('reads overrides from the environment', () => {
    process.env.DEFENCE_MASTER_KEY = '/refs/MASTER_ToolKey.tsv';
    process.env.BLAST_MIN_RATIO = '0.7';
    process.env.BLAST_MAX_RATIO = '1.4';
    process.env.CURATION_EXAMPLE_LIMIT = '3';
    process.env.CURATION_TOP_PATTERNS = '20';
    process.env.DEFENCE_LOG_LEVEL = 'DEBUG';

    expect(loadDefenceConfig()).toEqual({
      masterKeyPath: '/refs/MASTER_ToolKey.tsv',
      blastFilter: { minRatio: 0.7, maxRatio: 1.4 },
      curation: { exampleLimit: 3, topPatterns: 20 },
      logLevel: 'debug',
    });
  });

  it('falls back to info for unknown log levels', () => {
    process.env.DEFENCE_LOG_LEVEL = 'toString';
    expect(loadDefenceConfig().logLevel).toBe('info');
  });

  it('rejects inverted ratio bounds', () => {
    process.env.BLAST_MIN_RATIO = '2';
    process.env.BLAST_MAX_RATIO = '1';

    expect(() => validateDefenceConfig(loadDefenceConfig())).toThrow(
      'Configuration validation failed: BLAST minimum ratio must not exceed the maximum ratio'
    );
  });

  it('rejects non-numeric values', () => {
    process.env.BLAST_MIN_RATIO = 'abc';
    process.env.CURATION_EXAMPLE_LIMIT = '2.5';

    expect(() => validateDefenceConfig(loadDefenceConfig())).toThrow(
      'Configuration validation failed: BLAST minimum ratio must be a positive number, ' +
        'Curation example limit must be a positive integer'
    );
  });

  it('applies the configured log level', () => {
    process.env.DEFENCE_LOG_LEVEL = 'warn';

    loadAndValidateConfig();

    expect(logger.getLevel()).toBe('warn');
  });
});
