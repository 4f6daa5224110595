/**
 * Central configuration loader for the defence consensus tools
 * Reads everything from environment variables (the CLIs load .env first)
 */

import { logger, isLogLevel, type LogLevel } from '../utils/logger.js';

/**
 * Accepted range for the BLAST-only length ratios
 */
export interface BlastFilterBounds {
  minRatio: number;
  maxRatio: number;
}

/**
 * Complete configuration
 */
export interface DefenceConfig {
  /**
   * Default mapping reference table, used when --master-key is not given
   */
  masterKeyPath?: string;

  blastFilter: BlastFilterBounds;

  /**
   * Curation template settings
   */
  curation: {
    exampleLimit: number;
    topPatterns: number;
  };

  logLevel: LogLevel;
}

export const DEFAULT_BLAST_FILTER: BlastFilterBounds = {
  minRatio: 0.8,
  maxRatio: 1.25,
};

export const DEFAULT_DEFENCE_CONFIG: DefenceConfig = {
  blastFilter: DEFAULT_BLAST_FILTER,
  curation: {
    exampleLimit: 5,
    topPatterns: 10,
  },
  logLevel: 'info',
};

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}

/**
 * Load configuration from environment variables
 */
export function loadDefenceConfig(): DefenceConfig {
  logger.debug('Loading defence configuration from environment variables');

  const rawLevel = (process.env.DEFENCE_LOG_LEVEL || 'info').toLowerCase();

  const config: DefenceConfig = {
    masterKeyPath: process.env.DEFENCE_MASTER_KEY || undefined,
    blastFilter: {
      minRatio: readNumber('BLAST_MIN_RATIO', DEFAULT_BLAST_FILTER.minRatio),
      maxRatio: readNumber('BLAST_MAX_RATIO', DEFAULT_BLAST_FILTER.maxRatio),
    },
    curation: {
      exampleLimit: readNumber(
        'CURATION_EXAMPLE_LIMIT',
        DEFAULT_DEFENCE_CONFIG.curation.exampleLimit
      ),
      topPatterns: readNumber('CURATION_TOP_PATTERNS', DEFAULT_DEFENCE_CONFIG.curation.topPatterns),
    },
    logLevel: isLogLevel(rawLevel) ? rawLevel : 'info',
  };

  logger.debug('Configuration loaded', {
    masterKeyPath: config.masterKeyPath ?? null,
    blastFilter: config.blastFilter,
  });

  return config;
}

/**
 * Validate the loaded configuration
 */
export function validateDefenceConfig(config: DefenceConfig): void {
  const errors: string[] = [];
  const { minRatio, maxRatio } = config.blastFilter;

  if (!Number.isFinite(minRatio) || minRatio <= 0) {
    errors.push('BLAST minimum ratio must be a positive number');
  }
  if (!Number.isFinite(maxRatio) || maxRatio <= 0) {
    errors.push('BLAST maximum ratio must be a positive number');
  }
  if (minRatio > maxRatio) {
    errors.push('BLAST minimum ratio must not exceed the maximum ratio');
  }

  if (!Number.isInteger(config.curation.exampleLimit) || config.curation.exampleLimit < 1) {
    errors.push('Curation example limit must be a positive integer');
  }
  if (!Number.isInteger(config.curation.topPatterns) || config.curation.topPatterns < 1) {
    errors.push('Curation top pattern count must be a positive integer');
  }

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed: ${errors.join(', ')}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.debug('Configuration validation passed');
}

/**
 * Load and validate configuration, applying the log level
 */
export function loadAndValidateConfig(): DefenceConfig {
  const config = loadDefenceConfig();
  validateDefenceConfig(config);
  logger.setLevel(config.logLevel);
  return config;
}

export { genomeIdFromPadlocFile, defaultProfilePath, PROFILE_SUFFIX } from './paths.js';
