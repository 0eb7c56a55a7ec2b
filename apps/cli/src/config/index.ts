/**
 * CLI Configuration
 *
 * Loads .env before anything reads the environment. Imported first by the
 * entry point so the shared logger sees the same LOG_LEVEL.
 */

import { config as loadDotenv } from 'dotenv';
import { loadConfig, type TranscoderConfig } from '@transcoder/core';

loadDotenv();

// Spinner output and info logs do not mix well on one terminal
process.env['LOG_LEVEL'] ??= 'warn';

let cached: TranscoderConfig | null = null;

/**
 * Validated configuration; throws ValidationError on bad environment values
 */
export function getConfig(): TranscoderConfig {
  cached ??= loadConfig(process.env);
  return cached;
}
