/**
 * Transcoder Configuration
 * 
 * Environment-driven settings, validated with zod. Front ends load .env
 * themselves before calling loadConfig.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { DEFAULT_QUALITY_TIER, QUALITY_TIERS } from '../types/transcode.js';
import { getBinariesConfig, type BinariesConfig } from './binaries.js';

const positiveMs = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Engine timeouts
  PROBE_TIMEOUT_MS: positiveMs('60000'),
  CANCEL_TIMEOUT_MS: positiveMs('5000'),
  KILL_GRACE_MS: positiveMs('5000'),

  DEFAULT_QUALITY: z.string().toLowerCase().pipe(z.enum(QUALITY_TIERS)).default(DEFAULT_QUALITY_TIER),
});

export interface TranscoderConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  binaries: BinariesConfig;
  engine: {
    ffmpegPath: string;
    ffprobePath: string;
    probeTimeoutMs: number;
    killGraceMs: number;
  };
  jobs: {
    cancelTimeoutMs: number;
    defaultQuality: typeof QUALITY_TIERS[number];
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TranscoderConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issue = parseResult.error.issues[0];
    const field = issue?.path.join('.') || 'environment';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const parsed = parseResult.data;
  const binaries = getBinariesConfig(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    binaries,
    engine: {
      ffmpegPath: binaries.ffmpeg.resolvedPath,
      ffprobePath: binaries.ffprobe.resolvedPath,
      probeTimeoutMs: parsed.PROBE_TIMEOUT_MS,
      killGraceMs: parsed.KILL_GRACE_MS,
    },
    jobs: {
      cancelTimeoutMs: parsed.CANCEL_TIMEOUT_MS,
      defaultQuality: parsed.DEFAULT_QUALITY,
    },
  };
}

export { getBinariesConfig, getBinaryFolders, type BinaryConfig, type BinariesConfig, type BinarySource } from './binaries.js';
