/**
 * Binary Configuration
 * 
 * Resolves the encoder binaries with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Bundled binary folder (binaries/<os>/ at the repository root)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Relative to packages/core/src/config/
const BINARY_ROOT = resolve(__dirname, '../../../../binaries');

function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv,
  binaryRoot: string
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(binaryRoot, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Resolve ffmpeg and ffprobe
 */
export function getBinariesConfig(
  env: NodeJS.ProcessEnv = process.env,
  binaryRoot: string = BINARY_ROOT
): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env, binaryRoot),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env, binaryRoot),
  };
}

export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}
