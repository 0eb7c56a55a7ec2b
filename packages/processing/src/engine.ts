/**
 * FFmpeg Engine
 *
 * Spawns ffmpeg for an encode plan and streams its `-progress` telemetry.
 * stderr is kept as a bounded tail for diagnostics. Probing is delegated
 * to ffprobe.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { executeCommand, logger } from '@transcoder/utils';
import { FFProbe } from './ffprobe.js';
import { FFmpegProgressParser, type ProgressEvent } from './progressParser.js';
import type {
  EncodingEngine,
  EngineExit,
  EngineHandle,
  ExecuteOptions,
  ProbeMetadata,
} from './types.js';

export interface FFmpegEngineOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  probeTimeoutMs?: number;
  killGraceMs?: number;
  maxLogChars?: number;
}

interface RunningProcess {
  child: ChildProcess;
  killTimer: NodeJS.Timeout | null;
}

// Telemetry goes to stdout; banner and per-frame stats are suppressed on stderr
const PROGRESS_ARGS = ['-hide_banner', '-nostats', '-progress', 'pipe:1'];

export class FFmpegEngine implements EncodingEngine {
  private readonly ffmpegPath: string;
  private readonly killGraceMs: number;
  private readonly maxLogChars: number;
  private readonly prober: FFProbe;
  private readonly running = new Map<string, RunningProcess>();

  constructor(options: FFmpegEngineOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.killGraceMs = options.killGraceMs ?? 5000;
    this.maxLogChars = options.maxLogChars ?? 64 * 1024;
    this.prober = new FFProbe({
      ffprobePath: options.ffprobePath,
      timeoutMs: options.probeTimeoutMs,
    });
  }

  execute(args: readonly string[], options: ExecuteOptions = {}): EngineHandle {
    const id = randomUUID();
    const child = spawn(this.ffmpegPath, [...PROGRESS_ARGS, ...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    const entry: RunningProcess = { child, killTimer: null };
    this.running.set(id, entry);

    const parser = new FFmpegProgressParser();
    parser.on('progress', (event: ProgressEvent) => {
      options.onTelemetry?.({ elapsedMs: event.time });
    });

    let stderr = '';
    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => parser.parseProgressData(chunk));
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
      if (stderr.length > this.maxLogChars) {
        stderr = stderr.slice(-this.maxLogChars);
      }
    });

    const completion = new Promise<EngineExit>((resolve) => {
      let settled = false;
      const finish = (exit: EngineExit): void => {
        if (settled) return;
        settled = true;
        if (entry.killTimer) clearTimeout(entry.killTimer);
        this.running.delete(id);
        resolve(exit);
      };

      child.on('close', (code, signal) => {
        parser.flush();
        finish({ exitCode: code, signal, log: stderr });
      });

      // Spawn failures (missing binary, permissions) end here without 'close'
      child.on('error', (error) => {
        finish({ exitCode: null, signal: null, log: [stderr.trim(), error.message].filter(Boolean).join('\n') });
      });
    });

    return { id, pid: child.pid, completion };
  }

  /**
   * SIGTERM now, SIGKILL if still alive after the grace period
   */
  terminate(handle: EngineHandle): void {
    const entry = this.running.get(handle.id);
    if (!entry || entry.killTimer) return;

    logger.debug({ pid: handle.pid }, 'Sending SIGTERM to ffmpeg');
    entry.child.kill('SIGTERM');
    entry.killTimer = setTimeout(() => {
      if (this.running.has(handle.id)) {
        logger.warn({ pid: handle.pid }, 'ffmpeg ignored SIGTERM; sending SIGKILL');
        entry.child.kill('SIGKILL');
      }
    }, this.killGraceMs);
  }

  probe(inputPath: string): Promise<ProbeMetadata> {
    return this.prober.probe(inputPath);
  }

  /**
   * Check if ffmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], { timeout: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  isProbeAvailable(): Promise<boolean> {
    return this.prober.isAvailable();
  }
}
