/**
 * FFProbe Wrapper
 * 
 * Runs ffprobe and returns its JSON output, validated down to the fields
 * the controller reads.
 */

import { z } from 'zod';
import { ProbeError } from '@transcoder/core';
import { executeCommand, type CommandResult } from '@transcoder/utils';
import type { MediaProber, ProbeMetadata } from './types.js';

const probeOutputSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
      format_name: z.string().optional(),
      bit_rate: z.string().optional(),
    })
    .optional(),
  streams: z
    .array(
      z.object({
        index: z.number().optional(),
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        duration: z.string().optional(),
      })
    )
    .optional(),
});

export interface FFProbeOptions {
  ffprobePath?: string;
  timeoutMs?: number;
}

export class FFProbe implements MediaProber {
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  /**
   * Probe a media file for container and stream metadata
   */
  async probe(filePath: string): Promise<ProbeMetadata> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, args, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, `timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `exit code ${result.exitCode}: ${result.stderr.trim()}`);
    }

    return parseProbeOutput(filePath, result.stdout);
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], { timeout: 5000 });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

export function parseProbeOutput(filePath: string, stdout: string): ProbeMetadata {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ProbeError(filePath, `unparsable output: ${stdout.substring(0, 200)}`);
  }

  const parsed = probeOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeError(filePath, `unexpected output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
