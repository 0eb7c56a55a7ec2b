/**
 * Processing Types
 *
 * Contract between the transcode controller and the encoding engine.
 */

import type { ProgressSample, TerminalStatus } from '@transcoder/core';

/**
 * Subset of ffprobe's JSON output the controller reads
 */
export interface ProbeMetadata {
  format?: {
    duration?: string;
    format_name?: string;
    bit_rate?: string;
  };
  streams?: Array<{
    index?: number;
    codec_type?: string;
    codec_name?: string;
    duration?: string;
  }>;
}

export interface MediaProber {
  probe(inputPath: string): Promise<ProbeMetadata>;
}

export interface EngineExit extends TerminalStatus {
  log: string;   // captured diagnostic output, tail only
}

export interface EngineHandle {
  readonly id: string;
  readonly pid?: number;
  /** Resolves once the process has exited. Never rejects. */
  readonly completion: Promise<EngineExit>;
}

export interface ExecuteOptions {
  onTelemetry?: (sample: ProgressSample) => void;
}

export interface EncodingEngine extends MediaProber {
  execute(args: readonly string[], options?: ExecuteOptions): EngineHandle;
  terminate(handle: EngineHandle): void;
}
