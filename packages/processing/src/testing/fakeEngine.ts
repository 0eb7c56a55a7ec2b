/**
 * In-process stand-in for ffmpeg used by the controller tests.
 */

import type { ProgressSample } from '@transcoder/core';
import type {
  EncodingEngine,
  EngineExit,
  EngineHandle,
  ExecuteOptions,
  ProbeMetadata,
} from '../types.js';

export class FakeRun {
  readonly handle: EngineHandle;
  readonly args: readonly string[];
  private readonly onTelemetry?: (sample: ProgressSample) => void;
  private resolveExit: (exit: EngineExit) => void = () => undefined;
  private exited = false;

  constructor(id: string, args: readonly string[], options: ExecuteOptions) {
    this.args = args;
    this.onTelemetry = options.onTelemetry;
    const completion = new Promise<EngineExit>((resolve) => {
      this.resolveExit = resolve;
    });
    this.handle = { id, pid: 4242, completion };
  }

  sample(...elapsedMs: number[]): void {
    for (const ms of elapsedMs) {
      this.onTelemetry?.({ elapsedMs: ms });
    }
  }

  exit(exit: Partial<EngineExit> = {}): void {
    if (this.exited) return;
    this.exited = true;
    this.resolveExit({ exitCode: 0, signal: null, log: '', ...exit });
  }

  get hasExited(): boolean {
    return this.exited;
  }
}

export class FakeEngine implements EncodingEngine {
  readonly runs: FakeRun[] = [];
  readonly probeCalls: string[] = [];
  readonly terminated: string[] = [];

  probeResult: ProbeMetadata | Error = { format: { duration: '10.000000' } };
  probeGate: Promise<void> | null = null;
  // Exit with SIGTERM as soon as terminate() is called
  ackTermination = true;
  failToStart: Error | null = null;

  private waiters: Array<(run: FakeRun) => void> = [];

  execute(args: readonly string[], options: ExecuteOptions = {}): EngineHandle {
    if (this.failToStart) throw this.failToStart;

    const run = new FakeRun(`run-${this.runs.length + 1}`, args, options);
    this.runs.push(run);
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve(run));
    return run.handle;
  }

  terminate(handle: EngineHandle): void {
    this.terminated.push(handle.id);
    if (this.ackTermination) {
      this.runs.find(run => run.handle.id === handle.id)?.exit({
        exitCode: null,
        signal: 'SIGTERM',
        log: 'Exiting normally, received signal 15.',
      });
    }
  }

  async probe(inputPath: string): Promise<ProbeMetadata> {
    this.probeCalls.push(inputPath);
    if (this.probeGate) await this.probeGate;
    if (this.probeResult instanceof Error) throw this.probeResult;
    return this.probeResult;
  }

  /**
   * Resolves with the next run started after this call
   */
  nextRun(): Promise<FakeRun> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
