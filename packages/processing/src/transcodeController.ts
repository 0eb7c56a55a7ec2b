/**
 * Transcode Controller
 *
 * Runs one conversion or clip per submitted request: plans it, resolves the
 * progress denominator, drives the engine and reports a single Outcome.
 *
 * - Planning errors throw before any process is spawned
 * - After that, every failure is returned as an Outcome, never thrown
 * - Progress is non-decreasing and always delivered before the Outcome
 * - Cancellation waits at most cancelTimeoutMs for the engine to exit
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_QUALITY_TIER,
  type ConversionRequest,
  type EncodePlan,
  type Outcome,
  type ProgressCallback,
  type QualityTier,
} from '@transcoder/core';
import { createJobLogger, formatDuration, type Logger } from '@transcoder/utils';
import { formatCommand } from './commandBuilder.js';
import { planConversion, validateRequest } from './commandPlanner.js';
import { resolveDuration } from './durationResolver.js';
import { JobSession } from './jobSession.js';
import { classifyOutcome } from './outcomeClassifier.js';
import type { EncodingEngine, EngineExit, EngineHandle, MediaProber } from './types.js';

export interface TranscodeControllerOptions {
  engine: EncodingEngine;
  // Defaults to the engine itself
  prober?: MediaProber;
  cancelTimeoutMs?: number;
  defaultQuality?: QualityTier;
  // Only used when logging commands
  ffmpegPath?: string;
  idGenerator?: () => string;
}

export interface TranscodeJob {
  readonly id: string;
  readonly session: JobSession;
  readonly plan: EncodePlan;
  readonly result: Promise<Outcome>;
}

const FORCED_CANCEL: unique symbol = Symbol('forced-cancel');
type ForcedCancel = typeof FORCED_CANCEL;

interface ActiveJob {
  session: JobSession;
  log: Logger;
  forceCancel: () => void;
  forced: Promise<ForcedCancel>;
  cancelTimer: NodeJS.Timeout | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TranscodeController {
  private readonly engine: EncodingEngine;
  private readonly prober: MediaProber;
  private readonly cancelTimeoutMs: number;
  private readonly defaultQuality: QualityTier;
  private readonly ffmpegPath: string;
  private readonly idGenerator: () => string;
  private readonly activeJobs = new Map<string, ActiveJob>();

  constructor(options: TranscodeControllerOptions) {
    this.engine = options.engine;
    this.prober = options.prober ?? options.engine;
    this.cancelTimeoutMs = options.cancelTimeoutMs ?? 5000;
    this.defaultQuality = options.defaultQuality ?? DEFAULT_QUALITY_TIER;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  /**
   * Start a job. Throws ValidationError, UnsupportedFormatError or
   * UnsupportedConversionError synchronously; the engine is not touched.
   */
  submit(request: ConversionRequest, onProgress?: ProgressCallback): TranscodeJob {
    const valid = validateRequest({
      ...request,
      quality: request.quality ?? this.defaultQuality,
    });
    const plan = planConversion(valid);

    const id = this.idGenerator();
    const session = new JobSession(id, valid, plan);

    let forceCancel: () => void = () => undefined;
    const forced = new Promise<ForcedCancel>((resolve) => {
      forceCancel = () => resolve(FORCED_CANCEL);
    });

    const job: ActiveJob = {
      session,
      log: createJobLogger(id),
      forceCancel,
      forced,
      cancelTimer: null,
    };
    this.activeJobs.set(id, job);

    return { id, session, plan, result: this.run(job, onProgress) };
  }

  /**
   * Full-file or clip transcode; resolves with the terminal Outcome
   */
  async convert(request: ConversionRequest, onProgress?: ProgressCallback): Promise<Outcome> {
    return this.submit(request, onProgress).result;
  }

  /**
   * Best-effort cancellation. Returns false when the job is unknown or
   * already finished.
   */
  cancel(target: TranscodeJob | string): boolean {
    const id = typeof target === 'string' ? target : target.id;
    const job = this.activeJobs.get(id);
    if (!job) return false;

    const { session, log } = job;

    switch (session.requestCancel()) {
      case 'rejected':
        return false;

      case 'cancelled':
        log.info({ state: session.status }, 'Job cancelled before engine start');
        job.forceCancel();
        return true;

      case 'cancelling': {
        const handle = session.processHandle;
        log.info({ pid: handle?.pid, timeoutMs: this.cancelTimeoutMs }, 'Cancelling job');
        if (handle) {
          try {
            this.engine.terminate(handle);
          } catch (error) {
            log.error({ err: error }, 'Failed to signal engine process');
          }
        }
        job.cancelTimer = setTimeout(job.forceCancel, this.cancelTimeoutMs);
        return true;
      }
    }
  }

  getSession(jobId: string): JobSession | null {
    return this.activeJobs.get(jobId)?.session ?? null;
  }

  getActiveJobs(): string[] {
    return Array.from(this.activeJobs.keys());
  }

  isRunning(jobId: string): boolean {
    return this.activeJobs.has(jobId);
  }

  private async run(job: ActiveJob, onProgress?: ProgressCallback): Promise<Outcome> {
    const { session, log } = job;
    const startTime = Date.now();

    session.beginProbing();
    log.info({
      input: session.request.inputPath,
      output: session.request.outputPath,
      format: session.plan.format,
      branch: session.plan.branch,
    }, 'Starting transcode');
    log.debug({ command: formatCommand(session.plan.args, this.ffmpegPath) }, 'FFmpeg command');

    const durationMs = await Promise.race([
      resolveDuration(session.request, this.prober, log),
      job.forced,
    ]);

    if (durationMs === FORCED_CANCEL || session.cancelRequested) {
      return this.finish(job, classifyOutcome({ exitCode: null, signal: null }, true, ''), startTime);
    }

    session.setDenominator(durationMs);
    log.debug({ durationMs }, 'Progress denominator resolved');

    let handle: EngineHandle;
    try {
      handle = this.engine.execute(session.plan.args, {
        onTelemetry: (sample) => this.deliver(job, session.recordSample(sample.elapsedMs), onProgress),
      });
    } catch (error) {
      log.error({ err: error }, 'Failed to start engine');
      return this.finish(
        job,
        classifyOutcome({ exitCode: null, signal: null }, false, errorMessage(error)),
        startTime
      );
    }

    session.attach(handle);

    const completion = handle.completion.catch((error: unknown): EngineExit => ({
      exitCode: null,
      signal: null,
      log: errorMessage(error),
    }));

    const exit = await Promise.race([completion, job.forced]);

    if (exit === FORCED_CANCEL) {
      log.warn(
        { pid: handle.pid, timeoutMs: this.cancelTimeoutMs },
        'Engine did not exit after termination request; reporting cancelled'
      );
      void completion.then((late) => {
        log.info({ exitCode: late.exitCode, signal: late.signal }, 'Engine process reaped');
      });
      const outcome = classifyOutcome({ exitCode: null, signal: null }, true, '');
      return this.finish(job, Object.freeze({
        ...outcome,
        diagnostic: `Engine did not exit within ${this.cancelTimeoutMs}ms of termination request`,
      }), startTime);
    }

    const outcome = classifyOutcome(exit, session.cancelRequested, exit.log);
    if (outcome.succeeded) {
      this.deliver(job, session.completeProgress(), onProgress);
    }

    return this.finish(job, outcome, startTime);
  }

  private deliver(job: ActiveJob, value: number | null, onProgress?: ProgressCallback): void {
    if (value === null || !onProgress) return;
    try {
      onProgress(value);
    } catch (error) {
      job.log.warn({ err: error }, 'Progress callback threw');
    }
  }

  private finish(job: ActiveJob, outcome: Outcome, startTime: number): Outcome {
    const settled = job.session.settle(outcome);

    if (job.cancelTimer) clearTimeout(job.cancelTimer);
    this.activeJobs.delete(job.session.id);

    const elapsed = Date.now() - startTime;
    const summary = {
      succeeded: settled.succeeded,
      reason: settled.reason,
      exitCode: settled.exitCode,
      elapsed: formatDuration(elapsed),
    };

    if (settled.reason === 'engine-failure') {
      job.log.warn({ ...summary, diagnostic: settled.diagnostic }, 'Transcode failed');
    } else {
      job.log.info(summary, 'Transcode finished');
    }

    return settled;
  }
}
