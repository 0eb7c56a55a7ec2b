/**
 * Convert Command
 *
 * Runs one conversion or clip in the foreground. Ctrl-C cancels the job;
 * a second Ctrl-C is left to the default handler.
 */

import ora from 'ora';
import chalk from 'chalk';
import { isTranscoderError, type Outcome } from '@transcoder/core';
import { FFmpegEngine, TranscodeController, describeProfile } from '@transcoder/processing';
import { getConfig } from '../config/index.js';
import { EXIT_CODES, buildClipWindow, exitCodeFor } from '../lib/args.js';
import { formatPercent, printDiagnostic, printError, printJson } from '../lib/output.js';

interface ConvertOptions {
  format: string;
  quality?: string;
  start?: number;
  end?: number;
  json?: boolean;
}

export async function convertCommand(
  input: string,
  output: string,
  options: ConvertOptions
): Promise<void> {
  const config = getConfig();
  const engine = new FFmpegEngine({
    ffmpegPath: config.engine.ffmpegPath,
    ffprobePath: config.engine.ffprobePath,
    probeTimeoutMs: config.engine.probeTimeoutMs,
    killGraceMs: config.engine.killGraceMs,
  });
  const controller = new TranscodeController({
    engine,
    cancelTimeoutMs: config.jobs.cancelTimeoutMs,
    defaultQuality: config.jobs.defaultQuality,
    ffmpegPath: config.engine.ffmpegPath,
  });

  const spinner = ora({ text: `Converting ${input}`, isSilent: options.json === true });
  let outcome: Outcome;

  try {
    const job = controller.submit(
      {
        inputPath: input,
        outputPath: output,
        format: options.format,
        quality: options.quality,
        clip: buildClipWindow(options.start, options.end),
      },
      (progress) => {
        spinner.text = `Converting ${input} ${chalk.cyan(formatPercent(progress))}`;
      }
    );

    spinner.start(`Converting ${input} (${describeProfile(job.plan.profile)})`);

    const onInterrupt = (): void => {
      if (controller.cancel(job)) {
        spinner.text = 'Cancelling...';
      }
    };
    process.once('SIGINT', onInterrupt);

    try {
      outcome = await job.result;
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  } catch (error) {
    spinner.stop();
    if (options.json) {
      printJson({
        succeeded: false,
        error: isTranscoderError(error)
          ? { code: error.code, message: error.message }
          : { code: 'UNKNOWN', message: String(error) },
      });
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    process.exit(EXIT_CODES.failure);
  }

  if (options.json) {
    printJson(outcome);
  } else if (outcome.succeeded) {
    spinner.succeed(`Wrote ${output}`);
  } else if (outcome.reason === 'cancelled') {
    spinner.warn('Cancelled');
    if (outcome.diagnostic) printDiagnostic(outcome.diagnostic);
  } else {
    spinner.fail(`Conversion failed (exit code ${outcome.exitCode ?? 'none'})`);
    if (outcome.diagnostic) printDiagnostic(outcome.diagnostic);
  }

  process.exit(exitCodeFor(outcome));
}
