/**
 * Check Command
 *
 * Reports where ffmpeg and ffprobe were resolved from and whether they run.
 */

import ora from 'ora';
import chalk from 'chalk';
import { FFmpegEngine } from '@transcoder/processing';
import { getBinaryFolders } from '@transcoder/core';
import { getConfig } from '../config/index.js';
import { printHeader, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

export async function checkCommand(): Promise<void> {
  const config = getConfig();
  const engine = new FFmpegEngine({
    ffmpegPath: config.engine.ffmpegPath,
    ffprobePath: config.engine.ffprobePath,
  });

  const spinner = ora('Checking encoder binaries...').start();
  const [ffmpegOk, ffprobeOk] = await Promise.all([
    engine.isAvailable(),
    engine.isProbeAvailable(),
  ]);
  spinner.stop();

  printHeader('Encoder binaries');

  const rows = [
    { binary: config.binaries.ffmpeg, ok: ffmpegOk },
    { binary: config.binaries.ffprobe, ok: ffprobeOk },
  ];

  for (const { binary, ok } of rows) {
    const status = ok ? chalk.green('[OK]') : chalk.red('[ERR]');
    printKeyValue(binary.name, `${status} ${binary.resolvedPath} ${chalk.gray(`(${binary.source})`)}`);
  }
  console.log();

  if (ffmpegOk && ffprobeOk) {
    printSuccess('Ready to transcode');
    return;
  }

  if (!ffmpegOk) {
    printWarning(
      `ffmpeg did not run; set ${config.binaries.ffmpeg.envVar}, place it in ${getBinaryFolders().os} or install it on PATH`
    );
  }
  if (!ffprobeOk) {
    printWarning('ffprobe did not run; progress will be unavailable for full-file jobs');
  }
  process.exit(1);
}
