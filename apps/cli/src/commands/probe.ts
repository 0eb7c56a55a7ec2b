/**
 * Probe Command
 *
 * Shows container duration and streams as ffprobe reports them.
 */

import ora from 'ora';
import { FFProbe, parseProbedDuration } from '@transcoder/processing';
import { formatTimecode } from '@transcoder/utils';
import { getConfig } from '../config/index.js';
import { printError, printHeader, printJson, printKeyValue, printTable } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(input: string, options: ProbeOptions): Promise<void> {
  const config = getConfig();
  const prober = new FFProbe({
    ffprobePath: config.engine.ffprobePath,
    timeoutMs: config.engine.probeTimeoutMs,
  });

  const spinner = ora({ text: `Probing ${input}...`, isSilent: options.json === true }).start();

  try {
    const metadata = await prober.probe(input);
    spinner.stop();

    if (options.json) {
      printJson(metadata);
      return;
    }

    const durationMs = parseProbedDuration(metadata);

    printHeader(input);
    printKeyValue('Container', metadata.format?.format_name ?? 'unknown');
    printKeyValue('Duration', durationMs === null ? 'unknown' : formatTimecode(durationMs));
    printKeyValue('Bitrate', metadata.format?.bit_rate ?? 'unknown');
    console.log();

    printTable((metadata.streams ?? []).map(stream => ({
      index: stream.index,
      type: stream.codec_type ?? '-',
      codec: stream.codec_name ?? '-',
    })));
  } catch (error) {
    spinner.fail('Probe failed');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
