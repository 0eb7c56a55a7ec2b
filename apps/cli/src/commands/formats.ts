/**
 * Formats Command
 */

import { listProfiles, describeProfile } from '@transcoder/processing';
import { printHeader, printJson, printTable } from '../lib/output.js';

interface FormatsOptions {
  json?: boolean;
}

export function formatsCommand(options: FormatsOptions): void {
  const rows = listProfiles();

  if (options.json) {
    printJson(rows);
    return;
  }

  printHeader('Output formats');
  printTable(rows.map(row => ({
    format: row.format,
    quality: row.tier,
    encoder: describeProfile(row.profile),
  })));
}
