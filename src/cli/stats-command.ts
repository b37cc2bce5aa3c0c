/**
 * jot stats - Totals for the notes database
 */

import { formatDateTime } from '../utils/date.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { formatJson } from './list-formatters.js';
import { boldText, dimText } from './terminal.js';

interface StatsOptions extends GlobalOptions {
  json: boolean;
}

export function handleStatsCommand(args: string[]): void {
  const globals = extractGlobalOptions(args);
  const boolFlags = extractBooleanFlags(args, ['--json']);
  rejectUnknownFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }
  runStats({ ...globals, json: boolFlags.has('--json') });
}

export function printStatsHelp(): void {
  console.log(`Usage: jot stats [options]

Show note and tag totals.

Options:
  --json               Output as JSON
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help
`);
}

function runStats(options: StatsOptions): void {
  withContext(options, ({ store }) => {
    const stats = store.stats();
    if (options.json) {
      console.log(formatJson(stats));
      return;
    }
    console.log(boldText('Notes'));
    console.log(`  Total:   ${stats.notes}`);
    console.log(`  Tags:    ${stats.tags}`);
    if (stats.oldest && stats.newest) {
      console.log(dimText(`  Oldest:  ${formatDateTime(stats.oldest)}`));
      console.log(dimText(`  Newest:  ${formatDateTime(stats.newest)}`));
    }
  });
}
