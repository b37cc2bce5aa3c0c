/**
 * jot tags - Tag usage counts
 */

import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { formatJson } from './list-formatters.js';
import { cyanText, dimText } from './terminal.js';

interface TagsOptions extends GlobalOptions {
  json: boolean;
}

export function handleTagsCommand(args: string[]): void {
  const globals = extractGlobalOptions(args);
  const boolFlags = extractBooleanFlags(args, ['--json']);
  rejectUnknownFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }
  runTags({ ...globals, json: boolFlags.has('--json') });
}

export function printTagsHelp(): void {
  console.log(`Usage: jot tags [options]

List tags with the number of notes carrying each, most used first.

Options:
  --json               Output as JSON
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help
`);
}

function runTags(options: TagsOptions): void {
  withContext(options, ({ store }) => {
    const counts = store.tagCounts();
    if (options.json) {
      console.log(formatJson(counts));
      return;
    }
    if (counts.length === 0) {
      console.log(dimText('No tags yet.'));
      return;
    }
    const width = Math.max(...counts.map(({ count }) => String(count).length));
    for (const { tag, count } of counts) {
      console.log(`${String(count).padStart(width)}  ${cyanText(`@${tag}`)}`);
    }
  });
}
