/**
 * jot search - Substring search over titles, bodies and tags
 */

import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { formatJson, formatNoteList } from './list-formatters.js';

interface SearchOptions extends GlobalOptions {
  query: string;
  json: boolean;
}

export function handleSearchCommand(args: string[]): void {
  const options = parseSearchFlags(args);
  runSearch(options);
}

export function printSearchHelp(): void {
  console.log(`Usage: jot search <query> [options]

Search note titles, bodies and tags (case-insensitive).

Options:
  --json               Output as JSON
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot search "meeting notes"
  jot search dentist --json
`);
}

function parseSearchFlags(args: string[]): SearchOptions {
  const globals = extractGlobalOptions(args);
  const boolFlags = extractBooleanFlags(args, ['--json']);
  rejectUnknownFlags(args);

  const query = args.join(' ').trim();
  if (!query) {
    throw new CliUsageError('Missing search query. Usage: jot search <query>');
  }
  return { ...globals, query, json: boolFlags.has('--json') };
}

function runSearch(options: SearchOptions): void {
  withContext(options, ({ store }) => {
    const notes = store.search(options.query);
    if (options.json) {
      console.log(formatJson(notes));
      return;
    }
    console.log(formatNoteList(notes, false));
  });
}
