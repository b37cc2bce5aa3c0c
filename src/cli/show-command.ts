/**
 * jot show - Print a single note
 */

import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { formatJson, formatNoteFull } from './list-formatters.js';
import { resolveNote } from './note-resolver.js';

interface ShowOptions extends GlobalOptions {
  reference: string;
  json: boolean;
}

export function handleShowCommand(args: string[]): void {
  const options = parseShowFlags(args);
  runShow(options);
}

export function printShowHelp(): void {
  console.log(`Usage: jot show <id|title> [options]

Show a note with its metadata and body.

Arguments:
  <id|title>           Note ID, or part of its title

Options:
  --json               Output as JSON
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot show 12
  jot show groceries --json
`);
}

function parseShowFlags(args: string[]): ShowOptions {
  const globals = extractGlobalOptions(args);
  const boolFlags = extractBooleanFlags(args, ['--json']);
  rejectUnknownFlags(args);

  const reference = args.join(' ').trim();
  if (!reference) {
    throw new CliUsageError('Missing note ID or title. Usage: jot show <id|title>');
  }
  return { ...globals, reference, json: boolFlags.has('--json') };
}

function runShow(options: ShowOptions): void {
  withContext(options, ({ store }) => {
    const note = resolveNote(store, options.reference);
    console.log(options.json ? formatJson(note) : formatNoteFull(note));
  });
}
