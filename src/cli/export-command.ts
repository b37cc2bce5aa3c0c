/**
 * jot export - Write a note to a markdown file
 */

import path from 'node:path';
import { writeNoteFile } from '../notes/export.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractFlags, pickFlag, rejectUnknownFlags } from './flag-utils.js';
import { resolveNote } from './note-resolver.js';
import { greenText } from './terminal.js';

interface ExportOptions extends GlobalOptions {
  reference: string;
  output?: string;
}

export function handleExportCommand(args: string[]): void {
  const options = parseExportFlags(args);
  runExport(options);
}

export function printExportHelp(): void {
  console.log(`Usage: jot export <id|title> [options]

Export a note as a markdown file. The file is written to the configured
export directory and named after the title unless --output is given.

Options:
  --output, -o <path>  Output file
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot export 12
  jot export groceries -o ~/groceries.md
`);
}

function parseExportFlags(args: string[]): ExportOptions {
  const globals = extractGlobalOptions(args);
  const valueFlags = extractFlags(args, ['--output', '-o']);
  rejectUnknownFlags(args);

  const reference = args.join(' ').trim();
  if (!reference) {
    throw new CliUsageError('Missing note ID or title. Usage: jot export <id|title>');
  }
  return { ...globals, reference, output: pickFlag(valueFlags, ['--output', '-o']) };
}

function runExport(options: ExportOptions): void {
  withContext(options, ({ config, store }) => {
    const note = resolveNote(store, options.reference);
    const file = options.output
      ? writeNoteFile(path.dirname(options.output), note, path.basename(options.output))
      : writeNoteFile(config.export.directory, note);
    console.log(greenText(`Exported to ${file}`));
  });
}
