/**
 * jot import - Create notes from plain-text files
 */

import fs from 'node:fs';
import { parseNoteText } from '../notes/note-format.js';
import { normalizeTags, parseTagList } from '../notes/tags.js';
import type { NoteDraft } from '../schema/index.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError, FileNotFoundError } from './errors.js';
import { extractFlags, pickFlag, rejectUnknownFlags } from './flag-utils.js';
import { greenText, yellowText } from './terminal.js';

interface ImportOptions extends GlobalOptions {
  files: string[];
  tags: string[];
}

export function handleImportCommand(args: string[]): void {
  const options = parseImportFlags(args);
  runImport(options);
}

export function printImportHelp(): void {
  console.log(`Usage: jot import <files...> [options]

Import notes from text files. The first line is the title, an optional
second line of @tags follows, and everything after a blank line is the body.

Options:
  --tags, -t <tags>    Extra tags for every imported note (comma-separated)
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot import ideas.md todo.md
  jot import notes/*.md --tags archive
`);
}

function parseImportFlags(args: string[]): ImportOptions {
  const globals = extractGlobalOptions(args);
  const valueFlags = extractFlags(args, ['--tags', '-t']);
  rejectUnknownFlags(args);

  if (args.length === 0) {
    throw new CliUsageError('Missing files to import. Usage: jot import <files...>');
  }
  const tagValue = pickFlag(valueFlags, ['--tags', '-t']);
  return { ...globals, files: [...args], tags: tagValue ? parseTagList(tagValue) : [] };
}

function readDrafts(files: readonly string[], extraTags: readonly string[]): NoteDraft[] {
  const drafts: NoteDraft[] = [];
  for (const file of files) {
    if (!fs.existsSync(file)) {
      throw new FileNotFoundError(file);
    }
    const draft = parseNoteText(fs.readFileSync(file, 'utf-8'));
    if (!draft) {
      console.error(yellowText(`Skipped empty file: ${file}`));
      continue;
    }
    drafts.push({ ...draft, tags: normalizeTags([...draft.tags, ...extraTags]) });
  }
  return drafts;
}

function runImport(options: ImportOptions): void {
  const drafts = readDrafts(options.files, options.tags);
  withContext(options, ({ store }) => {
    for (const draft of drafts) {
      store.create(draft);
    }
  });
  console.log(greenText(`Imported ${drafts.length} notes`));
}
