/**
 * jot edit - Update a note's fields, or open it in the editor
 */

import { parseTagList } from '../notes/tags.js';
import type { NoteDraft } from '../schema/index.js';
import { EditorBridge, spawnEditor, type EditorRunner } from '../tui/edit-flow.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractFlags, pickFlag, rejectUnknownFlags } from './flag-utils.js';
import { resolveNote } from './note-resolver.js';
import { dimText, greenText } from './terminal.js';

interface EditOptions extends GlobalOptions {
  reference: string;
  title?: string;
  body?: string;
  tags?: string[];
}

export function handleEditCommand(args: string[], runEditor: EditorRunner = spawnEditor): void {
  const options = parseEditFlags(args);
  runEdit(options, runEditor);
}

export function printEditHelp(): void {
  console.log(`Usage: jot edit <id|title> [options]

Edit a note. Without options the note opens in $VISUAL / $EDITOR.

Arguments:
  <id|title>             Note ID, or part of its title

Options:
  --title <text>         Replace the title
  --content <text>       Replace the body
  --tags, -t <tags>      Replace the tags (comma-separated, empty to clear)
  -c, --config <path>    Path to config file
  --db <path>            Path to the notes database
  -h, --help             Show this help

Examples:
  jot edit 12
  jot edit groceries --tags shopping,weekly
  jot edit 3 --title "Renamed" --content ""
`);
}

function parseEditFlags(args: string[]): EditOptions {
  const globals = extractGlobalOptions(args);
  const valueFlags = extractFlags(args, ['--title', '--content', '--tags', '-t']);
  rejectUnknownFlags(args);

  const reference = args.join(' ').trim();
  if (!reference) {
    throw new CliUsageError('Missing note ID or title. Usage: jot edit <id|title> [options]');
  }

  const title = valueFlags['--title'];
  if (title !== undefined && !title.trim()) {
    throw new CliUsageError('Title cannot be empty.');
  }
  const tagValue = pickFlag(valueFlags, ['--tags', '-t']);

  return {
    ...globals,
    reference,
    title: title?.trim(),
    body: valueFlags['--content'],
    tags: tagValue === undefined ? undefined : parseTagList(tagValue),
  };
}

function hasFieldChanges(options: EditOptions): boolean {
  return options.title !== undefined || options.body !== undefined || options.tags !== undefined;
}

function runEdit(options: EditOptions, runEditor: EditorRunner): void {
  withContext(options, ({ config, store }) => {
    const note = resolveNote(store, options.reference);
    let draft: NoteDraft;

    if (hasFieldChanges(options)) {
      draft = {
        title: options.title ?? note.title,
        body: options.body ?? note.body,
        tags: options.tags ?? note.tags,
      };
    } else {
      const bridge = new EditorBridge({
        settings: config.editor,
        suspend: (fn) => fn(),
        runEditor,
      });
      const result = bridge.openForEdit(note);
      if (!result.ok) {
        if ('error' in result) {
          throw new Error(result.error);
        }
        console.log(dimText('Cancelled'));
        return;
      }
      draft = result.draft;
    }

    store.update(note.id, draft);
    console.log(greenText(`Updated note ${note.id}`));
  });
}
