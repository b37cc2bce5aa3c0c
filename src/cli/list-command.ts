/**
 * jot list - List notes, newest first by default
 */

import type { Note } from '../schema/index.js';
import { sortNotes, type SortMode } from '../tui/sorting.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import {
  extractBooleanFlags,
  extractFlags,
  parsePositiveInt,
  pickFlag,
  rejectUnknownFlags,
} from './flag-utils.js';
import { formatJson, formatNoteList } from './list-formatters.js';

type ListSortField = 'updated' | 'created' | 'title';

const SORT_FIELDS: Record<ListSortField, SortMode> = {
  updated: 'updated-desc',
  created: 'created-desc',
  title: 'title-asc',
};

interface ListOptions extends GlobalOptions {
  tag?: string;
  sort: ListSortField;
  limit?: number;
  oneline: boolean;
  json: boolean;
}

export function handleListCommand(args: string[]): void {
  const options = parseListFlags(args);
  runList(options);
}

export function printListHelp(): void {
  console.log(`Usage: jot list [options]

List notes.

Options:
  --tag <tag>                   Only notes carrying this tag
  --sort <updated|created|title>  Sort order (default: updated)
  --limit, -l <n>               Show at most n notes
  --oneline                     One line per note
  --json                        Output as JSON
  -c, --config <path>           Path to config file
  --db <path>                   Path to the notes database
  -h, --help                    Show this help

Examples:
  jot list
  jot list --tag work --sort title
  jot list --limit 5 --oneline
`);
}

function isSortField(value: string): value is ListSortField {
  return Object.hasOwn(SORT_FIELDS, value);
}

function parseListFlags(args: string[]): ListOptions {
  const globals = extractGlobalOptions(args);
  const valueFlags = extractFlags(args, ['--tag', '--sort', '--limit', '-l']);
  const boolFlags = extractBooleanFlags(args, ['--oneline', '--json']);
  rejectUnknownFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }

  const sort = valueFlags['--sort'] ?? 'updated';
  if (!isSortField(sort)) {
    throw new CliUsageError(`Invalid sort '${sort}'. Use one of: updated, created, title.`);
  }

  const limitValue = pickFlag(valueFlags, ['--limit', '-l']);
  const tag = valueFlags['--tag']?.trim().replace(/^[@#]+/, '');

  return {
    ...globals,
    tag: tag || undefined,
    sort,
    limit: limitValue === undefined ? undefined : parsePositiveInt('--limit', limitValue),
    oneline: boolFlags.has('--oneline'),
    json: boolFlags.has('--json'),
  };
}

export function selectNotes(notes: Note[], options: Pick<ListOptions, 'tag' | 'sort' | 'limit'>): Note[] {
  const { tag } = options;
  const filtered = tag ? notes.filter((note) => note.tags.includes(tag)) : notes;
  sortNotes(filtered, SORT_FIELDS[options.sort]);
  return options.limit === undefined ? filtered : filtered.slice(0, options.limit);
}

function runList(options: ListOptions): void {
  withContext(options, ({ store }) => {
    const notes = selectNotes(store.listAll(), options);
    if (options.json) {
      console.log(formatJson(notes));
      return;
    }
    console.log(formatNoteList(notes, options.oneline));
  });
}
