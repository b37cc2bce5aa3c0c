/**
 * jot add - Create a note from the command line
 */

import { parseTagList } from '../notes/tags.js';
import { extractGlobalOptions, withContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, extractFlags, pickFlag, rejectUnknownFlags } from './flag-utils.js';
import { greenText } from './terminal.js';

interface AddOptions extends GlobalOptions {
  title: string;
  body: string;
  tags: string[];
  json: boolean;
}

export function handleAddCommand(args: string[]): void {
  const options = parseAddFlags(args);
  runAdd(options);
}

export function printAddHelp(): void {
  console.log(`Usage: jot add "<title>" ["<content>"] [options]

Create a new note.

Arguments:
  <title>              Note title
  <content>            Note body (markdown, optional)

Options:
  --tags, -t <tags>    Tags (comma-separated)
  --json               Output as JSON
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot add "Groceries" "- milk\\n- eggs" --tags shopping,home
  jot add "Call the dentist"
`);
}

function parseAddFlags(args: string[]): AddOptions {
  const globals = extractGlobalOptions(args);
  const valueFlags = extractFlags(args, ['--tags', '-t']);
  const boolFlags = extractBooleanFlags(args, ['--json']);
  rejectUnknownFlags(args);

  const [title, body = ''] = args;
  if (!title || !title.trim()) {
    throw new CliUsageError('Missing note title. Usage: jot add "<title>" ["<content>"]');
  }
  if (args.length > 2) {
    throw new CliUsageError(`Unexpected arguments: ${args.slice(2).join(' ')}`);
  }

  const tagValue = pickFlag(valueFlags, ['--tags', '-t']);
  return {
    ...globals,
    title: title.trim(),
    body,
    tags: tagValue ? parseTagList(tagValue) : [],
    json: boolFlags.has('--json'),
  };
}

function runAdd(options: AddOptions): void {
  withContext(options, ({ store }) => {
    const id = store.create({ title: options.title, body: options.body, tags: options.tags });
    if (options.json) {
      console.log(JSON.stringify(store.get(id), null, 2));
      return;
    }
    console.log(greenText(`Created note ${id}`));
  });
}
