/**
 * jot delete - Remove a note after confirmation
 */

import terminalKit from 'terminal-kit';
import type { TerminalSurface } from '../tui/terminal-session.js';
import { extractGlobalOptions, openContext, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { resolveNote } from './note-resolver.js';
import { dimText, greenText } from './terminal.js';

export type Confirm = (question: string) => Promise<boolean>;

interface DeleteOptions extends GlobalOptions {
  reference: string;
  yes: boolean;
}

/** Waits for a single y/n key; Enter, Esc and Ctrl-C answer no. */
export async function askConfirmation(
  question: string,
  term: TerminalSurface = terminalKit.terminal
): Promise<boolean> {
  term.noFormat(`${question} `);
  term.grabInput({});
  try {
    return await new Promise<boolean>((resolve) => {
      const handler = (name: string): void => {
        const lower = name.toLowerCase();
        if (lower === 'y' || lower === 'n' || name === 'ENTER' || name === 'ESCAPE' || name === 'CTRL_C') {
          term.removeListener('key', handler);
          resolve(lower === 'y');
        }
      };
      term.on('key', handler);
    });
  } finally {
    term.grabInput(false);
    term.noFormat('\n');
  }
}

export async function handleDeleteCommand(
  args: string[],
  confirm: Confirm = askConfirmation
): Promise<void> {
  const options = parseDeleteFlags(args);
  await runDelete(options, confirm);
}

export function printDeleteHelp(): void {
  console.log(`Usage: jot delete <id|title> [options]

Delete a note.

Arguments:
  <id|title>           Note ID, or part of its title

Options:
  --yes, -y            Skip the confirmation prompt
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help

Examples:
  jot delete 12
  jot delete "old draft" --yes
`);
}

function parseDeleteFlags(args: string[]): DeleteOptions {
  const globals = extractGlobalOptions(args);
  const boolFlags = extractBooleanFlags(args, ['--yes', '-y']);
  rejectUnknownFlags(args);

  const reference = args.join(' ').trim();
  if (!reference) {
    throw new CliUsageError('Missing note ID or title. Usage: jot delete <id|title>');
  }
  return { ...globals, reference, yes: boolFlags.has('--yes') || boolFlags.has('-y') };
}

async function runDelete(options: DeleteOptions, confirm: Confirm): Promise<void> {
  const { store } = openContext(options);
  try {
    const note = resolveNote(store, options.reference);
    if (!options.yes && !(await confirm(`Delete '${note.title}'? [y/N]`))) {
      console.log(dimText('Cancelled'));
      return;
    }
    store.delete(note.id);
    console.log(greenText(`Deleted note ${note.id}`));
  } finally {
    store.close();
  }
}
