/**
 * jot interactive - Full-screen terminal UI
 */

import { runInteractiveTui } from '../tui/interactive.js';
import { extractGlobalOptions, openContext, type GlobalOptions } from './context.js';
import { rejectUnknownFlags } from './flag-utils.js';
import { CliUsageError } from './errors.js';

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  const options = parseInteractiveFlags(args);
  await runInteractive(options);
}

export function printInteractiveHelp(): void {
  console.log(`Usage: jot [interactive] [options]

Launch the full-screen note browser. This is the default when jot is run
without a command. Press the help key (default ".") inside for all keys.

Options:
  -c, --config <path>  Path to config file
  --db <path>          Path to the notes database
  -h, --help           Show this help
`);
}

function parseInteractiveFlags(args: string[]): GlobalOptions {
  const globals = extractGlobalOptions(args);
  rejectUnknownFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }
  return globals;
}

async function runInteractive(options: GlobalOptions): Promise<void> {
  const { config, store } = openContext(options);
  try {
    await runInteractiveTui({ storage: store, config });
  } finally {
    store.close();
  }
}
