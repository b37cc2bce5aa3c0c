#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleAddCommand, printAddHelp } from './cli/add-command.js';
import { handleConfigCommand, printConfigHelp } from './cli/config-command.js';
import { handleDeleteCommand, printDeleteHelp } from './cli/delete-command.js';
import { handleEditCommand, printEditHelp } from './cli/edit-command.js';
import { handleExportCommand, printExportHelp } from './cli/export-command.js';
import { handleImportCommand, printImportHelp } from './cli/import-command.js';
import { handleInteractiveCommand, printInteractiveHelp } from './cli/interactive-command.js';
import { handleListCommand, printListHelp } from './cli/list-command.js';
import { handleSearchCommand, printSearchHelp } from './cli/search-command.js';
import { handleShowCommand, printShowHelp } from './cli/show-command.js';
import { handleStatsCommand, printStatsHelp } from './cli/stats-command.js';
import { handleTagsCommand, printTagsHelp } from './cli/tags-command.js';
import { AmbiguousNoteError, CliUsageError, FileNotFoundError, NoteNotFoundError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';
import { redText } from './cli/terminal.js';
import { StorageError } from './storage/types.js';

const VERSION = '0.1.0';

type CommandHandler = {
  run: (args: string[]) => void | Promise<void>;
  help: () => void;
};

const COMMANDS: Record<string, CommandHandler> = {
  interactive: { run: handleInteractiveCommand, help: printInteractiveHelp },
  add: { run: handleAddCommand, help: printAddHelp },
  list: { run: handleListCommand, help: printListHelp },
  show: { run: handleShowCommand, help: printShowHelp },
  edit: { run: (args) => handleEditCommand(args), help: printEditHelp },
  delete: { run: (args) => handleDeleteCommand(args), help: printDeleteHelp },
  search: { run: handleSearchCommand, help: printSearchHelp },
  export: { run: handleExportCommand, help: printExportHelp },
  import: { run: handleImportCommand, help: printImportHelp },
  tags: { run: handleTagsCommand, help: printTagsHelp },
  stats: { run: handleStatsCommand, help: printStatsHelp },
  config: { run: handleConfigCommand, help: printConfigHelp },
};

const ALIASES: Record<string, string> = {
  i: 'interactive',
  tui: 'interactive',
};

function lookupCommand(name: string): CommandHandler | undefined {
  const resolved = ALIASES[name] ?? name;
  return Object.hasOwn(COMMANDS, resolved) ? COMMANDS[resolved] : undefined;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Help/version only count in front of the command
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  // No command, or only global flags: open the TUI
  const command = firstArg === undefined || firstArg.startsWith('-') ? 'interactive' : args.shift();

  if (command === 'help') {
    printHelp();
    return;
  }

  const handler = command ? lookupCommand(command) : undefined;
  if (!handler) {
    printHelp(`Unknown command '${command ?? ''}'.`);
    process.exit(1);
    return;
  }

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  if (helpFlags.size > 0) {
    handler.help();
    return;
  }

  try {
    await handler.run(args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (
      error instanceof NoteNotFoundError ||
      error instanceof AmbiguousNoteError ||
      error instanceof FileNotFoundError
    ) {
      console.error(redText(error.message));
      process.exit(1);
      return;
    }
    if (error instanceof StorageError) {
      const cause =
        error.cause instanceof Error && !error.message.includes(error.cause.message)
          ? ` (${error.cause.message})`
          : '';
      console.error(redText(`Error: ${error.message}${cause}`));
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(redText(`Error: ${error.message}`));
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
