import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('jot')} ${dimText('- terminal notes')}`
    : 'jot - terminal notes';

  const lines = [
    title,
    '',
    'Usage: jot [command] [options]',
    '',
    formatSection('Commands', [
      ['interactive (i, tui)', 'Full-screen note browser (default)'],
      ['add <title> [content]', 'Create a note'],
      ['list', 'List notes'],
      ['show <id|title>', 'Show a note'],
      ['edit <id|title>', 'Edit a note in $EDITOR or by flags'],
      ['delete <id|title>', 'Delete a note'],
      ['search <query>', 'Search titles, bodies and tags'],
      ['export <id|title>', 'Write a note to a markdown file'],
      ['import <files...>', 'Create notes from text files'],
      ['tags', 'Tag usage counts'],
      ['stats', 'Totals'],
      ['config', 'Manage configuration'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--config, -c <path>', 'Path to config file'],
      ['--db <path>', 'Path to the notes database'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Config file', '$JOTTER_CONFIG, else ~/.config/jotter/config.json'],
      ['Database', '~/.local/share/jotter/notes.db (database.path to override)'],
    ]),
    '',
    dimText('Run `jot <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
