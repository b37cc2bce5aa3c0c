import fs from 'node:fs';
import path from 'node:path';
import {
  ConfigSchema,
  loadConfig,
  resolveConfigPath,
  resolveDatabasePath,
  type Config,
} from '../config/loader.js';
import { extractGlobalOptions, type GlobalOptions } from './context.js';
import { CliUsageError } from './errors.js';
import { extractBooleanFlags, rejectUnknownFlags } from './flag-utils.js';
import { formatJson } from './list-formatters.js';
import { greenText } from './terminal.js';

const CONFIG_USAGE = 'Usage: jot config <init|show|path> [options]';

export function handleConfigCommand(args: string[]): void {
  const globals = extractGlobalOptions(args);
  const subcommand = args.shift();
  if (!subcommand) {
    throw new CliUsageError(CONFIG_USAGE);
  }

  switch (subcommand) {
    case 'init':
      runConfigInit(args, globals);
      return;
    case 'show':
      runConfigShow(args, globals);
      return;
    case 'path':
      runConfigPath(args, globals);
      return;
    default:
      throw new CliUsageError(`Unknown subcommand 'config ${subcommand}'.`);
  }
}

export function printConfigHelp(): void {
  console.log(`${CONFIG_USAGE}

Configuration subcommands:
  init                Write a config file with every default filled in
  show                Print the effective configuration
  path                Show the config file and database locations

Options:
  --force             (init) Overwrite an existing config file
  -c, --config <path> Path to config file
  --db <path>         Path to the notes database
  -h, --help          Show this help

Examples:
  jot config init
  jot config show
  jot config path
`);
}

function expectNoArguments(args: string[]): void {
  rejectUnknownFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected arguments: ${args.join(' ')}`);
  }
}

function runConfigInit(args: string[], globals: GlobalOptions): void {
  const boolFlags = extractBooleanFlags(args, ['--force']);
  expectNoArguments(args);

  const targetPath = resolveConfigPath(globals.configPath);
  if (fs.existsSync(targetPath) && !boolFlags.has('--force')) {
    throw new CliUsageError(`Config already exists at ${targetPath}. Use --force to overwrite.`);
  }

  const config: Config = ConfigSchema.parse({});
  fs.mkdirSync(path.dirname(targetPath), { recursive: true });
  fs.writeFileSync(targetPath, formatJson(config) + '\n', 'utf-8');
  console.log(greenText(`Created: ${targetPath}`));
}

function runConfigShow(args: string[], globals: GlobalOptions): void {
  expectNoArguments(args);
  console.log(formatJson(loadConfig(globals.configPath)));
}

function runConfigPath(args: string[], globals: GlobalOptions): void {
  expectNoArguments(args);
  const configPath = resolveConfigPath(globals.configPath);
  const exists = fs.existsSync(configPath);
  const config = exists ? loadConfig(configPath) : ConfigSchema.parse({});

  console.log(`Config:   ${configPath}${exists ? '' : ' (not found, using defaults)'}`);
  console.log(`Database: ${resolveDatabasePath(config, globals.dbPath)}`);
}
