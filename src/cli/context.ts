import { loadConfig, resolveDatabasePath, type Config } from '../config/loader.js';
import { SqliteNoteStore } from '../storage/sqlite-store.js';
import { extractFlags, pickFlag } from './flag-utils.js';

export const GLOBAL_VALUE_FLAGS = ['--config', '-c', '--db'] as const;

export interface GlobalOptions {
  configPath?: string;
  dbPath?: string;
}

export interface CommandContext {
  config: Config;
  store: SqliteNoteStore;
}

/** Pulls `--config` and `--db` out of `args`. */
export function extractGlobalOptions(args: string[]): GlobalOptions {
  const flags = extractFlags(args, GLOBAL_VALUE_FLAGS);
  return {
    configPath: pickFlag(flags, ['--config', '-c']),
    dbPath: flags['--db'],
  };
}

export function openContext(options: GlobalOptions): CommandContext {
  const config = loadConfig(options.configPath);
  const store = new SqliteNoteStore(resolveDatabasePath(config, options.dbPath), {
    settings: config.database,
  });
  return { config, store };
}

/** Opens config and store, runs `fn`, and always closes the store. */
export function withContext<T>(options: GlobalOptions, fn: (context: CommandContext) => T): T {
  const context = openContext(options);
  try {
    return fn(context);
  } finally {
    context.store.close();
  }
}
