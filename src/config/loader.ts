import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parseColor } from './colors.js';

const positiveInt = (fallback: number) => z.number().int().positive().default(fallback);

const colorSchema = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value, ctx) => {
      const hex = parseColor(value);
      if (hex === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown color '${value}'` });
        return z.NEVER;
      }
      return hex;
    });

const keySchema = (fallback: string) =>
  z.string().length(1, 'Keybindings must be a single character').default(fallback);

export const UiSchema = z
  .object({
    splitRatio: z.number().min(0.1).max(0.9).default(0.4),
    messageTtl: positiveInt(5),
    previewScrollStep: positiveInt(3),
    previewMaxScrollBuffer: positiveInt(10),
    headerLines: positiveInt(3),
    maxMarkdownFormattingBuffer: positiveInt(10),
  })
  .default({});

export const EditorSchema = z
  .object({
    command: z.string().min(1).optional(),
    secureTempFiles: z.boolean().default(true),
  })
  .default({});

export const KeybindingsSchema = z
  .object({
    quit: keySchema('q'),
    newNote: keySchema('n'),
    delete: keySchema('d'),
    edit: keySchema('e'),
    search: keySchema('/'),
    export: keySchema('x'),
    sort: keySchema('s'),
    gotoTop: keySchema('g'),
    gotoBottom: keySchema('G'),
    moveDown: keySchema('j'),
    moveUp: keySchema('k'),
    toggleHelp: keySchema('.'),
    selectAll: keySchema('A'),
    clearSelection: keySchema('C'),
    batchDelete: keySchema('D'),
    batchExport: keySchema('X'),
  })
  .default({})
  .superRefine((bindings, ctx) => {
    const seen = new Map<string, string>();
    for (const [action, key] of Object.entries(bindings)) {
      const previous = seen.get(key);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [action],
          message: `Key '${key}' is already bound to '${previous}'`,
        });
        continue;
      }
      seen.set(key, action);
    }
  });

export const DatabaseSchema = z
  .object({
    path: z.string().min(1).optional(),
    walMode: z.boolean().default(true),
    cacheSizeKb: z.number().int().default(-64000),
    synchronous: z.enum(['OFF', 'NORMAL', 'FULL', 'EXTRA']).default('NORMAL'),
    tempStore: z.enum(['DEFAULT', 'FILE', 'MEMORY']).default('MEMORY'),
  })
  .default({});

export const ExportSchema = z
  .object({
    directory: z.string().min(1).default('.'),
  })
  .default({});

export const ThemeSchema = z
  .object({
    text: colorSchema('#c0caf5'),
    unselectedText: colorSchema('#565f89'),
    metadata: colorSchema('#565f89'),
    hoverIndicator: colorSchema('#7aa2f7'),
    selectionIndicator: colorSchema('#e0af68'),
    activeIndicator: colorSchema('#ff9e64'),
    searchHighlight: colorSchema('#bb9af7'),
    status: colorSchema('#e0af68'),
    h1: colorSchema('#7dcfff'),
    h2: colorSchema('#7aa2f7'),
    h3: colorSchema('#7dcfff'),
    h4to6: colorSchema('#7aa2f7'),
    code: colorSchema('#9ece6a'),
    codeBlock: colorSchema('#9ece6a'),
    link: colorSchema('#7aa2f7'),
    emphasis: colorSchema('#ff9e64'),
    strong: colorSchema('#c0caf5'),
    strikethrough: colorSchema('#565f89'),
    blockquote: colorSchema('#565f89'),
  })
  .default({});

export const ConfigSchema = z.object({
  ui: UiSchema,
  editor: EditorSchema,
  keybindings: KeybindingsSchema,
  database: DatabaseSchema,
  export: ExportSchema,
  theme: ThemeSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type UiSettings = Config['ui'];
export type EditorSettings = Config['editor'];
export type Keybindings = Config['keybindings'];
export type DatabaseSettings = Config['database'];
export type Theme = Config['theme'];

const APP_DIR = 'jotter';

function homeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? '';
}

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  const base = process.env.XDG_CONFIG_HOME || path.join(homeDir(), '.config');
  return path.join(base, APP_DIR, 'config.json');
}

export function getDefaultDatabasePath(): string {
  const base = process.env.XDG_DATA_HOME || path.join(homeDir(), '.local', 'share');
  return path.join(base, APP_DIR, 'notes.db');
}

export function resolveConfigPath(configPath?: string): string {
  return configPath ?? (process.env.JOTTER_CONFIG || getGlobalConfigPath());
}

export function resolveDatabasePath(config: Config, dbFlag?: string): string {
  return dbFlag ?? config.database.path ?? getDefaultDatabasePath();
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = resolveConfigPath(configPath);

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${pathToLoad}: ${details}`);
  }
  return result.data;
}
