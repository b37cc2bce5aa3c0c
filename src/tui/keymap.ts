import type { Keybindings } from '../config/loader.js';

export type ConfigurableAction = keyof Keybindings;

export type ListAction =
  | ConfigurableAction
  | 'toggleSelect'
  | 'scrollDown'
  | 'scrollUp'
  | 'clearFilters';

export type SearchAction = 'quit' | 'accept' | 'cancel' | 'backspace' | 'moveDown' | 'moveUp';

const CONFIGURABLE_ACTIONS = [
  'quit',
  'newNote',
  'delete',
  'edit',
  'search',
  'export',
  'sort',
  'gotoTop',
  'gotoBottom',
  'moveDown',
  'moveUp',
  'toggleHelp',
  'selectAll',
  'clearSelection',
  'batchDelete',
  'batchExport',
] as const satisfies readonly ConfigurableAction[];

const FIXED_LIST_KEYS: ReadonlyArray<[string, ListAction]> = [
  ['ENTER', 'edit'],
  ['KP_ENTER', 'edit'],
  ['UP', 'moveUp'],
  ['DOWN', 'moveDown'],
  ['CTRL_J', 'scrollDown'],
  ['CTRL_K', 'scrollUp'],
  ['CTRL_C', 'quit'],
  ['ESCAPE', 'clearFilters'],
  [' ', 'toggleSelect'],
  ['SPACE', 'toggleSelect'],
];

/**
 * Resolves the configured characters into a key-name → action table. Built
 * once at startup; configured keys win over the fixed ones.
 */
export function buildListKeymap(bindings: Keybindings): ReadonlyMap<string, ListAction> {
  const keymap = new Map<string, ListAction>(FIXED_LIST_KEYS);
  for (const action of CONFIGURABLE_ACTIONS) {
    keymap.set(bindings[action], action);
  }
  return keymap;
}

export const SEARCH_KEYMAP: ReadonlyMap<string, SearchAction> = new Map<string, SearchAction>([
  ['ESCAPE', 'cancel'],
  ['ENTER', 'accept'],
  ['KP_ENTER', 'accept'],
  ['BACKSPACE', 'backspace'],
  ['DOWN', 'moveDown'],
  ['CTRL_N', 'moveDown'],
  ['CTRL_J', 'moveDown'],
  ['UP', 'moveUp'],
  ['CTRL_P', 'moveUp'],
  ['CTRL_K', 'moveUp'],
  ['CTRL_C', 'quit'],
]);

export const SEARCH_HELP = '^n/p navigate  ⏎ accept  ESC cancel';

export function listHelpChunks(bindings: Keybindings, selected: number): string[] {
  const b = bindings;
  const parts = [
    `${b.moveDown}/${b.moveUp} move`,
    `${b.gotoTop}/${b.gotoBottom} top/bottom`,
    `${b.newNote} new`,
    `${b.edit} edit`,
    `${b.delete} delete`,
    `${b.search} search`,
    `${b.sort} sort`,
    `${b.export} export`,
    '␣ select',
    '^j/k scroll',
    `${b.toggleHelp} help`,
    `${b.quit} quit`,
  ];
  const batch =
    selected > 0
      ? [
          `⇧${b.batchDelete} batch delete (${selected})`,
          `⇧${b.batchExport} batch export (${selected})`,
          `⇧${b.clearSelection} clear`,
        ]
      : [`⇧${b.selectAll} select all`, `⇧${b.clearSelection} clear`];
  return [...parts, ...batch];
}
