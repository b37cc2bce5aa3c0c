import type { Note } from '../schema/index.js';

export const SORT_MODES = [
  'updated-desc',
  'updated-asc',
  'title-asc',
  'title-desc',
  'created-desc',
  'created-asc',
] as const;

export type SortMode = (typeof SORT_MODES)[number];

export const DEFAULT_SORT_MODE: SortMode = 'updated-desc';

const SORT_LABELS: Record<SortMode, string> = {
  'updated-desc': 'Updated ↓',
  'updated-asc': 'Updated ↑',
  'title-asc': 'Title A→Z',
  'title-desc': 'Title Z→A',
  'created-desc': 'Created ↓',
  'created-asc': 'Created ↑',
};

type Comparator = (a: Note, b: Note) => number;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const byTitle: Comparator = (a, b) => compareText(a.title.toLowerCase(), b.title.toLowerCase());
const byUpdated: Comparator = (a, b) => compareText(a.updatedAt, b.updatedAt);
const byCreated: Comparator = (a, b) => compareText(a.createdAt, b.createdAt);

const COMPARATORS: Record<SortMode, Comparator> = {
  'updated-desc': (a, b) => byUpdated(b, a),
  'updated-asc': byUpdated,
  'title-asc': byTitle,
  'title-desc': (a, b) => byTitle(b, a),
  'created-desc': (a, b) => byCreated(b, a),
  'created-asc': byCreated,
};

export function sortLabel(mode: SortMode): string {
  return SORT_LABELS[mode];
}

export function nextSortMode(mode: SortMode): SortMode {
  const index = SORT_MODES.indexOf(mode);
  return SORT_MODES[(index + 1) % SORT_MODES.length] ?? DEFAULT_SORT_MODE;
}

/** Sorts in place and returns the same array. */
export function sortNotes(notes: Note[], mode: SortMode): Note[] {
  return notes.sort(COMPARATORS[mode]);
}
