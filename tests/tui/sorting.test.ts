import { describe, expect, it } from 'vitest';
import type { Note } from '../../src/schema/index.js';
import {
  DEFAULT_SORT_MODE,
  SORT_MODES,
  nextSortMode,
  sortLabel,
  sortNotes,
  type SortMode,
} from '../../src/tui/sorting.js';

function note(id: number, title: string, createdAt: string, updatedAt: string): Note {
  return { id, title, body: '', tags: [], createdAt, updatedAt };
}

const NOTES: Note[] = [
  note(1, 'beta', '2024-01-02T00:00:00.000Z', '2024-03-01T00:00:00.000Z'),
  note(2, 'Alpha', '2024-01-03T00:00:00.000Z', '2024-02-01T00:00:00.000Z'),
  note(3, 'gamma', '2024-01-01T00:00:00.000Z', '2024-04-01T00:00:00.000Z'),
];

function idsFor(mode: SortMode): number[] {
  return sortNotes([...NOTES], mode).map((n) => n.id);
}

describe('sortNotes', () => {
  it('orders by each mode', () => {
    expect(idsFor('updated-desc')).toEqual([3, 1, 2]);
    expect(idsFor('updated-asc')).toEqual([2, 1, 3]);
    expect(idsFor('title-asc')).toEqual([2, 1, 3]);
    expect(idsFor('title-desc')).toEqual([3, 1, 2]);
    expect(idsFor('created-desc')).toEqual([2, 1, 3]);
    expect(idsFor('created-asc')).toEqual([3, 1, 2]);
  });

  it('is idempotent', () => {
    for (const mode of SORT_MODES) {
      const once = sortNotes([...NOTES], mode);
      const twice = sortNotes([...once], mode);
      expect(twice.map((n) => n.id)).toEqual(once.map((n) => n.id));
    }
  });

  it('keeps the original order for equal keys', () => {
    const tied = [
      note(7, 'same', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z'),
      note(8, 'Same', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z'),
    ];
    expect(sortNotes([...tied], 'title-asc').map((n) => n.id)).toEqual([7, 8]);
  });
});

describe('nextSortMode', () => {
  it('returns to the start after six steps', () => {
    let mode = DEFAULT_SORT_MODE;
    const seen: SortMode[] = [];
    for (let i = 0; i < SORT_MODES.length; i += 1) {
      seen.push(mode);
      mode = nextSortMode(mode);
    }
    expect(mode).toBe(DEFAULT_SORT_MODE);
    expect(new Set(seen).size).toBe(6);
  });

  it('labels modes for the list title', () => {
    expect(sortLabel('updated-desc')).toBe('Updated ↓');
    expect(sortLabel(nextSortMode('updated-desc'))).toBe('Updated ↑');
    expect(sortLabel('title-asc')).toBe('Title A→Z');
  });
});
