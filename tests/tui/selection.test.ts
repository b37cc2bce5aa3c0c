import { describe, expect, it, vi } from 'vitest';
import type { NoteExporter } from '../../src/notes/export.js';
import type { Note } from '../../src/schema/index.js';
import type { NoteStorage } from '../../src/storage/types.js';
import { SelectionState } from '../../src/tui/selection.js';

function note(id: number, title = `Note ${id}`): Note {
  const stamp = '2024-01-01T00:00:00.000Z';
  return { id, title, body: '', tags: [], createdAt: stamp, updatedAt: stamp };
}

function storageStub(deleteMany: NoteStorage['deleteMany']): NoteStorage {
  return {
    listAll: () => [],
    get: () => null,
    create: () => 0,
    update: () => undefined,
    delete: () => undefined,
    deleteMany,
  };
}

describe('SelectionState', () => {
  it('toggles ids on and off', () => {
    const selection = new SelectionState();
    selection.toggle(1);
    selection.toggle(2);
    selection.toggle(1);
    expect(selection.has(1)).toBe(false);
    expect(selection.has(2)).toBe(true);
    expect(selection.size).toBe(1);
  });

  it('adds every visible note on selectAll', () => {
    const selection = new SelectionState();
    selection.toggle(9);
    expect(selection.selectAll([note(1), note(2), note(9)])).toBe(3);
  });

  it('reports how many ids clear removed', () => {
    const selection = new SelectionState();
    selection.selectAll([note(1), note(2)]);
    expect(selection.clear()).toBe(2);
    expect(selection.clear()).toBe(0);
  });

  it('drops ids missing from storage on retain', () => {
    const selection = new SelectionState();
    selection.selectAll([note(1), note(2), note(3)]);
    selection.retain(new Set([2, 4]));
    expect(selection.size).toBe(1);
    expect(selection.has(2)).toBe(true);
  });

  it('deletes the whole selection in one storage call', () => {
    const deleteMany = vi.fn((ids: readonly number[]) => ids.length);
    const selection = new SelectionState();
    selection.selectAll([note(1), note(2)]);

    expect(selection.deleteAll(storageStub(deleteMany))).toBe(2);
    expect(deleteMany).toHaveBeenCalledTimes(1);
    expect(deleteMany).toHaveBeenCalledWith([1, 2]);
    expect(selection.size).toBe(0);
  });

  it('keeps the selection when batch delete fails', () => {
    const selection = new SelectionState();
    selection.toggle(1);
    const failing = storageStub(() => {
      throw new Error('disk full');
    });
    expect(() => selection.deleteAll(failing)).toThrow('disk full');
    expect(selection.size).toBe(1);
  });

  it('exports selected visible notes independently and always clears', () => {
    const written: string[] = [];
    const exporter: NoteExporter = {
      exportNote: (n) => {
        if (n.id === 2) throw new Error('EISDIR');
        written.push(n.title);
        return `/tmp/${n.title}.md`;
      },
    };
    const selection = new SelectionState();
    selection.toggle(1);
    selection.toggle(2);
    selection.toggle(5);

    const summary = selection.exportAll([note(1, 'Alpha'), note(2, 'Beta'), note(3, 'Gamma')], exporter);

    expect(summary).toEqual({ succeeded: 1, failed: 1 });
    expect(written).toEqual(['Alpha']);
    expect(selection.size).toBe(0);
  });
});
