import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigSchema } from '../../src/config/loader.js';
import { createFileExporter, type NoteExporter } from '../../src/notes/export.js';
import type { NoteDraft } from '../../src/schema/index.js';
import { MEMORY_DATABASE, SqliteNoteStore } from '../../src/storage/sqlite-store.js';
import { StorageError } from '../../src/storage/types.js';
import { NotesApp } from '../../src/tui/app.js';
import type { EditFlowResult } from '../../src/tui/edit-flow.js';

let tempDir: string;
let store: SqliteNoteStore;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jotter-app-'));
  let tick = 0;
  store = new SqliteNoteStore(MEMORY_DATABASE, { now: () => new Date(Date.UTC(2024, 0, 1, 0, tick++)) });
});

afterEach(() => {
  store.close();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

const CANCELED: EditFlowResult = { ok: false, canceled: true };

function setup(
  titles: string[],
  options: { messageTtl?: number; exporter?: NoteExporter } = {}
) {
  for (const title of titles) {
    store.create({ title, body: '', tags: [] });
  }
  const defaults = ConfigSchema.parse({});
  const editor = {
    openForNew: vi.fn<() => EditFlowResult>(() => CANCELED),
    openForEdit: vi.fn<(note: NoteDraft) => EditFlowResult>(() => CANCELED),
  };
  const app = new NotesApp({
    storage: store,
    config: {
      ui: { ...defaults.ui, messageTtl: options.messageTtl ?? defaults.ui.messageTtl },
      keybindings: defaults.keybindings,
    },
    editor,
    exporter: options.exporter ?? createFileExporter(tempDir),
  });
  return { app, editor };
}

function press(app: NotesApp, ...keys: string[]): void {
  for (const key of keys) {
    app.handleKey(key);
  }
}

function titles(app: NotesApp): string[] {
  return app.notes.map((note) => note.title);
}

describe('NotesApp list screen', () => {
  it('starts on the list with the newest note hovered', () => {
    const { app } = setup(['Groceries', 'Grocery list', 'Budget']);
    expect(app.screen).toBe('list');
    expect(titles(app)).toEqual(['Budget', 'Grocery list', 'Groceries']);
    expect(app.hoveredNote?.title).toBe('Budget');
    expect(app.consumeRedraw()).toBe(true);
    expect(app.consumeRedraw()).toBe(false);
  });

  it('moves within bounds and jumps to either end', () => {
    const { app } = setup(['A', 'B', 'C']);
    press(app, 'k');
    expect(app.cursor).toBe(0);
    press(app, 'j', 'DOWN', 'j');
    expect(app.cursor).toBe(2);
    press(app, 'g');
    expect(app.cursor).toBe(0);
    press(app, 'G');
    expect(app.cursor).toBe(2);
  });

  it('does nothing on an empty list', () => {
    const { app } = setup([]);
    press(app, 'j', 'd', 'e', 'x', ' ', 'CTRL_J');
    expect(app.cursor).toBeNull();
    expect(app.statusMessage).toBeNull();
  });

  it('cycles sort modes', () => {
    const { app } = setup(['b', 'a', 'c']);
    press(app, 's');
    expect(app.statusMessage).toBe('Sort: Updated ↑');
    expect(titles(app)).toEqual(['b', 'a', 'c']);
    press(app, 's');
    expect(app.statusMessage).toBe('Sort: Title A→Z');
    expect(titles(app)).toEqual(['a', 'b', 'c']);
  });

  it('scrolls the preview of a long note and resets on move', () => {
    store.create({ title: 'Long', body: Array.from({ length: 30 }, (_, i) => `line ${i}`).join('\n'), tags: [] });
    const { app } = setup(['Short']);
    press(app, 'j');
    expect(app.hoveredNote?.title).toBe('Long');
    press(app, 'CTRL_J', 'CTRL_J');
    expect(app.previewScroll).toBe(6);
    press(app, 'CTRL_K');
    expect(app.previewScroll).toBe(3);
    press(app, 'k');
    expect(app.previewScroll).toBe(0);
  });

  it('toggles help', () => {
    const { app } = setup(['A']);
    press(app, '.');
    expect(app.helpExpanded).toBe(true);
    press(app, '.');
    expect(app.helpExpanded).toBe(false);
  });

  it('quits with q or Ctrl-C', () => {
    const { app } = setup(['A']);
    expect(app.handleKey('q')).toBe('quit');
    expect(app.handleKey('CTRL_C')).toBe('quit');
    expect(app.handleKey('j')).toBe('continue');
  });
});

describe('NotesApp search', () => {
  it('filters live and accepts with a count', () => {
    const { app } = setup(['Groceries', 'Grocery list', 'Budget']);
    press(app, '/', 'g', 'r', 'o', 'c');
    expect(app.screen).toBe('search');
    expect(app.searchInput).toBe('groc');
    expect(titles(app)).toEqual(['Grocery list', 'Groceries']);
    expect(app.matches).toEqual([
      [0, 1, 2, 3],
      [0, 1, 2, 3],
    ]);

    press(app, 'ENTER');
    expect(app.screen).toBe('list');
    expect(app.query).toBe('groc');
    expect(app.statusMessage).toBe('Found 2 notes');
  });

  it('restores the committed query on Esc', () => {
    const { app } = setup(['Groceries', 'Grocery list', 'Budget']);
    press(app, '/', 'g', 'r', 'o', 'c', 'ENTER');
    press(app, '/', 'x');
    expect(titles(app)).toEqual([]);
    expect(app.cursor).toBeNull();

    press(app, 'ESCAPE');
    expect(app.screen).toBe('list');
    expect(app.query).toBe('groc');
    expect(titles(app)).toEqual(['Grocery list', 'Groceries']);
  });

  it('edits the query with backspace and treats letters as text', () => {
    const { app } = setup(['Budget', 'Groceries']);
    press(app, '/', 'q', 'BACKSPACE', 'b', 'u');
    expect(app.query).toBe('bu');
    expect(titles(app)).toEqual(['Budget']);
  });

  it('navigates the results and quits with Ctrl-C', () => {
    const { app } = setup(['Grocery', 'Groceries']);
    press(app, '/', 'g', 'CTRL_N');
    expect(app.cursor).toBe(1);
    press(app, 'CTRL_P');
    expect(app.cursor).toBe(0);
    expect(app.handleKey('CTRL_C')).toBe('quit');
  });

  it('sets no message when accepting an empty query', () => {
    const { app } = setup(['A']);
    press(app, '/', 'ENTER');
    expect(app.statusMessage).toBeNull();
  });

  it('clears query and selection on Esc, then stays quiet', () => {
    const { app } = setup(['Groceries', 'Grocery list', 'Budget'], { messageTtl: 1 });
    press(app, '/', 'g', 'r', 'o', 'c', 'ENTER', ' ');
    expect(app.selectedCount).toBe(1);

    press(app, 'ESCAPE');
    expect(app.statusMessage).toBe('Cleared search and selections');
    expect(app.query).toBe('');
    expect(app.selectedCount).toBe(0);
    expect(app.notes).toHaveLength(3);

    press(app, 'ESCAPE');
    expect(app.statusMessage).toBeNull();
  });

  it('reports what Esc cleared', () => {
    const { app } = setup(['A', 'B']);
    press(app, ' ', 'ESCAPE');
    expect(app.statusMessage).toBe('Selections cleared');
    press(app, '/', 'a', 'ENTER', 'ESCAPE');
    expect(app.statusMessage).toBe('Search cleared');
  });
});

describe('NotesApp selection and batch actions', () => {
  it('toggles the hovered note and moves down', () => {
    const { app } = setup(['A', 'B']);
    press(app, ' ');
    expect(app.isSelected(2)).toBe(true);
    expect(app.cursor).toBe(1);
  });

  it('selects all and clears with counts', () => {
    const { app } = setup(['A', 'B', 'C']);
    press(app, 'A');
    expect(app.statusMessage).toBe('Selected 3 notes');
    press(app, 'C');
    expect(app.statusMessage).toBe('Cleared 3 selections');
  });

  it('leaves the message alone when clearing nothing', () => {
    const { app } = setup(['A']);
    press(app, 'C');
    expect(app.statusMessage).toBeNull();
  });

  it('refuses batch actions without a selection', () => {
    const { app } = setup(['A']);
    press(app, 'D');
    expect(app.statusMessage).toBe('No notes selected');
    press(app, 'X');
    expect(app.statusMessage).toBe('No notes selected');
  });

  it('batch deletes the selection', () => {
    const { app } = setup(['A', 'B', 'C']);
    press(app, ' ', ' ', 'D');
    expect(app.statusMessage).toBe('Deleted 2 notes');
    expect(titles(app)).toEqual(['A']);
    expect(app.selectedCount).toBe(0);
  });

  it('exports the rest of the batch when one write fails', () => {
    fs.mkdirSync(path.join(tempDir, 'Beta.md'));
    const { app } = setup(['Alpha', 'Beta', 'Gamma']);
    press(app, 'A', 'X');

    expect(app.statusMessage).toBe('Exported 2 notes (1 failed)');
    expect(app.selectedCount).toBe(0);
    expect(fs.readFileSync(path.join(tempDir, 'Alpha.md'), 'utf-8')).toBe('Alpha\n');
    expect(fs.existsSync(path.join(tempDir, 'Gamma.md'))).toBe(true);
  });

  it('reports a fully successful batch export', () => {
    const { app } = setup(['Alpha', 'Beta']);
    press(app, 'A', 'X');
    expect(app.statusMessage).toBe('Exported 2 notes');
  });

  it('drops selections of notes deleted one by one', () => {
    const { app } = setup(['A', 'B']);
    press(app, ' ', 'k', 'd');
    expect(app.statusMessage).toBe("Deleted 'B'");
    expect(app.selectedCount).toBe(0);
  });
});

describe('NotesApp editing', () => {
  it('creates a note and focuses it', () => {
    const { app, editor } = setup(['A', 'B', 'C']);
    press(app, 's');
    editor.openForNew.mockReturnValueOnce({ ok: true, draft: { title: 'Fresh', body: 'text', tags: [] } });
    app.consumeRedraw();

    press(app, 'n');

    expect(app.statusMessage).toBe('Note created');
    expect(titles(app)).toEqual(['A', 'B', 'C', 'Fresh']);
    expect(app.cursor).toBe(3);
    expect(app.consumeRedraw()).toBe(true);
  });

  it('reports a cancelled or failed editor run', () => {
    const { app, editor } = setup(['A']);
    press(app, 'n');
    expect(app.statusMessage).toBe('Cancelled');

    editor.openForEdit.mockReturnValueOnce({ ok: false, error: 'Editor exited with status 1' });
    press(app, 'ENTER');
    expect(app.statusMessage).toBe('Cancelled');
    expect(store.get(1)?.title).toBe('A');
  });

  it('saves an edited note and keeps it hovered', () => {
    const { app, editor } = setup(['A', 'B']);
    press(app, 'j');
    editor.openForEdit.mockImplementationOnce((note) => ({
      ok: true,
      draft: { ...note, title: 'A edited', tags: ['new'] },
    }));

    press(app, 'e');

    expect(editor.openForEdit).toHaveBeenCalledWith(expect.objectContaining({ id: 1, title: 'A' }));
    expect(app.statusMessage).toBe('Note saved');
    expect(titles(app)).toEqual(['A edited', 'B']);
    expect(app.hoveredNote?.tags).toEqual(['new']);
  });

  it('exports the hovered note', () => {
    const { app } = setup(['Plan']);
    press(app, 'x');
    expect(app.statusMessage).toBe(`Exported to ${path.join(tempDir, 'Plan.md')}`);
  });

  it('reports a failed single export', () => {
    const exporter: NoteExporter = {
      exportNote: () => {
        throw new Error('disk full');
      },
    };
    const { app } = setup(['Plan'], { exporter });
    press(app, 'x');
    expect(app.statusMessage).toBe('Export failed: disk full');
  });

  it('lets storage failures escape', () => {
    const { app } = setup(['A']);
    vi.spyOn(store, 'delete').mockImplementation(() => {
      throw new StorageError('database is locked');
    });
    expect(() => app.handleKey('d')).toThrow('database is locked');
  });
});

describe('NotesApp status line', () => {
  it('expires messages after the configured key presses', () => {
    const { app } = setup(['A'], { messageTtl: 2 });
    press(app, 's');
    press(app, 'j');
    expect(app.statusMessage).toBe('Sort: Updated ↑');
    press(app, 'j');
    expect(app.statusMessage).toBeNull();
  });
});
