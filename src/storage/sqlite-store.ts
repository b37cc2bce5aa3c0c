import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import type { DatabaseSettings } from '../config/loader.js';
import {
  NoteDraftSchema,
  NoteRowSchema,
  StoredTagsSchema,
  type Note,
  type NoteDraft,
  type NoteRow,
} from '../schema/index.js';
import { normalizeTags } from '../notes/tags.js';
import { StorageError, type NoteStorage, type StoreStats, type TagCount } from './types.js';

export const MEMORY_DATABASE = ':memory:';

const MIGRATIONS: Array<{ version: number; up: (db: Database.Database) => void }> = [
  {
    version: 1,
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS notes (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          title TEXT NOT NULL,
          content TEXT NOT NULL DEFAULT '',
          tags TEXT NOT NULL DEFAULT '[]',
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_notes_updated_at ON notes(updated_at DESC);
      `);
    },
  },
];

const NOTE_COLUMNS = 'id, title, content, tags, created_at, updated_at';

export interface SqliteNoteStoreOptions {
  settings?: Partial<DatabaseSettings>;
  /** Clock used for created/updated timestamps. */
  now?: () => Date;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function rowToNote(raw: unknown): Note {
  const row: NoteRow = NoteRowSchema.parse(raw);
  let tags: string[];
  try {
    tags = StoredTagsSchema.parse(JSON.parse(row.tags));
  } catch (error) {
    throw new StorageError(`Note ${row.id} has malformed tags`, { cause: error });
  }
  return {
    id: row.id,
    title: row.title,
    body: row.content,
    tags,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function normalizeDraft(draft: NoteDraft): NoteDraft {
  // Titles are a single line of the note text form.
  const result = NoteDraftSchema.safeParse({
    ...draft,
    title: draft.title.replace(/\s+/g, ' '),
    tags: normalizeTags(draft.tags),
  });
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'Invalid note';
    throw new StorageError(message);
  }
  return result.data;
}

/**
 * Notes persisted in a single SQLite file through better-sqlite3. Every call
 * is synchronous; failures surface as StorageError.
 */
export class SqliteNoteStore implements NoteStorage {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(dbPath: string, options: SqliteNoteStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    try {
      if (dbPath !== MEMORY_DATABASE) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      this.db = new Database(dbPath);
      this.applyPragmas(dbPath, options.settings ?? {});
      this.initialize();
    } catch (error) {
      throw new StorageError(`Failed to open database at ${dbPath}`, { cause: error });
    }
  }

  close(): void {
    this.db.close();
  }

  listAll(): Note[] {
    return this.run('list notes', () =>
      this.db
        .prepare(`SELECT ${NOTE_COLUMNS} FROM notes ORDER BY updated_at DESC, id DESC`)
        .all()
        .map(rowToNote)
    );
  }

  get(id: number): Note | null {
    return this.run(`load note ${id}`, () => {
      const row = this.db.prepare(`SELECT ${NOTE_COLUMNS} FROM notes WHERE id = ?`).get(id);
      return row === undefined ? null : rowToNote(row);
    });
  }

  create(draft: NoteDraft): number {
    const note = normalizeDraft(draft);
    const timestamp = this.now().toISOString();
    return this.run('create note', () => {
      const result = this.db
        .prepare(
          `INSERT INTO notes (title, content, tags, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(note.title, note.body, JSON.stringify(note.tags), timestamp, timestamp);
      return Number(result.lastInsertRowid);
    });
  }

  update(id: number, draft: NoteDraft): void {
    const note = normalizeDraft(draft);
    this.run(`update note ${id}`, () => {
      const existing = this.get(id);
      if (!existing) {
        throw new StorageError(`Note with ID ${id} not found`);
      }
      const now = this.now().toISOString();
      const updatedAt = now < existing.createdAt ? existing.createdAt : now;
      this.db
        .prepare('UPDATE notes SET title = ?, content = ?, tags = ?, updated_at = ? WHERE id = ?')
        .run(note.title, note.body, JSON.stringify(note.tags), updatedAt, id);
    });
  }

  delete(id: number): void {
    this.run(`delete note ${id}`, () => {
      const result = this.db.prepare('DELETE FROM notes WHERE id = ?').run(id);
      if (result.changes === 0) {
        throw new StorageError(`Note with ID ${id} not found`);
      }
    });
  }

  deleteMany(ids: readonly number[]): number {
    return this.run(`delete ${ids.length} notes`, () => {
      const remove = this.db.prepare('DELETE FROM notes WHERE id = ?');
      const removeAll = this.db.transaction((batch: readonly number[]) => {
        let removed = 0;
        for (const id of batch) {
          removed += remove.run(id).changes;
        }
        return removed;
      });
      return removeAll(ids);
    });
  }

  search(text: string): Note[] {
    const pattern = `%${escapeLike(text.trim())}%`;
    return this.run('search notes', () =>
      this.db
        .prepare(
          `SELECT ${NOTE_COLUMNS}
           FROM notes
           WHERE title LIKE ? ESCAPE '\\' OR content LIKE ? ESCAPE '\\' OR tags LIKE ? ESCAPE '\\'
           ORDER BY updated_at DESC, id DESC`
        )
        .all(pattern, pattern, pattern)
        .map(rowToNote)
    );
  }

  tagCounts(): TagCount[] {
    const counts = new Map<string, number>();
    for (const note of this.listAll()) {
      for (const tag of note.tags) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .map(([tag, count]) => ({ tag, count }))
      .sort((a, b) => b.count - a.count || a.tag.localeCompare(b.tag));
  }

  stats(): StoreStats {
    const notes = this.listAll();
    const tags = new Set(notes.flatMap((note) => note.tags));
    const created = notes.map((note) => note.createdAt).sort();
    return {
      notes: notes.length,
      tags: tags.size,
      oldest: created[0] ?? null,
      newest: created[created.length - 1] ?? null,
    };
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to ${action}: ${reason}`, { cause: error });
    }
  }

  private applyPragmas(dbPath: string, settings: Partial<DatabaseSettings>): void {
    if ((settings.walMode ?? true) && dbPath !== MEMORY_DATABASE) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`cache_size = ${settings.cacheSizeKb ?? -64000}`);
    this.db.pragma(`synchronous = ${settings.synchronous ?? 'NORMAL'}`);
    this.db.pragma(`temp_store = ${settings.tempStore ?? 'MEMORY'}`);
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL
      );
    `);
  }

  private getSchemaVersion(): number {
    const row: unknown = this.db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get();
    if (row && typeof row === 'object' && 'version' in row && typeof row.version === 'number') {
      return row.version;
    }
    return 0;
  }

  private initialize(): void {
    this.ensureMigrationsTable();
    const currentVersion = this.getSchemaVersion();
    const pending = MIGRATIONS.filter((migration) => migration.version > currentVersion).sort(
      (a, b) => a.version - b.version
    );
    const apply = this.db.transaction((migration: (typeof MIGRATIONS)[number]) => {
      migration.up(this.db);
      this.db
        .prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)')
        .run(migration.version, new Date().toISOString());
    });
    for (const migration of pending) {
      apply(migration);
    }
  }
}
