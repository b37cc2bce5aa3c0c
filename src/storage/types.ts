import type { Note, NoteDraft } from '../schema/index.js';

/**
 * Record-oriented access to persisted notes. `listAll` returns notes with the
 * most recently updated first.
 */
export interface NoteStorage {
  listAll(): Note[];
  get(id: number): Note | null;
  create(draft: NoteDraft): number;
  update(id: number, draft: NoteDraft): void;
  delete(id: number): void;
  /** Deletes every id atomically and returns how many rows were removed. */
  deleteMany(ids: readonly number[]): number;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface StoreStats {
  notes: number;
  tags: number;
  oldest: string | null;
  newest: string | null;
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}
