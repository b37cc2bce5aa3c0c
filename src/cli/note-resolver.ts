import type { Note } from '../schema/index.js';
import type { NoteStorage } from '../storage/types.js';
import { AmbiguousNoteError, NoteNotFoundError } from './errors.js';

/**
 * Finds a note by numeric id, or by a case-insensitive title fragment that
 * matches exactly one note.
 */
export function resolveNote(store: Pick<NoteStorage, 'get' | 'listAll'>, reference: string): Note {
  const trimmed = reference.trim();
  if (/^\d+$/.test(trimmed)) {
    const id = Number(trimmed);
    const note = store.get(id);
    if (!note) {
      throw new NoteNotFoundError(`Note with ID ${id} not found`);
    }
    return note;
  }

  const needle = trimmed.toLowerCase();
  const matches = store.listAll().filter((note) => note.title.toLowerCase().includes(needle));
  const [first, ...rest] = matches;
  if (!first) {
    throw new NoteNotFoundError(`No notes found matching '${trimmed}'`);
  }
  if (rest.length > 0) {
    throw new AmbiguousNoteError(trimmed, matches);
  }
  return first;
}
