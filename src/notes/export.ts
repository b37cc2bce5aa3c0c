import fs from 'node:fs';
import path from 'node:path';
import type { Note } from '../schema/index.js';
import { exportFilename, serializeNote } from './note-format.js';

export interface NoteExporter {
  /** Writes one note and returns the path written. Throws on failure. */
  exportNote(note: Note): string;
}

export function writeNoteFile(directory: string, note: Note, filename?: string): string {
  const target = path.join(directory, filename ?? exportFilename(note.title));
  fs.writeFileSync(target, serializeNote(note) + '\n', 'utf-8');
  return target;
}

export function createFileExporter(directory: string): NoteExporter {
  return {
    exportNote: (note) => writeNoteFile(directory, note),
  };
}
