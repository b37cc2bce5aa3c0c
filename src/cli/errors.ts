import type { Note } from '../schema/index.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class FileNotFoundError extends Error {
  constructor(path: string) {
    super(`File not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class NoteNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoteNotFoundError';
  }
}

export class AmbiguousNoteError extends Error {
  constructor(
    query: string,
    public readonly candidates: readonly Note[]
  ) {
    super(
      [
        `Multiple notes match '${query}':`,
        ...candidates.map((note) => `  ${note.id}: ${note.title}`),
        'Use the note ID instead.',
      ].join('\n')
    );
    this.name = 'AmbiguousNoteError';
  }
}
