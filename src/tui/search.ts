import { Fzf } from 'fzf';
import type { Note } from '../schema/index.js';

export interface SearchResult {
  notes: Note[];
  /** Match offsets per note, aligned with `notes`. */
  matches: number[][];
}

export function searchableText(note: Note): string {
  return `${note.title} ${note.body}`;
}

/**
 * Query state for the list. `query` is what filters the list; `input` is
 * the text being typed while the search prompt is open. Typing updates both,
 * and `cancel` puts back the query that was in effect when the prompt opened.
 */
export class SearchState {
  private finder: Fzf<readonly Note[]> | null = null;
  private indexed: readonly Note[] = [];
  private committed = '';
  private buffer = '';
  private snapshot = '';

  get query(): string {
    return this.committed;
  }

  get input(): string {
    return this.buffer;
  }

  isActive(): boolean {
    return this.committed.length > 0;
  }

  begin(): void {
    this.snapshot = this.committed;
    this.buffer = this.committed;
  }

  setQuery(query: string): void {
    this.committed = query;
    this.buffer = query;
  }

  push(char: string): void {
    this.setQuery(this.buffer + char);
  }

  pop(): void {
    const chars = Array.from(this.buffer);
    chars.pop();
    this.setQuery(chars.join(''));
  }

  accept(): void {
    this.snapshot = this.committed;
  }

  cancel(): void {
    this.committed = this.snapshot;
    this.buffer = '';
  }

  clear(): void {
    this.committed = '';
    this.buffer = '';
    this.snapshot = '';
  }

  /**
   * Scores every note against the query and keeps the matches, best first.
   * Equal scores keep corpus order. Matching ignores case unless the query
   * has a capital letter.
   */
  filter(corpus: readonly Note[]): SearchResult {
    if (!this.committed) {
      return { notes: [...corpus], matches: corpus.map(() => []) };
    }
    const entries = this.finderFor(corpus)
      .find(this.committed)
      .map((entry, order) => ({ entry, order }));
    entries.sort((a, b) => b.entry.score - a.entry.score || a.order - b.order);
    const current = new Map(corpus.map((note) => [note.id, note]));
    return {
      notes: entries.map(({ entry }) => current.get(entry.item.id) ?? entry.item),
      matches: entries.map(({ entry }) => [...entry.positions].sort((a, b) => a - b)),
    };
  }

  /** The matcher is rebuilt only when the indexed text has changed. */
  private finderFor(corpus: readonly Note[]): Fzf<readonly Note[]> {
    if (!this.finder || !sameNotes(this.indexed, corpus)) {
      this.finder = new Fzf(corpus, { selector: searchableText, casing: 'smart-case', sort: false });
      this.indexed = corpus;
    }
    return this.finder;
  }
}

function sameNotes(a: readonly Note[], b: readonly Note[]): boolean {
  return (
    a.length === b.length &&
    a.every((note, index) => {
      const other = b[index];
      return other !== undefined && note.id === other.id && searchableText(note) === searchableText(other);
    })
  );
}
