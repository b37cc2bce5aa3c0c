import type { Note } from '../schema/index.js';
import type { NoteExporter } from '../notes/export.js';
import type { NoteStorage } from '../storage/types.js';

export interface ExportSummary {
  succeeded: number;
  failed: number;
}

/** Note ids marked for batch actions. Independent of cursor and search. */
export class SelectionState {
  private readonly ids = new Set<number>();

  get size(): number {
    return this.ids.size;
  }

  has(id: number): boolean {
    return this.ids.has(id);
  }

  toggle(id: number): void {
    if (!this.ids.delete(id)) {
      this.ids.add(id);
    }
  }

  /** Adds every visible note; returns the new selection size. */
  selectAll(view: readonly Note[]): number {
    for (const note of view) {
      this.ids.add(note.id);
    }
    return this.ids.size;
  }

  clear(): number {
    const removed = this.ids.size;
    this.ids.clear();
    return removed;
  }

  /** Drops ids that no longer exist in storage. */
  retain(existing: ReadonlySet<number>): void {
    for (const id of this.ids) {
      if (!existing.has(id)) {
        this.ids.delete(id);
      }
    }
  }

  deleteAll(storage: NoteStorage): number {
    const removed = storage.deleteMany([...this.ids]);
    this.ids.clear();
    return removed;
  }

  /**
   * Writes every selected note that is in `view`. Each write is independent;
   * the selection is cleared whatever the outcome.
   */
  exportAll(view: readonly Note[], exporter: NoteExporter): ExportSummary {
    const summary: ExportSummary = { succeeded: 0, failed: 0 };
    for (const note of view) {
      if (!this.ids.has(note.id)) continue;
      try {
        exporter.exportNote(note);
        summary.succeeded += 1;
      } catch {
        summary.failed += 1;
      }
    }
    this.ids.clear();
    return summary;
  }
}
