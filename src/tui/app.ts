import type { Config } from '../config/loader.js';
import type { NoteExporter } from '../notes/export.js';
import type { Note, NoteDraft } from '../schema/index.js';
import type { NoteStorage } from '../storage/types.js';
import type { EditFlowResult } from './edit-flow.js';
import { SEARCH_KEYMAP, buildListKeymap, type ListAction, type SearchAction } from './keymap.js';
import { isPrintableKey, keyText } from './key-utils.js';
import { clampCursor, fitListScroll, moveCursor, scrollPreview } from './navigation.js';
import type { AppView, Screen } from './render.js';
import { SearchState } from './search.js';
import { SelectionState } from './selection.js';
import { DEFAULT_SORT_MODE, nextSortMode, sortLabel, sortNotes, type SortMode } from './sorting.js';
import { StatusLine } from './status.js';

export type KeyOutcome = 'continue' | 'quit';

export interface NoteEditor {
  openForNew(): EditFlowResult;
  openForEdit(note: NoteDraft): EditFlowResult;
}

export interface NotesAppOptions {
  storage: NoteStorage;
  config: Pick<Config, 'ui' | 'keybindings'>;
  editor: NoteEditor;
  exporter: NoteExporter;
}

/**
 * The interactive application: owns the displayed list and every piece of UI
 * state, and turns one key name at a time into state changes. Storage errors
 * are not caught here; they end the session.
 */
export class NotesApp implements AppView {
  readonly search = new SearchState();
  readonly selection = new SelectionState();

  private currentScreen: Screen = 'list';
  private displayed: Note[] = [];
  private matchIndices: number[][] = [];
  private hovered: number | null = null;
  private listOffset = 0;
  private previewOffset = 0;
  private sort: SortMode = DEFAULT_SORT_MODE;
  private expandedHelp = false;
  private redrawAll = true;

  private readonly status: StatusLine;
  private readonly listKeymap: ReadonlyMap<string, ListAction>;

  constructor(private readonly options: NotesAppOptions) {
    this.status = new StatusLine(options.config.ui.messageTtl);
    this.listKeymap = buildListKeymap(options.config.keybindings);
    this.refresh();
  }

  get screen(): Screen {
    return this.currentScreen;
  }

  get notes(): readonly Note[] {
    return this.displayed;
  }

  get matches(): readonly (readonly number[])[] {
    return this.matchIndices;
  }

  get cursor(): number | null {
    return this.hovered;
  }

  get listScroll(): number {
    return this.listOffset;
  }

  get previewScroll(): number {
    return this.previewOffset;
  }

  get sortMode(): SortMode {
    return this.sort;
  }

  get helpExpanded(): boolean {
    return this.expandedHelp;
  }

  get statusMessage(): string | null {
    return this.status.message;
  }

  get query(): string {
    return this.search.query;
  }

  get searchInput(): string {
    return this.search.input;
  }

  get selectedCount(): number {
    return this.selection.size;
  }

  get hoveredNote(): Note | null {
    return this.hovered === null ? null : (this.displayed[this.hovered] ?? null);
  }

  isSelected(id: number): boolean {
    return this.selection.has(id);
  }

  /** True once after anything that left the screen dirty (startup, editor runs). */
  consumeRedraw(): boolean {
    const value = this.redrawAll;
    this.redrawAll = false;
    return value;
  }

  /** Keeps the cursor inside a list viewport of `rows` lines. */
  fitViewport(rows: number): void {
    this.listOffset = fitListScroll(this.listOffset, this.hovered, rows);
  }

  /**
   * Reloads every note from storage and rebuilds the displayed list, either
   * fuzzy-filtered or sorted. Selections of deleted notes are dropped.
   */
  refresh(options: { focusId?: number } = {}): void {
    const corpus = this.options.storage.listAll();
    this.selection.retain(new Set(corpus.map((note) => note.id)));

    if (this.search.isActive()) {
      const result = this.search.filter(corpus);
      this.displayed = result.notes;
      this.matchIndices = result.matches;
    } else {
      this.displayed = sortNotes(corpus, this.sort);
      this.matchIndices = [];
    }

    let cursor = clampCursor(this.hovered, this.displayed.length);
    if (options.focusId !== undefined) {
      const focused = this.displayed.findIndex((note) => note.id === options.focusId);
      if (focused >= 0) cursor = focused;
    }
    this.hovered = cursor;
    this.previewOffset = 0;
  }

  handleKey(name: string): KeyOutcome {
    this.status.tick();
    return this.currentScreen === 'search' ? this.handleSearchKey(name) : this.handleListKey(name);
  }

  private handleListKey(name: string): KeyOutcome {
    const action = this.listKeymap.get(name);
    if (!action) return 'continue';
    return this.runListAction(action);
  }

  private runListAction(action: ListAction): KeyOutcome {
    switch (action) {
      case 'quit':
        return 'quit';
      case 'newNote':
        this.createNote();
        break;
      case 'edit':
        this.editHovered();
        break;
      case 'delete':
        this.deleteHovered();
        break;
      case 'export':
        this.exportHovered();
        break;
      case 'sort':
        this.sort = nextSortMode(this.sort);
        this.refresh();
        this.status.set(`Sort: ${sortLabel(this.sort)}`);
        break;
      case 'search':
        this.search.begin();
        this.currentScreen = 'search';
        break;
      case 'gotoTop':
        this.jumpTo(0);
        break;
      case 'gotoBottom':
        this.jumpTo(this.displayed.length - 1);
        break;
      case 'moveDown':
        this.navigate(true);
        break;
      case 'moveUp':
        this.navigate(false);
        break;
      case 'toggleHelp':
        this.expandedHelp = !this.expandedHelp;
        break;
      case 'toggleSelect':
        this.toggleHovered();
        break;
      case 'selectAll':
        this.status.set(`Selected ${this.selection.selectAll(this.displayed)} notes`);
        break;
      case 'clearSelection': {
        const cleared = this.selection.clear();
        if (cleared > 0) this.status.set(`Cleared ${cleared} selections`);
        break;
      }
      case 'batchDelete':
        this.batchDelete();
        break;
      case 'batchExport':
        this.batchExport();
        break;
      case 'scrollDown':
        this.scroll(true);
        break;
      case 'scrollUp':
        this.scroll(false);
        break;
      case 'clearFilters':
        this.clearFilters();
        break;
    }
    return 'continue';
  }

  private handleSearchKey(name: string): KeyOutcome {
    const action: SearchAction | undefined = SEARCH_KEYMAP.get(name);
    switch (action) {
      case 'quit':
        return 'quit';
      case 'cancel':
        this.search.cancel();
        this.currentScreen = 'list';
        this.refresh();
        break;
      case 'accept':
        this.search.accept();
        this.currentScreen = 'list';
        if (this.search.isActive()) {
          this.status.set(`Found ${this.displayed.length} notes`);
        }
        break;
      case 'backspace':
        this.search.pop();
        this.refresh();
        break;
      case 'moveDown':
        this.navigate(true);
        break;
      case 'moveUp':
        this.navigate(false);
        break;
      case undefined:
        if (isPrintableKey(name)) {
          this.search.push(keyText(name));
          this.refresh();
        }
        break;
    }
    return 'continue';
  }

  private navigate(down: boolean): void {
    this.hovered = moveCursor(this.hovered, this.displayed.length, down);
    this.previewOffset = 0;
  }

  private jumpTo(index: number): void {
    this.hovered = clampCursor(index, this.displayed.length);
    this.previewOffset = 0;
  }

  private scroll(down: boolean): void {
    const note = this.hoveredNote;
    if (!note) return;
    this.previewOffset = scrollPreview(this.previewOffset, note, this.options.config.ui, down);
  }

  private toggleHovered(): void {
    const note = this.hoveredNote;
    if (!note) return;
    this.selection.toggle(note.id);
    this.navigate(true);
  }

  private createNote(): void {
    const result = this.options.editor.openForNew();
    this.redrawAll = true;
    if (!result.ok) {
      this.status.set('Cancelled');
      return;
    }
    const id = this.options.storage.create(result.draft);
    this.refresh({ focusId: id });
    this.status.set('Note created');
  }

  private editHovered(): void {
    const note = this.hoveredNote;
    if (!note) return;
    const result = this.options.editor.openForEdit(note);
    this.redrawAll = true;
    if (!result.ok) {
      this.status.set('Cancelled');
      return;
    }
    this.options.storage.update(note.id, result.draft);
    this.refresh({ focusId: note.id });
    this.status.set('Note saved');
  }

  private deleteHovered(): void {
    const note = this.hoveredNote;
    if (!note) return;
    this.options.storage.delete(note.id);
    this.refresh();
    this.status.set(`Deleted '${note.title}'`);
  }

  private exportHovered(): void {
    const note = this.hoveredNote;
    if (!note) return;
    try {
      const file = this.options.exporter.exportNote(note);
      this.status.set(`Exported to ${file}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.status.set(`Export failed: ${reason}`);
    }
  }

  private batchDelete(): void {
    if (this.selection.size === 0) {
      this.status.set('No notes selected');
      return;
    }
    const removed = this.selection.deleteAll(this.options.storage);
    this.refresh();
    this.status.set(`Deleted ${removed} notes`);
  }

  private batchExport(): void {
    if (this.selection.size === 0) {
      this.status.set('No notes selected');
      return;
    }
    const { succeeded, failed } = this.selection.exportAll(this.displayed, this.options.exporter);
    this.status.set(
      failed > 0 ? `Exported ${succeeded} notes (${failed} failed)` : `Exported ${succeeded} notes`
    );
  }

  private clearFilters(): void {
    const hadSearch = this.search.isActive();
    const hadSelection = this.selection.size > 0;
    if (hadSearch) {
      this.search.clear();
      this.refresh();
    }
    if (hadSelection) {
      this.selection.clear();
    }
    if (hadSearch && hadSelection) this.status.set('Cleared search and selections');
    else if (hadSearch) this.status.set('Search cleared');
    else if (hadSelection) this.status.set('Selections cleared');
  }
}
