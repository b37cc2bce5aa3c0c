import type { Config, Theme } from '../config/loader.js';
import type { Note } from '../schema/index.js';
import { formatDateTime, formatShortDate } from '../utils/date.js';
import {
  displayWidth,
  ellipsize,
  fitLine,
  truncateByWidth,
  wrapChunks,
  wrapLine,
  type Frame,
  type Segment,
  type StyledLine,
  type TextStyle,
} from './frame.js';
import { SEARCH_HELP, listHelpChunks } from './keymap.js';
import { HELP_MAX_LINES, HORIZONTAL_PADDING, computeLayout, type ScreenLayout } from './layout.js';
import { renderMarkdown } from './markdown.js';
import { sortLabel, type SortMode } from './sorting.js';

export type Screen = 'list' | 'search';

/** Everything the renderer reads from the application state. */
export interface AppView {
  readonly screen: Screen;
  readonly notes: readonly Note[];
  /** Match offsets aligned with `notes`; empty when no search is active. */
  readonly matches: readonly (readonly number[])[];
  readonly cursor: number | null;
  readonly listScroll: number;
  readonly previewScroll: number;
  readonly sortMode: SortMode;
  readonly helpExpanded: boolean;
  readonly statusMessage: string | null;
  readonly query: string;
  readonly searchInput: string;
  readonly selectedCount: number;
  isSelected(id: number): boolean;
}

export type RenderSettings = Pick<Config, 'ui' | 'keybindings' | 'theme'>;

export interface ScreenSize {
  width: number;
  height: number;
}

const INDICATOR = '▎ ';
const INDICATOR_WIDTH = 2;
const CONTENT_PADDING = '  ';

export function displayTitle(title: string): { text: string; offset: number } {
  const prefix = /^[#\s]*/.exec(title)?.[0] ?? '';
  return { text: title.slice(prefix.length), offset: Array.from(prefix).length };
}

function collapseHelp(chunks: readonly string[], width: number, helpKey: string): string {
  const full = chunks.join('  ');
  if (displayWidth(full) <= width) return full;
  const more = ` ${helpKey} more`;
  const first = wrapChunks(chunks, width - displayWidth(more))[0] ?? '';
  return truncateByWidth(`${first}${more}`, width);
}

export function footerLines(view: AppView, settings: RenderSettings, width: number): string[] {
  if (view.screen === 'search') {
    return [SEARCH_HELP];
  }
  const chunks = listHelpChunks(settings.keybindings, view.selectedCount);
  if (view.helpExpanded) {
    const lines = wrapChunks(chunks, width).slice(0, HELP_MAX_LINES);
    return lines.length > 0 ? lines : [''];
  }
  return [collapseHelp(chunks, width, settings.keybindings.toggleHelp)];
}

export function layoutFor(view: AppView, settings: RenderSettings, size: ScreenSize): ScreenLayout {
  const innerWidth = Math.max(0, size.width - HORIZONTAL_PADDING * 2);
  return computeLayout({
    width: size.width,
    height: size.height,
    splitRatio: settings.ui.splitRatio,
    hasStatus: view.statusMessage !== null,
    helpLines: footerLines(view, settings, innerWidth).length,
  });
}

function borderLine(
  left: string,
  right: string,
  label: Segment | null,
  width: number,
  border: TextStyle
): StyledLine {
  const inner = width - 2;
  const line: StyledLine = [{ text: left, style: border }];
  let used = 0;
  if (label && inner >= 3) {
    line.push({ text: '─', style: border });
    const text = truncateByWidth(label.text, inner - 1);
    line.push({ ...label, text });
    used = 1 + displayWidth(text);
  }
  line.push({ text: '─'.repeat(Math.max(0, inner - used)), style: border });
  line.push({ text: right, style: border });
  return line;
}

function renderPane(options: {
  width: number;
  height: number;
  title: Segment;
  caption: string;
  body: readonly StyledLine[];
  theme: Theme;
}): StyledLine[] {
  const { width, height, body } = options;
  if (height <= 0) return [];
  if (width < 2) {
    return Array.from({ length: height }, () => fitLine([], width));
  }
  const border: TextStyle = { color: options.theme.metadata };
  const caption: Segment | null = options.caption
    ? { text: ` ${options.caption} `, style: { color: options.theme.metadata } }
    : null;
  const rows: StyledLine[] = [borderLine('╭', '╮', options.title, width, border)];
  for (let row = 0; row < height - 2; row += 1) {
    rows.push([
      { text: '│', style: border },
      ...fitLine(body[row] ?? [], width - 2),
      { text: '│', style: border },
    ]);
  }
  if (height > 1) {
    rows.push(borderLine('╰', '╯', caption, width, border));
  }
  return rows;
}

function highlightTitle(
  chars: readonly string[],
  visibleChars: number,
  highlights: ReadonlySet<number>,
  base: TextStyle,
  highlight: TextStyle
): Segment[] {
  const segments: Segment[] = [];
  let text = '';
  let highlighted = false;
  chars.forEach((char, index) => {
    const isHit = index < visibleChars && highlights.has(index);
    if (text && isHit !== highlighted) {
      segments.push({ text, style: highlighted ? highlight : base });
      text = '';
    }
    highlighted = isHit;
    text += char;
  });
  if (text) segments.push({ text, style: highlighted ? highlight : base });
  return segments;
}

function titleHighlights(indices: readonly number[] | undefined, title: string, offset: number): Set<number> {
  const titleLength = Array.from(title).length;
  return new Set(
    (indices ?? []).filter((index) => index >= offset && index < titleLength).map((index) => index - offset)
  );
}

export function renderListRow(
  view: AppView,
  index: number,
  theme: Theme,
  width: number
): StyledLine {
  const note = view.notes[index];
  if (!note) return [];
  const hovered = index === view.cursor;
  const selected = view.isSelected(note.id);

  let indicator: Segment = { text: '  ' };
  if (hovered && selected) indicator = { text: INDICATOR, style: { color: theme.activeIndicator } };
  else if (hovered) indicator = { text: INDICATOR, style: { color: theme.hoverIndicator } };
  else if (selected) indicator = { text: INDICATOR, style: { color: theme.selectionIndicator } };

  const date = formatShortDate(note.updatedAt);
  const dateWidth = displayWidth(date);
  const budget = Math.max(0, width - INDICATOR_WIDTH - dateWidth - 1);
  const { text: title, offset } = displayTitle(note.title);
  const shown = ellipsize(title, budget);
  const chars = Array.from(shown);
  const visibleChars = shown === title ? chars.length : chars.length - 1;

  const base: TextStyle = {
    color: hovered || selected ? theme.text : theme.unselectedText,
    bold: hovered,
  };
  const titleSegments = highlightTitle(
    chars,
    visibleChars,
    titleHighlights(view.matches[index], note.title, offset),
    base,
    { color: theme.searchHighlight, bold: true }
  );
  const padding = Math.max(1, width - INDICATOR_WIDTH - displayWidth(shown) - dateWidth);

  return [
    indicator,
    ...titleSegments,
    { text: ' '.repeat(padding) },
    { text: date, style: { color: theme.metadata } },
  ];
}

export function listTitle(view: AppView): string {
  if (view.screen === 'search') return `Search: ${view.searchInput}_`;
  if (view.query) return `Notes (search: ${view.query})`;
  return 'Notes';
}

export function listCaption(view: AppView): string {
  const count = view.notes.length;
  if (view.selectedCount > 0) return `${count} notes • ${view.selectedCount} selected`;
  if (view.query) return `${count} matches`;
  return `${count} notes • ${sortLabel(view.sortMode)}`;
}

function renderListPane(view: AppView, settings: RenderSettings, width: number, height: number): StyledLine[] {
  const { theme } = settings;
  const rows = Math.max(0, height - 2);
  const body: StyledLine[] = [];
  for (let row = 0; row < rows; row += 1) {
    const index = view.listScroll + row;
    if (index >= view.notes.length) break;
    body.push(renderListRow(view, index, theme, width - 2));
  }
  const titleStyle: TextStyle =
    view.screen === 'search'
      ? { color: theme.hoverIndicator, bold: true }
      : { color: theme.text, bold: true };
  return renderPane({
    width,
    height,
    title: { text: ` ${listTitle(view)} `, style: titleStyle },
    caption: listCaption(view),
    body,
    theme,
  });
}

export function metadataLine(note: Note): string {
  const date = formatDateTime(note.updatedAt);
  return note.tags.length > 0 ? `${note.tags.join(', ')} • ${date}` : date;
}

export function previewContent(note: Note, theme: Theme): StyledLine[] {
  const lines: StyledLine[] = [
    [{ text: displayTitle(note.title).text, style: { color: theme.hoverIndicator, bold: true } }],
    [{ text: metadataLine(note), style: { color: theme.metadata } }],
    [],
    ...renderMarkdown(note.body, theme),
  ];
  return lines.map((line) => [{ text: CONTENT_PADDING }, ...line]);
}

function renderPreviewPane(view: AppView, settings: RenderSettings, width: number, height: number): StyledLine[] {
  const { theme } = settings;
  const note = view.cursor === null ? undefined : view.notes[view.cursor];
  if (!note || view.cursor === null) {
    return renderPane({
      width,
      height,
      title: { text: ' Preview ', style: { color: theme.text, bold: true } },
      caption: '',
      body: [[{ text: `${CONTENT_PADDING}No note selected`, style: { color: theme.metadata } }]],
      theme,
    });
  }

  const rows = Math.max(0, height - 2);
  const wrapped = previewContent(note, theme).flatMap((line) => wrapLine(line, width - 2));
  const maxScroll = Math.max(0, wrapped.length - rows);
  const scroll = view.previewScroll;
  let title = 'Preview';
  if (scroll > 0) {
    const percent = maxScroll > 0 ? Math.min(100, Math.round((scroll * 100) / maxScroll)) : 100;
    title = `Preview ↓${percent}%`;
  }

  return renderPane({
    width,
    height,
    title: { text: ` ${title} `, style: { color: theme.text, bold: true } },
    caption: `${view.cursor + 1}/${view.notes.length}`,
    body: wrapped.slice(scroll, scroll + rows),
    theme,
  });
}

/** Builds the whole screen as styled rows; painting is left to the caller. */
export function renderFrame(view: AppView, settings: RenderSettings, size: ScreenSize): Frame {
  const { theme } = settings;
  const layout = layoutFor(view, settings, size);
  const list = renderListPane(view, settings, layout.listWidth, layout.mainHeight);
  const preview = renderPreviewPane(view, settings, layout.previewWidth, layout.mainHeight);
  const pad: Segment = { text: ' '.repeat(HORIZONTAL_PADDING) };
  const lines: StyledLine[] = [];

  for (let row = 0; row < layout.mainHeight; row += 1) {
    lines.push(fitLine([pad, ...(list[row] ?? []), ...(preview[row] ?? []), pad], size.width));
  }

  if (view.statusMessage !== null) {
    lines.push(
      fitLine([pad, { text: view.statusMessage, style: { color: theme.status, bold: true } }], size.width)
    );
  }

  for (const help of footerLines(view, settings, layout.innerWidth)) {
    const indent = Math.max(0, Math.floor((layout.innerWidth - displayWidth(help)) / 2));
    lines.push(
      fitLine(
        [{ text: ' '.repeat(HORIZONTAL_PADDING + indent) }, { text: help, style: { color: theme.metadata } }],
        size.width
      )
    );
  }

  return { width: size.width, height: size.height, lines: lines.slice(0, size.height) };
}
