import type { UiSettings } from '../config/loader.js';
import type { Note } from '../schema/index.js';

export type PreviewMetrics = Pick<
  UiSettings,
  'headerLines' | 'maxMarkdownFormattingBuffer' | 'previewMaxScrollBuffer' | 'previewScrollStep'
>;

/** Keeps a cursor inside `[0, length)`; null for an empty list. */
export function clampCursor(cursor: number | null, length: number): number | null {
  if (length === 0) return null;
  return Math.min(Math.max(cursor ?? 0, 0), length - 1);
}

export function moveCursor(cursor: number | null, length: number, down: boolean): number | null {
  if (length === 0) return null;
  const current = cursor ?? 0;
  return down ? Math.min(current + 1, length - 1) : Math.max(current - 1, 0);
}

function countLines(text: string): number {
  if (text === '') return 0;
  const lines = text.split('\n');
  return text.endsWith('\n') ? lines.length - 1 : lines.length;
}

/** Rough rendered height of a preview: header, body lines, heading spacing. */
export function estimatePreviewHeight(note: Note, metrics: PreviewMetrics): number {
  const headings = note.body.split('#').length - 1;
  return (
    metrics.headerLines +
    countLines(note.body) +
    Math.min(headings, metrics.maxMarkdownFormattingBuffer)
  );
}

export function maxPreviewScroll(note: Note, metrics: PreviewMetrics): number {
  return Math.max(0, estimatePreviewHeight(note, metrics) - metrics.previewMaxScrollBuffer);
}

export function scrollPreview(
  scroll: number,
  note: Note,
  metrics: PreviewMetrics,
  down: boolean
): number {
  if (down) {
    return Math.min(scroll + metrics.previewScrollStep, maxPreviewScroll(note, metrics));
  }
  return Math.max(0, scroll - metrics.previewScrollStep);
}

/** First visible list row so that the cursor stays inside `rows` lines. */
export function fitListScroll(scroll: number, cursor: number | null, rows: number): number {
  if (cursor === null || rows <= 0) return 0;
  if (cursor < scroll) return cursor;
  if (cursor >= scroll + rows) return cursor - rows + 1;
  return scroll;
}
