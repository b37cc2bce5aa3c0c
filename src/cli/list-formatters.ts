/**
 * Output formatters shared by list, search and show
 */

import type { Note } from '../schema/index.js';
import { formatDateTime, formatShortDate } from '../utils/date.js';
import { boldText, cyanText, dimText } from './terminal.js';

function formatTags(tags: readonly string[]): string {
  return tags.map((tag) => `@${tag}`).join(' ');
}

/** `<id>  <title>  @tags` on a single line. */
export function formatNoteOneline(note: Note): string {
  const idPart = cyanText(String(note.id).padStart(4));
  const tagPart = note.tags.length > 0 ? `  ${dimText(formatTags(note.tags))}` : '';
  return `${idPart}  ${note.title}${tagPart}`;
}

/** Two lines per note: id, title and date, then a body excerpt. */
export function formatNoteCompact(note: Note): string {
  const header = `${cyanText(String(note.id).padStart(4))}  ${boldText(note.title)}  ${dimText(
    formatShortDate(note.updatedAt)
  )}`;
  const excerpt = note.body.split('\n').find((line) => line.trim() !== '')?.trim();
  const details = [excerpt, note.tags.length > 0 ? formatTags(note.tags) : undefined].filter(
    (part): part is string => Boolean(part)
  );
  if (details.length === 0) {
    return header;
  }
  return `${header}\n      ${dimText(details.join('  '))}`;
}

export function formatNoteList(notes: readonly Note[], oneline: boolean): string {
  if (notes.length === 0) {
    return dimText('No notes found.');
  }
  const format = oneline ? formatNoteOneline : formatNoteCompact;
  return notes.map(format).join('\n');
}

export function formatNoteFull(note: Note): string {
  const lines = [
    boldText(note.title),
    dimText(`ID:      ${note.id}`),
    dimText(`Created: ${formatDateTime(note.createdAt)}`),
    dimText(`Updated: ${formatDateTime(note.updatedAt)}`),
  ];
  if (note.tags.length > 0) {
    lines.push(dimText(`Tags:    ${formatTags(note.tags)}`));
  }
  if (note.body.length > 0) {
    lines.push('', note.body);
  }
  return lines.join('\n');
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
