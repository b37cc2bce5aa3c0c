import type { NoteDraft } from '../schema/index.js';
import { normalizeTags } from './tags.js';

export const TAG_MARKER = '@';
const FALLBACK_TITLE = 'Untitled';

/**
 * Plain-text form used for editor temp files, exports and imports:
 *
 *     <title>
 *     @tag1 @tag2      (only when there are tags)
 *
 *     <body>           (only when the body is not empty)
 */
export function serializeNote(note: NoteDraft): string {
  let text = note.title;
  if (note.tags.length > 0) {
    text += '\n' + note.tags.map((tag) => `${TAG_MARKER}${tag}`).join(' ');
  }
  if (note.body.length > 0) {
    text += '\n\n' + note.body;
  }
  return text;
}

function isTagLine(line: string): boolean {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  return (
    tokens.length > 0 &&
    tokens.every((token) => token.startsWith(TAG_MARKER) && token.length > TAG_MARKER.length)
  );
}

function fallbackTitle(body: string): string {
  const firstLine = body.split('\n')[0] ?? '';
  const word = firstLine.replace(/^#+/, '').trim().split(/\s+/)[0];
  return word || FALLBACK_TITLE;
}

/**
 * Parses the plain-text note form. Returns null when the text holds nothing
 * usable: it is blank, or it has neither a title nor a body.
 */
export function parseNoteText(raw: string): NoteDraft | null {
  if (raw.trim() === '') {
    return null;
  }

  const lines = raw.replace(/\r\n?/g, '\n').split('\n');
  let title = (lines[0] ?? '').trim();
  let rest = lines.slice(1);

  let tags: string[] = [];
  const second = rest[0];
  if (second !== undefined && isTagLine(second)) {
    tags = normalizeTags(second.trim().split(/\s+/));
    rest = rest.slice(1);
  }

  const body = rest.join('\n').trim();

  if (!title) {
    if (!body) {
      return null;
    }
    title = fallbackTitle(body);
  }

  return { title, body, tags };
}

export function sanitizeFilename(title: string): string {
  const cleaned = title
    .trim()
    .replace(/[/\\]/g, '-')
    .replace(/\s+/g, '_')
    .replace(/[<>:"|?*\u0000-\u001f]/g, '');
  return cleaned || FALLBACK_TITLE;
}

export function exportFilename(title: string): string {
  return `${sanitizeFilename(title)}.md`;
}
