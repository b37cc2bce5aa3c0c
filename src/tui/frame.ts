import terminalKit from 'terminal-kit';

export interface TextStyle {
  /** `#rrggbb` */
  color?: string;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
}

export interface Segment {
  text: string;
  style?: TextStyle;
}

export type StyledLine = Segment[];

export interface Frame {
  width: number;
  height: number;
  lines: StyledLine[];
}

export function displayWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (displayWidth(text) <= maxWidth) return text;
  return terminalKit.truncateString(text, maxWidth);
}

/** Truncates with a trailing `…` when the text does not fit. */
export function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (displayWidth(text) <= maxWidth) return text;
  return truncateByWidth(text, maxWidth - 1) + '…';
}

export function lineText(line: StyledLine): string {
  return line.map((segment) => segment.text).join('');
}

export function lineWidth(line: StyledLine): number {
  return line.reduce((sum, segment) => sum + displayWidth(segment.text), 0);
}

/** Cuts or space-pads a line to exactly `width` columns. */
export function fitLine(line: StyledLine, width: number): StyledLine {
  const result: StyledLine = [];
  let remaining = Math.max(0, width);
  for (const segment of line) {
    if (remaining <= 0) break;
    if (!segment.text) continue;
    const segmentWidth = displayWidth(segment.text);
    if (segmentWidth <= remaining) {
      result.push(segment);
      remaining -= segmentWidth;
      continue;
    }
    const text = truncateByWidth(segment.text, remaining);
    result.push({ ...segment, text });
    remaining -= displayWidth(text);
    break;
  }
  if (remaining > 0) {
    result.push({ text: ' '.repeat(remaining) });
  }
  return result;
}

/**
 * Breaks a line into rows of at most `width` columns. Characters are kept as
 * they are, leading spaces included.
 */
export function wrapLine(line: StyledLine, width: number): StyledLine[] {
  if (width <= 0) return [line];
  const rows: StyledLine[] = [];
  let row: StyledLine = [];
  let used = 0;

  for (const segment of line) {
    let chunk = '';
    for (const char of segment.text) {
      const charWidth = displayWidth(char);
      if (used + charWidth > width && used > 0) {
        if (chunk) row.push({ ...segment, text: chunk });
        rows.push(row);
        row = [];
        chunk = '';
        used = 0;
      }
      chunk += char;
      used += charWidth;
    }
    if (chunk) row.push({ ...segment, text: chunk });
  }
  rows.push(row);
  return rows;
}

/** Greedy wrap of whole chunks joined by `separator`. */
export function wrapChunks(chunks: readonly string[], width: number, separator = '  '): string[] {
  const lines: string[] = [];
  let current = '';
  for (const chunk of chunks) {
    const candidate = current ? `${current}${separator}${chunk}` : chunk;
    if (current && displayWidth(candidate) > width) {
      lines.push(current);
      current = chunk;
      continue;
    }
    current = candidate;
  }
  if (current) lines.push(current);
  return lines;
}
