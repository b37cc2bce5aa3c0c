import type { Frame, TextStyle } from './frame.js';
import type { TerminalSurface } from './terminal-session.js';

function applyStyle(term: TerminalSurface, style: TextStyle | undefined): void {
  term.styleReset();
  if (!style) return;
  if (style.color) term.colorRgbHex(style.color);
  if (style.bold) term.bold();
  if (style.dim || style.strikethrough) term.dim();
  if (style.italic) term.italic();
  if (style.underline) term.underline();
}

/** Writes a frame row by row; `clear` wipes the screen first. */
export function paintFrame(term: TerminalSurface, frame: Frame, options: { clear?: boolean } = {}): void {
  term.hideCursor(true);
  if (options.clear) {
    term.clear();
  }
  frame.lines.forEach((line, row) => {
    term.moveTo(1, row + 1);
    for (const segment of line) {
      applyStyle(term, segment.style);
      term.noFormat(segment.text);
    }
    term.styleReset();
    term.eraseLineAfter();
  });
  for (let row = frame.lines.length; row < frame.height; row += 1) {
    term.moveTo(1, row + 1);
    term.eraseLineAfter();
  }
}
