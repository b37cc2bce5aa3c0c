export type KeyListener = (name: string) => void;

/**
 * The slice of a terminal-kit terminal the TUI draws with. Return values are
 * ignored, so the real chainable terminal satisfies it as is.
 */
export interface TerminalSurface {
  readonly width: number;
  readonly height: number;
  moveTo(x: number, y: number): unknown;
  eraseLineAfter(): unknown;
  clear(): unknown;
  styleReset(): unknown;
  hideCursor(hide?: boolean): unknown;
  colorRgbHex(color: string): unknown;
  bold(): unknown;
  dim(): unknown;
  italic(): unknown;
  underline(): unknown;
  inverse(): unknown;
  noFormat(text: string): unknown;
  fullscreen(enable: boolean): unknown;
  grabInput(options: false | { mouse?: 'button' | 'drag' | 'motion' }): unknown;
  on(event: 'key', listener: KeyListener): unknown;
  removeListener(event: 'key', listener: KeyListener): unknown;
}

/**
 * Exclusive terminal mode (alternate screen, raw input, hidden cursor) as a
 * scoped resource. `suspend` hands the terminal back for the duration of a
 * callback and always re-enters afterwards; `release` is idempotent.
 */
export class TerminalSession {
  private active = false;

  constructor(private readonly term: TerminalSurface) {}

  get isActive(): boolean {
    return this.active;
  }

  enter(): void {
    if (this.active) return;
    this.term.fullscreen(true);
    this.term.grabInput({});
    this.term.hideCursor(true);
    this.active = true;
  }

  release(): void {
    if (!this.active) return;
    this.active = false;
    this.term.grabInput(false);
    this.term.hideCursor(false);
    this.term.styleReset();
    this.term.fullscreen(false);
  }

  suspend<T>(fn: () => T): T {
    const wasActive = this.active;
    this.release();
    try {
      return fn();
    } finally {
      if (wasActive) {
        this.enter();
      }
    }
  }
}
