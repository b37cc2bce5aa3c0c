import terminalKit from 'terminal-kit';
import type { Config } from '../config/loader.js';
import { createFileExporter, type NoteExporter } from '../notes/export.js';
import type { NoteStorage } from '../storage/types.js';
import { NotesApp } from './app.js';
import { EditorBridge, type EditorRunner } from './edit-flow.js';
import { paintFrame } from './paint.js';
import { layoutFor, renderFrame } from './render.js';
import { TerminalSession, type TerminalSurface } from './terminal-session.js';

export interface TuiOptions {
  storage: NoteStorage;
  config: Config;
  /** Defaults to the terminal-kit terminal on stdout. */
  term?: TerminalSurface;
  exporter?: NoteExporter;
  runEditor?: EditorRunner;
}

/**
 * Runs the full-screen UI until the user quits. Resolves on quit; rejects
 * with the first storage error. The terminal is restored either way.
 */
export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term: TerminalSurface = options.term ?? terminalKit.terminal;
  const { config } = options;
  const session = new TerminalSession(term);

  const editor = new EditorBridge({
    settings: config.editor,
    suspend: (fn) => session.suspend(fn),
    runEditor: options.runEditor,
  });
  const app = new NotesApp({
    storage: options.storage,
    config,
    editor,
    exporter: options.exporter ?? createFileExporter(config.export.directory),
  });

  let resolveExit: () => void = () => undefined;
  let rejectExit: (error: unknown) => void = () => undefined;
  const exitPromise = new Promise<void>((resolve, reject) => {
    resolveExit = resolve;
    rejectExit = reject;
  });

  const render = (forceClear = false): void => {
    const size = { width: term.width, height: term.height };
    app.fitViewport(layoutFor(app, config, size).listRows);
    const clear = app.consumeRedraw() || forceClear;
    paintFrame(term, renderFrame(app, config, size), { clear });
  };

  const onKey = (name: string): void => {
    try {
      if (app.handleKey(name) === 'quit') {
        resolveExit();
        return;
      }
      render();
    } catch (error) {
      rejectExit(error);
    }
  };

  const onResize = (): void => {
    render(true);
  };

  session.enter();
  term.on('key', onKey);
  process.stdout.on('resize', onResize);

  try {
    render(true);
    await exitPromise;
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    session.release();
    term.clear();
  }
}
