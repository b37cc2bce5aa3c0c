import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { spawnSync } from 'node:child_process';
import type { EditorSettings } from '../config/loader.js';
import type { NoteDraft } from '../schema/index.js';
import { parseNoteText, serializeNote } from '../notes/note-format.js';

export type EditFlowResult =
  | { ok: true; draft: NoteDraft }
  | { ok: false; canceled: true }
  | { ok: false; error: string };

export interface EditorExit {
  error?: Error;
  status: number | null;
  signal: NodeJS.Signals | null;
}

export type EditorRunner = (command: string, args: string[]) => EditorExit;

export type Suspend = <T>(fn: () => T) => T;

export interface EditorBridgeOptions {
  settings: EditorSettings;
  /** Gives the terminal to the editor for the duration of the callback. */
  suspend: Suspend;
  runEditor?: EditorRunner;
  env?: NodeJS.ProcessEnv;
  tempDir?: string;
}

const FALLBACK_EDITOR = 'vi';
const SHARED_TEMP_FILE = 'jotter-edit.md';

export const spawnEditor: EditorRunner = (command, args) => {
  const result = spawnSync(command, args, { stdio: 'inherit' });
  return { error: result.error, status: result.status, signal: result.signal };
};

export function resolveEditorCommand(
  settings: EditorSettings,
  env: NodeJS.ProcessEnv = process.env
): { command: string; args: string[] } {
  const configured = settings.command ?? (env.VISUAL || env.EDITOR || FALLBACK_EDITOR);
  const [command = FALLBACK_EDITOR, ...args] = configured.trim().split(/\s+/);
  return { command, args };
}

interface ScratchFile {
  path: string;
  dispose(): void;
}

/**
 * Round-trips a note through the user's editor. The terminal is suspended
 * only while the editor process runs; the scratch file is removed afterwards.
 */
export class EditorBridge {
  private readonly runEditor: EditorRunner;

  constructor(private readonly options: EditorBridgeOptions) {
    this.runEditor = options.runEditor ?? spawnEditor;
  }

  openForNew(): EditFlowResult {
    return this.run('');
  }

  openForEdit(note: NoteDraft): EditFlowResult {
    return this.run(serializeNote(note));
  }

  private run(initial: string): EditFlowResult {
    const scratch = this.createScratchFile(initial);
    try {
      const failure = this.options.suspend(() => this.launch(scratch.path));
      if (failure) {
        return { ok: false, error: failure };
      }
      const draft = parseNoteText(fs.readFileSync(scratch.path, 'utf-8'));
      return draft ? { ok: true, draft } : { ok: false, canceled: true };
    } finally {
      scratch.dispose();
    }
  }

  private launch(file: string): string | null {
    const { command, args } = resolveEditorCommand(this.options.settings, this.options.env);
    const exit = this.runEditor(command, [...args, file]);
    if (exit.error) {
      return `Failed to launch editor '${command}': ${exit.error.message}`;
    }
    if (exit.signal) {
      return `Editor terminated by ${exit.signal}`;
    }
    if (exit.status !== 0) {
      return `Editor exited with status ${exit.status ?? 'unknown'}`;
    }
    return null;
  }

  private createScratchFile(initial: string): ScratchFile {
    const base = this.options.tempDir ?? os.tmpdir();
    if (this.options.settings.secureTempFiles) {
      const dir = fs.mkdtempSync(path.join(base, 'jotter-'));
      const file = path.join(dir, 'note.md');
      fs.writeFileSync(file, initial, { encoding: 'utf-8', mode: 0o600 });
      return { path: file, dispose: () => fs.rmSync(dir, { recursive: true, force: true }) };
    }
    const file = path.join(base, SHARED_TEMP_FILE);
    fs.writeFileSync(file, initial, 'utf-8');
    return { path: file, dispose: () => fs.rmSync(file, { force: true }) };
  }
}
