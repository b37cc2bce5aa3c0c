import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  getDefaultDatabasePath,
  getGlobalConfigPath,
  loadConfig,
  resolveConfigPath,
  resolveDatabasePath,
} from '../../src/config/loader.js';

const ENV_KEYS = ['HOME', 'XDG_CONFIG_HOME', 'XDG_DATA_HOME', 'JOTTER_CONFIG'] as const;

let tempDir: string;
let savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>>;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jotter-config-'));
  savedEnv = {};
  for (const key of ENV_KEYS) {
    savedEnv[key] = process.env[key];
    delete process.env[key];
  }
  process.env.HOME = tempDir;
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, typeof value === 'string' ? value : JSON.stringify(value), 'utf-8');
}

describe('config locations', () => {
  it('defaults under HOME', () => {
    expect(getGlobalConfigPath()).toBe(path.join(tempDir, '.config', 'jotter', 'config.json'));
    expect(getDefaultDatabasePath()).toBe(
      path.join(tempDir, '.local', 'share', 'jotter', 'notes.db')
    );
  });

  it('follows XDG directories', () => {
    process.env.XDG_CONFIG_HOME = path.join(tempDir, 'cfg');
    process.env.XDG_DATA_HOME = path.join(tempDir, 'data');
    expect(getGlobalConfigPath()).toBe(path.join(tempDir, 'cfg', 'jotter', 'config.json'));
    expect(getDefaultDatabasePath()).toBe(path.join(tempDir, 'data', 'jotter', 'notes.db'));
  });

  it('prefers the flag, then JOTTER_CONFIG', () => {
    process.env.JOTTER_CONFIG = '/env/config.json';
    expect(resolveConfigPath('/flag/config.json')).toBe('/flag/config.json');
    expect(resolveConfigPath()).toBe('/env/config.json');
  });

  it('resolves the database from flag, config, then default', () => {
    const config = loadConfig();
    expect(resolveDatabasePath(config, '/tmp/flag.db')).toBe('/tmp/flag.db');
    expect(resolveDatabasePath({ ...config, database: { ...config.database, path: '/tmp/cfg.db' } })).toBe(
      '/tmp/cfg.db'
    );
    expect(resolveDatabasePath(config)).toBe(getDefaultDatabasePath());
  });
});

describe('loadConfig', () => {
  it('returns defaults when no file exists', () => {
    const config = loadConfig();
    expect(config.ui.splitRatio).toBe(0.4);
    expect(config.ui.messageTtl).toBe(5);
    expect(config.editor.secureTempFiles).toBe(true);
    expect(config.keybindings.search).toBe('/');
    expect(config.database.synchronous).toBe('NORMAL');
    expect(config.export.directory).toBe('.');
    expect(config.theme.text).toBe('#c0caf5');
  });

  it('reads the global config and fills missing keys', () => {
    writeConfig(getGlobalConfigPath(), { ui: { splitRatio: 0.5 }, theme: { h1: 'red' } });
    const config = loadConfig();
    expect(config.ui.splitRatio).toBe(0.5);
    expect(config.ui.headerLines).toBe(3);
    expect(config.theme.h1).toBe('#cd0000');
  });

  it('reads an explicit path', () => {
    const file = path.join(tempDir, 'custom.json');
    writeConfig(file, { editor: { command: 'nano' } });
    expect(loadConfig(file).editor.command).toBe('nano');
  });

  it('rejects malformed JSON', () => {
    const file = path.join(tempDir, 'broken.json');
    writeConfig(file, '{ not json');
    expect(() => loadConfig(file)).toThrow(`Invalid JSON in config file: ${file}`);
  });

  it('reports schema violations with their key path', () => {
    const file = path.join(tempDir, 'bad.json');
    writeConfig(file, { theme: { link: 'chartreuse' } });
    expect(() => loadConfig(file)).toThrow(
      `Invalid config file ${file}: theme.link: Unknown color 'chartreuse'`
    );
  });

  it('rejects a split ratio out of range', () => {
    const file = path.join(tempDir, 'ratio.json');
    writeConfig(file, { ui: { splitRatio: 0.95 } });
    expect(() => loadConfig(file)).toThrow(/ui\.splitRatio/);
  });

  it('rejects two actions on one key', () => {
    const file = path.join(tempDir, 'keys.json');
    writeConfig(file, { keybindings: { newNote: 'q' } });
    expect(() => loadConfig(file)).toThrow(
      `Invalid config file ${file}: keybindings.newNote: Key 'q' is already bound to 'quit'`
    );
  });
});
