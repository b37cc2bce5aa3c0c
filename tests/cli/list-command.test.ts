import { describe, expect, it } from 'vitest';
import { CliUsageError } from '../../src/cli/errors.js';
import { handleListCommand } from '../../src/cli/list-command.js';
import { handleSearchCommand } from '../../src/cli/search-command.js';
import { handleShowCommand } from '../../src/cli/show-command.js';
import { handleStatsCommand } from '../../src/cli/stats-command.js';
import { handleTagsCommand } from '../../src/cli/tags-command.js';
import { seedNotes, useCliEnv } from './cli-env.js';

const env = useCliEnv();

function seed(): void {
  seedNotes(env, [
    { title: 'Groceries', body: 'milk\neggs', tags: ['home', 'shopping'] },
    { title: 'Budget', body: 'rent up 10%', tags: ['home'] },
    { title: 'Article draft', body: '' },
  ]);
}

describe('jot list', () => {
  it('lists newest first, one line each', () => {
    seed();
    handleListCommand(['--db', env.dbPath, '--oneline']);
    expect(env.logs()).toEqual([
      ['   3  Article draft', '   2  Budget  @home', '   1  Groceries  @home @shopping'].join('\n'),
    ]);
  });

  it('shows a date and body excerpt by default', () => {
    seed();
    handleListCommand(['--db', env.dbPath, '--limit', '1', '--sort', 'created']);
    expect(env.logs()).toEqual(['   3  Article draft  Jan 05']);

    handleListCommand(['--db', env.dbPath, '--tag', 'shopping']);
    expect(env.logs()[1]).toBe('   1  Groceries  Jan 05\n      milk  @home @shopping');
  });

  it('filters by tag and sorts by title', () => {
    seed();
    handleListCommand(['--db', env.dbPath, '--tag', '@home', '--sort', 'title', '--json']);
    const output: Array<{ title: string }> = JSON.parse(String(env.logs()[0]));
    expect(output.map((note) => note.title)).toEqual(['Budget', 'Groceries']);
  });

  it('says so when there is nothing to list', () => {
    handleListCommand(['--db', env.dbPath]);
    expect(env.logs()).toEqual(['No notes found.']);
  });

  it('validates its flags', () => {
    expect(() => handleListCommand(['--db', env.dbPath, '--sort', 'size'])).toThrow(
      "Invalid sort 'size'. Use one of: updated, created, title."
    );
    expect(() => handleListCommand(['--db', env.dbPath, '--limit', '0'])).toThrow(CliUsageError);
    expect(() => handleListCommand(['--db', env.dbPath, '--limit'])).toThrow("Flag '--limit' requires a value.");
  });
});

describe('jot show', () => {
  it('prints metadata and body', () => {
    seed();
    handleShowCommand(['--db', env.dbPath, 'groc']);
    expect(env.logs()).toEqual([
      [
        'Groceries',
        'ID:      1',
        'Created: 2024-01-05 09:00',
        'Updated: 2024-01-05 09:00',
        'Tags:    @home @shopping',
        '',
        'milk\neggs',
      ].join('\n'),
    ]);
  });

  it('prints JSON by id', () => {
    seed();
    handleShowCommand(['--db', env.dbPath, '2', '--json']);
    expect(JSON.parse(String(env.logs()[0]))).toEqual({
      id: 2,
      title: 'Budget',
      body: 'rent up 10%',
      tags: ['home'],
      createdAt: '2024-01-05T09:01:00.000Z',
      updatedAt: '2024-01-05T09:01:00.000Z',
    });
  });

  it('needs a reference', () => {
    expect(() => handleShowCommand(['--db', env.dbPath])).toThrow(
      'Missing note ID or title. Usage: jot show <id|title>'
    );
  });
});

describe('jot search', () => {
  it('matches titles, bodies and tags', () => {
    seed();
    handleSearchCommand(['--db', env.dbPath, '--json', 'HOME']);
    const found: Array<{ id: number }> = JSON.parse(String(env.logs()[0]));
    const ids = found.map((note) => note.id);
    expect(ids).toEqual([2, 1]);
  });

  it('treats % literally', () => {
    seed();
    handleSearchCommand(['--db', env.dbPath, '10%', '--json']);
    expect(JSON.parse(String(env.logs()[0]))).toHaveLength(1);
  });
});

describe('jot tags and stats', () => {
  it('counts tag usage', () => {
    seed();
    handleTagsCommand(['--db', env.dbPath]);
    expect(env.logs()).toEqual(['2  @home', '1  @shopping']);
  });

  it('summarizes the database', () => {
    seed();
    handleStatsCommand(['--db', env.dbPath]);
    expect(env.logs()).toEqual([
      'Notes',
      '  Total:   3',
      '  Tags:    2',
      '  Oldest:  2024-01-05 09:00',
      '  Newest:  2024-01-05 09:02',
    ]);
  });

  it('reports an empty database', () => {
    handleTagsCommand(['--db', env.dbPath]);
    handleStatsCommand(['--db', env.dbPath, '--json']);
    expect(env.logs()[0]).toBe('No tags yet.');
    expect(JSON.parse(String(env.logs()[1]))).toEqual({ notes: 0, tags: 0, oldest: null, newest: null });
  });
});
