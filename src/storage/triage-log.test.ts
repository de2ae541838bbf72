import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { LogEntry } from '../schemas/index.js';
import { appendLogEntry, readLogEntries } from './triage-log.js';

function createEntry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: '2026-01-04T09:00:00.000Z',
    title: 'Sparse Attention',
    path: '/papers/sparse.pdf',
    summary: 'Proposes sparse attention.',
    decision: 'k',
    dryRun: false,
    ...overrides,
  };
}

describe('triage log', () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'triage-log-test-'));
    logPath = path.join(tempDir, 'logs', 'triage_log.csv');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('appendLogEntry', () => {
    it('creates the file with a header row', async () => {
      await appendLogEntry(logPath, createEntry());

      const content = await fs.readFile(logPath, 'utf-8');
      expect(content).toBe(
        'timestamp,title,path,summary,decision,dry_run\n' +
          '2026-01-04T09:00:00.000Z,Sparse Attention,/papers/sparse.pdf,Proposes sparse attention.,k,false\n'
      );
    });

    it('writes the header only once', async () => {
      await appendLogEntry(logPath, createEntry());
      await appendLogEntry(logPath, createEntry({ title: 'Second', decision: 'r', dryRun: true }));

      const lines = (await fs.readFile(logPath, 'utf-8')).trimEnd().split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[0]).toBe('timestamp,title,path,summary,decision,dry_run');
      expect(lines[2]).toBe('2026-01-04T09:00:00.000Z,Second,/papers/sparse.pdf,Proposes sparse attention.,r,true');
    });

    it('quotes fields containing commas and quotes', async () => {
      await appendLogEntry(logPath, createEntry({ title: 'Cats, Dogs', summary: 'A "bold" claim' }));

      const lines = (await fs.readFile(logPath, 'utf-8')).trimEnd().split('\n');
      expect(lines[1]).toBe(
        '2026-01-04T09:00:00.000Z,"Cats, Dogs",/papers/sparse.pdf,"A ""bold"" claim",k,false'
      );
    });

    it('rejects entries with a malformed timestamp', async () => {
      await expect(appendLogEntry(logPath, createEntry({ timestamp: 'yesterday' }))).rejects.toThrow(
        'Must be a valid ISO8601 timestamp'
      );
    });
  });

  describe('readLogEntries', () => {
    it('returns an empty list when the log does not exist', async () => {
      expect(await readLogEntries(logPath)).toEqual([]);
    });

    it('reads back entries in file order', async () => {
      const first = createEntry({ summary: 'Line one\nline two' });
      const second = createEntry({ title: 'Other', decision: 's', dryRun: true });
      await appendLogEntry(logPath, first);
      await appendLogEntry(logPath, second);

      expect(await readLogEntries(logPath)).toEqual([first, second]);
    });
  });
});
