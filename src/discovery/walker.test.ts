/**
 * PDF Walker Tests
 *
 * Folder read failures are simulated through a mocked `readdir`; every other
 * call goes to the real filesystem.
 *
 * @module discovery/walker.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { discoverPapers, listPdfFiles } from './index.js';

const mockReaddirFailure = jest.fn<(dir: string) => Error | undefined>();

jest.mock('node:fs/promises', () => {
  const actual = jest.requireActual<typeof import('node:fs/promises')>('node:fs/promises');
  return {
    ...actual,
    readdir: async (dir: string, options: { withFileTypes: true }) => {
      const failure = mockReaddirFailure(dir);
      if (failure) throw failure;
      return actual.readdir(dir, options);
    },
  };
});

function permissionDenied(): Error {
  return Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
}

function createLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('listPdfFiles with unreadable folders', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'walker-test-'));
    for (const file of ['a.pdf', 'locked/b.pdf', 'open/c.pdf']) {
      const filePath = path.join(tempDir, file);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '%PDF-1.4');
    }
  });

  afterEach(async () => {
    mockReaddirFailure.mockReset();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('warns about a subfolder it cannot read and lists the rest', async () => {
    const locked = path.join(tempDir, 'locked');
    mockReaddirFailure.mockImplementation((dir) => (dir === locked ? permissionDenied() : undefined));
    const logger = createLogger();

    const files = await listPdfFiles(tempDir, logger);

    expect(files).toEqual([path.join(tempDir, 'a.pdf'), path.join(tempDir, 'open', 'c.pdf')]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(`Unable to read folder ${locked}: EACCES: permission denied`);
  });

  it('returns nothing when the folder itself cannot be read', async () => {
    mockReaddirFailure.mockImplementation((dir) => (dir === tempDir ? permissionDenied() : undefined));
    const logger = createLogger();

    expect(await listPdfFiles(tempDir, logger)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`Unable to read folder ${tempDir}: EACCES: permission denied`);
  });

  it('keeps discovering other folders after a read failure', async () => {
    const locked = path.join(tempDir, 'locked');
    mockReaddirFailure.mockImplementation((dir) => (dir === locked ? permissionDenied() : undefined));
    const logger = createLogger();

    const candidates = await discoverPapers([locked, path.join(tempDir, 'open')], new Map(), logger);

    expect(candidates.map((c) => path.basename(c.path))).toEqual(['c.pdf']);
    expect(logger.warn).toHaveBeenCalledWith(`Unable to read folder ${locked}: EACCES: permission denied`);
  });
});
