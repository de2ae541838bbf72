import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { archivePaper } from './archive.js';

describe('archivePaper', () => {
  let tempDir: string;
  let archiveDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'archive-test-'));
    archiveDir = path.join(tempDir, 'archive');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('moves the paper into a new archive directory', async () => {
    const paper = path.join(tempDir, 'paper.pdf');
    await fs.writeFile(paper, 'pdf');

    const target = await archivePaper(paper, archiveDir);

    expect(target).toBe(path.join(archiveDir, 'paper.pdf'));
    expect(await fs.readFile(target, 'utf-8')).toBe('pdf');
    await expect(fs.access(paper)).rejects.toThrow();
  });

  it('suffixes same-named papers instead of overwriting', async () => {
    const targets: string[] = [];
    for (const folder of ['a', 'b', 'c']) {
      await fs.mkdir(path.join(tempDir, folder));
      const paper = path.join(tempDir, folder, 'paper.pdf');
      await fs.writeFile(paper, folder);
      targets.push(await archivePaper(paper, archiveDir));
    }

    expect(targets).toEqual([
      path.join(archiveDir, 'paper.pdf'),
      path.join(archiveDir, 'paper-1.pdf'),
      path.join(archiveDir, 'paper-2.pdf'),
    ]);
    expect(await fs.readFile(targets[0], 'utf-8')).toBe('a');
    expect(await fs.readFile(targets[2], 'utf-8')).toBe('c');
  });
});
