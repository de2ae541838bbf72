import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { dirExists, fileExists, hasErrorCode, moveFile, pathExists, readJson, uniqueTarget } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readJson', () => {
    it('reads and parses JSON file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      expect(await readJson(filePath)).toEqual({ foo: 'bar' });
    });

    it('throws on missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it('throws on invalid JSON', async () => {
      const filePath = path.join(tempDir, 'invalid.json');
      await fs.writeFile(filePath, 'not json');

      await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
    });
  });

  describe('existence checks', () => {
    it('distinguishes files from directories', async () => {
      const filePath = path.join(tempDir, 'a.pdf');
      await fs.writeFile(filePath, 'x');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(tempDir)).toBe(false);
      expect(await dirExists(tempDir)).toBe(true);
      expect(await dirExists(filePath)).toBe(false);
    });

    it('pathExists sees dangling symlinks', async () => {
      const link = path.join(tempDir, 'dangling');
      await fs.symlink(path.join(tempDir, 'nowhere'), link);

      expect(await fileExists(link)).toBe(false);
      expect(await pathExists(link)).toBe(true);
    });
  });

  describe('hasErrorCode', () => {
    it('matches Node system error codes', async () => {
      const error: unknown = await fs.readFile(path.join(tempDir, 'missing')).catch((e: unknown) => e);

      expect(hasErrorCode(error, 'ENOENT')).toBe(true);
      expect(hasErrorCode(error, 'EXDEV')).toBe(false);
      expect(hasErrorCode(new Error('plain'), 'ENOENT')).toBe(false);
      expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
    });

    it('matches error-like objects from another realm', () => {
      const foreign: unknown = Object.create(null, { code: { value: 'ENOENT' } });

      expect(foreign instanceof Error).toBe(false);
      expect(hasErrorCode(foreign, 'ENOENT')).toBe(true);
      expect(hasErrorCode(null, 'ENOENT')).toBe(false);
    });
  });

  describe('uniqueTarget', () => {
    it('returns the target when free', async () => {
      const target = path.join(tempDir, 'paper.pdf');
      expect(await uniqueTarget(target)).toBe(target);
    });

    it('takes the first free numeric suffix', async () => {
      await fs.writeFile(path.join(tempDir, 'paper.pdf'), '');
      await fs.writeFile(path.join(tempDir, 'paper-1.pdf'), '');
      await fs.writeFile(path.join(tempDir, 'paper-3.pdf'), '');

      expect(await uniqueTarget(path.join(tempDir, 'paper.pdf'))).toBe(
        path.join(tempDir, 'paper-2.pdf')
      );
    });

    it('handles names without extension', async () => {
      await fs.writeFile(path.join(tempDir, 'notes'), '');

      expect(await uniqueTarget(path.join(tempDir, 'notes'))).toBe(path.join(tempDir, 'notes-1'));
    });
  });

  describe('moveFile', () => {
    it('moves the file', async () => {
      const from = path.join(tempDir, 'a.pdf');
      const to = path.join(tempDir, 'b.pdf');
      await fs.writeFile(from, 'content');

      await moveFile(from, to);

      expect(await fileExists(from)).toBe(false);
      expect(await fs.readFile(to, 'utf-8')).toBe('content');
    });

    it('propagates errors other than cross-device moves', async () => {
      await expect(
        moveFile(path.join(tempDir, 'missing.pdf'), path.join(tempDir, 'x.pdf'))
      ).rejects.toThrow('ENOENT');
    });
  });
});
