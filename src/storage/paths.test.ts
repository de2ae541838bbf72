/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG_FILE,
  formatCompactTimestamp,
  getDefaultConfigPath,
  getDigestFilePath,
  resolveUserPath,
} from './paths.js';

describe('storage/paths', () => {
  describe('resolveUserPath', () => {
    it('expands a bare tilde to the home directory', () => {
      expect(resolveUserPath('~')).toBe(os.homedir());
    });

    it('expands a leading ~/', () => {
      expect(resolveUserPath('~/papers')).toBe(path.join(os.homedir(), 'papers'));
    });

    it('resolves relative paths against the base directory', () => {
      expect(resolveUserPath('archive', '/srv/triage')).toBe(path.resolve('/srv/triage', 'archive'));
    });

    it('keeps absolute paths', () => {
      expect(resolveUserPath('/data/papers', '/srv/triage')).toBe(path.resolve('/data/papers'));
    });
  });

  describe('getDefaultConfigPath', () => {
    it('defaults to triage.config.json in the working directory', () => {
      expect(getDefaultConfigPath({})).toBe(path.resolve(process.cwd(), DEFAULT_CONFIG_FILE));
    });

    it('uses PAPER_TRIAGE_CONFIG when set', () => {
      expect(getDefaultConfigPath({ PAPER_TRIAGE_CONFIG: '/etc/triage.json' })).toBe(
        path.resolve('/etc/triage.json')
      );
    });

    it('ignores a blank PAPER_TRIAGE_CONFIG', () => {
      expect(getDefaultConfigPath({ PAPER_TRIAGE_CONFIG: '  ' })).toBe(
        path.resolve(process.cwd(), DEFAULT_CONFIG_FILE)
      );
    });
  });

  describe('digest file names', () => {
    it('formats a compact UTC timestamp', () => {
      expect(formatCompactTimestamp(new Date('2026-01-04T09:05:07.123Z'))).toBe('2026-01-04-090507');
    });

    it('builds the digest path', () => {
      expect(getDigestFilePath('/tmp/digests', new Date('2026-03-15T18:30:00Z'))).toBe(
        path.join('/tmp/digests', 'digest-2026-03-15-183000.md')
      );
    });
  });
});
