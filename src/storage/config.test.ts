import { jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError } from '../config/index.js';
import { DEFAULT_TRIAGE_CONFIG, loadTriageConfig, resolveRunConfig } from './config.js';

function createMockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('config storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('DEFAULT_TRIAGE_CONFIG', () => {
    it('has the built-in defaults', () => {
      expect(DEFAULT_TRIAGE_CONFIG.inputFolders).toEqual([]);
      expect(DEFAULT_TRIAGE_CONFIG.archiveDir).toBe('archive');
      expect(DEFAULT_TRIAGE_CONFIG.model).toBe('llama3.2:latest');
      expect(DEFAULT_TRIAGE_CONFIG.maxPages).toBe(3);
      expect(DEFAULT_TRIAGE_CONFIG.maxChars).toBe(4000);
      expect(DEFAULT_TRIAGE_CONFIG.logPath).toBe('triage_log.csv');
      expect(DEFAULT_TRIAGE_CONFIG.digestDir).toBe('digests');
      expect(DEFAULT_TRIAGE_CONFIG.digest.enabled).toBe(false);
      expect(DEFAULT_TRIAGE_CONFIG.email.enabled).toBe(false);
      expect(DEFAULT_TRIAGE_CONFIG.email.smtpPort).toBe(587);
      expect(DEFAULT_TRIAGE_CONFIG.email.useTls).toBe(true);
      expect(DEFAULT_TRIAGE_CONFIG.schedule).toEqual({
        enabled: false,
        dayOfWeek: 'sun',
        hour: 9,
        minute: 0,
      });
      expect(DEFAULT_TRIAGE_CONFIG.autoDecision).toEqual({ enabled: false, default: 'keep' });
      expect(DEFAULT_TRIAGE_CONFIG.summarizer.baseUrl).toBe('http://localhost:11434/v1');
    });
  });

  describe('loadTriageConfig', () => {
    it('returns defaults and warns when the file is missing', async () => {
      const logger = createMockLogger();
      const configPath = path.join(tempDir, 'missing.json');

      const config = await loadTriageConfig(configPath, logger);

      expect(config).toEqual(DEFAULT_TRIAGE_CONFIG);
      expect(logger.warn).toHaveBeenCalledWith(`Config file ${configPath} not found. Using defaults.`);
    });

    it('merges nested sections over their defaults', async () => {
      const configPath = path.join(tempDir, 'triage.config.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({
          maxPages: 5,
          email: { enabled: true, recipients: ['reader@example.com'], smtpPort: '2525' },
          schedule: { dayOfWeek: 'Monday', hour: 7 },
        })
      );

      const config = await loadTriageConfig(configPath);

      expect(config.maxPages).toBe(5);
      expect(config.maxChars).toBe(4000);
      expect(config.email.enabled).toBe(true);
      expect(config.email.recipients).toEqual(['reader@example.com']);
      expect(config.email.smtpPort).toBe(2525);
      expect(config.email.sender).toBe('paper-triage@example.com');
      expect(config.schedule).toEqual({ enabled: false, dayOfWeek: 'mon', hour: 7, minute: 0 });
    });

    it('treats an empty file as an empty document', async () => {
      const configPath = path.join(tempDir, 'empty.json');
      await fs.writeFile(configPath, '\n');

      expect(await loadTriageConfig(configPath)).toEqual(DEFAULT_TRIAGE_CONFIG);
    });

    it('rejects invalid JSON', async () => {
      const configPath = path.join(tempDir, 'broken.json');
      await fs.writeFile(configPath, '{ "maxPages": ');

      await expect(loadTriageConfig(configPath)).rejects.toThrow(ConfigError);
      await expect(loadTriageConfig(configPath)).rejects.toThrow(
        `Invalid JSON in config file: ${configPath}`
      );
    });

    it('rejects schema violations with the offending field', async () => {
      const configPath = path.join(tempDir, 'bad.json');
      await fs.writeFile(configPath, JSON.stringify({ maxPages: 0 }));

      await expect(loadTriageConfig(configPath)).rejects.toThrow(/maxPages/);
    });

    it('rejects unknown days of the week', async () => {
      const configPath = path.join(tempDir, 'bad-day.json');
      await fs.writeFile(configPath, JSON.stringify({ schedule: { dayOfWeek: 'someday' } }));

      await expect(loadTriageConfig(configPath)).rejects.toThrow(/schedule\.dayOfWeek/);
    });
  });

  describe('resolveRunConfig', () => {
    it('resolves paths against the base directory', () => {
      const config = resolveRunConfig(
        {
          ...DEFAULT_TRIAGE_CONFIG,
          inputFolders: ['inbox', '/abs/papers'],
          metadataSources: [{ type: 'zotero', path: 'exports/library.csv' }],
        },
        {},
        '/srv/triage'
      );

      expect(config.inputFolders).toEqual([path.resolve('/srv/triage/inbox'), path.resolve('/abs/papers')]);
      expect(config.archiveDir).toBe(path.resolve('/srv/triage/archive'));
      expect(config.logPath).toBe(path.resolve('/srv/triage/triage_log.csv'));
      expect(config.digestDir).toBe(path.resolve('/srv/triage/digests'));
      expect(config.metadataSources).toEqual([
        { type: 'zotero', path: path.resolve('/srv/triage/exports/library.csv') },
      ]);
      expect(config.dryRun).toBe(false);
      expect(config.decisionOverride).toBeUndefined();
    });

    it('applies command-line overrides', () => {
      const config = resolveRunConfig(
        DEFAULT_TRIAGE_CONFIG,
        {
          dryRun: true,
          maxPages: 1,
          maxChars: 500,
          archiveDir: '/tmp/old',
          logPath: 'logs/run.csv',
          decision: 'skip',
        },
        '/srv/triage'
      );

      expect(config.dryRun).toBe(true);
      expect(config.maxPages).toBe(1);
      expect(config.maxChars).toBe(500);
      expect(config.archiveDir).toBe(path.resolve('/tmp/old'));
      expect(config.logPath).toBe(path.resolve('/srv/triage/logs/run.csv'));
      expect(config.decisionOverride).toBe('skip');
    });

    it('rejects non-positive page limits', () => {
      expect(() => resolveRunConfig(DEFAULT_TRIAGE_CONFIG, { maxPages: 0 })).toThrow(
        'maxPages must be a positive integer (got 0)'
      );
      expect(() => resolveRunConfig(DEFAULT_TRIAGE_CONFIG, { maxChars: Number('abc') })).toThrow(
        ConfigError
      );
    });

    it('returns a frozen configuration', () => {
      const config = resolveRunConfig(DEFAULT_TRIAGE_CONFIG);
      expect(Object.isFrozen(config)).toBe(true);
    });
  });
});
