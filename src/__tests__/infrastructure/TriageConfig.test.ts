/**
 * Triage Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError } from '../../core/errors.js';
import {
  loadKeywords,
  loadSettings,
  loadTriageConfig,
  parseKeywordList,
  parseTriageSettings,
  resolveDelivery,
  resolveTriagePaths,
} from '../../infrastructure/config/TriageConfig.js';

describe('TriageConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'triage-config-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('paths', () => {
    it('should default to folders under the working directory', () => {
      expect(resolveTriagePaths({}, '/work')).toEqual({
        inputDir: path.resolve('/work', 'input_cv'),
        processedDir: path.join(path.resolve('/work', 'input_cv'), 'processed'),
        outputDir: path.resolve('/work', 'output'),
        keywordsFile: path.resolve('/work', 'config/keywords.txt'),
        settingsFile: path.resolve('/work', 'config/triage.json'),
        surveyResponsesFile: path.resolve('/work', 'config/sample_responses.csv'),
      });
    });

    it('should take overrides from the environment', () => {
      const paths = resolveTriagePaths(
        { TRIAGE_INPUT_DIR: 'inbox', TRIAGE_PROCESSED_DIR: '/archive' },
        '/work'
      );

      expect(paths.inputDir).toBe(path.resolve('/work', 'inbox'));
      expect(paths.processedDir).toBe(path.resolve('/archive'));
    });
  });

  describe('keywords', () => {
    it('should lower-case, de-duplicate and skip comments', () => {
      expect(parseKeywordList('# kitchen roles\nCook\n\ncook\n  Fast Food \nCashier\n')).toEqual([
        'cook',
        'fast food',
        'cashier',
      ]);
    });

    it('should reject a missing keywords file', async () => {
      await expect(loadKeywords(path.join(dir, 'missing.txt'))).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });

    it('should reject a keywords file with only comments', async () => {
      const file = path.join(dir, 'keywords.txt');
      await fs.writeFile(file, '# nothing here\n', 'utf-8');

      await expect(loadKeywords(file)).rejects.toThrow(`Keywords file is empty: ${file}`);
    });
  });

  describe('settings', () => {
    it('should fill every default from an empty object', () => {
      const settings = parseTriageSettings({});

      expect(settings.screening.threshold).toBe(2);
      expect(settings.scoring.thresholds).toEqual({ high: 9, medium: 5 });
      expect(settings.scoring.keywordBonusCap).toBe(5);
      expect(settings.survey.responseRate).toBe(0.8);
      expect(settings.notifications.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, timeoutMs: 10000 });
    });

    it('should reject inverted tier thresholds', () => {
      expect(() => parseTriageSettings({ scoring: { thresholds: { high: 3, medium: 5 } } })).toThrow(
        ConfigurationError
      );
    });

    it('should reject unknown top-level keys', () => {
      expect(() => parseTriageSettings({ scoreing: {} })).toThrow(ConfigurationError);
    });

    it('should report the failing path', () => {
      let caught: unknown;
      try {
        parseTriageSettings({ survey: { responseRate: 2 } }, 'triage.json');
      } catch (error) {
        caught = error;
      }

      expect(caught).toMatchObject({
        message: 'Invalid triage.json',
        details: { issues: ['survey.responseRate: Number must be less than or equal to 1'] },
      });
    });

    it('should use defaults when the settings file is absent', async () => {
      const settings = await loadSettings(path.join(dir, 'absent.json'));
      expect(settings.notifications.interviewLeadDays).toBe(14);
    });

    it('should reject malformed JSON', async () => {
      const file = path.join(dir, 'triage.json');
      await fs.writeFile(file, '{ not json', 'utf-8');

      await expect(loadSettings(file)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('delivery', () => {
    it('should simulate by default', () => {
      expect(resolveDelivery({})).toEqual({ mode: 'simulated' });
    });

    it('should require credentials for resend', () => {
      expect(() => resolveDelivery({ TRIAGE_DELIVERY_MODE: 'resend' })).toThrow(ConfigurationError);
    });

    it('should build the resend config from the environment', () => {
      expect(
        resolveDelivery({
          TRIAGE_DELIVERY_MODE: 'resend',
          RESEND_API_KEY: 'test-secret',
          EMAIL_FROM_ADDRESS: 'jobs@example.com',
        })
      ).toEqual({
        mode: 'resend',
        resend: {
          apiKey: 'test-secret',
          fromEmail: 'jobs@example.com',
          fromName: 'Hiring Team',
          replyTo: undefined,
        },
      });
    });

    it('should reject an unknown mode', () => {
      expect(() => resolveDelivery({ TRIAGE_DELIVERY_MODE: 'carrier-pigeon' })).toThrow(
        'Unknown TRIAGE_DELIVERY_MODE: carrier-pigeon'
      );
    });
  });

  describe('loadTriageConfig', () => {
    it('should load everything once and freeze it', async () => {
      await fs.mkdir(path.join(dir, 'config'));
      await fs.writeFile(path.join(dir, 'config', 'keywords.txt'), 'cook\ncashier\n', 'utf-8');

      const config = await loadTriageConfig({ TRIAGE_SEED: 'fixed-seed' }, dir);

      expect(config.keywords).toEqual(['cook', 'cashier']);
      expect(config.settings.survey.seed).toBe('fixed-seed');
      expect(config.surveyTable.size).toBe(0);
      expect(config.delivery).toEqual({ mode: 'simulated' });
      expect(Object.isFrozen(config.settings.survey)).toBe(true);
      expect(Object.isFrozen(config.keywords)).toBe(true);
    });
  });
});
