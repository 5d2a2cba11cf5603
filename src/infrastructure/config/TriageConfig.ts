/**
 * Triage Configuration
 *
 * Loads everything a batch needs before any document is touched: folder
 * paths, the keyword list, scoring/survey/notification settings and the
 * optional survey response table. The result is frozen for the run.
 *
 * Sources:
 * - Environment (.env via dotenv at the entry point)
 * - config/keywords.txt   (one keyword per line, # comments)
 * - config/triage.json    (validated with zod, defaults when absent)
 * - config/sample_responses.csv (optional)
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ConfigurationError, describeError } from '../../core/errors.js';
import { isNotFound } from '../output/CsvTable.js';
import type { TransactionalEmailConfig } from '../../integrations/email/TransactionalTypes.js';
import { resolveResendConfigFromEnv } from '../../integrations/email/ResendClient.js';
import { triageSettingsSchema, type TriageSettings } from './settingsSchema.js';
import { parseSurveyResponseTable, type SurveyResponseTable } from './SurveyResponseTable.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TriagePaths {
  inputDir: string;
  processedDir: string;
  outputDir: string;
  keywordsFile: string;
  settingsFile: string;
  surveyResponsesFile: string;
}

export type DeliveryMode = 'simulated' | 'resend';

export interface DeliveryConfig {
  mode: DeliveryMode;
  resend?: TransactionalEmailConfig;
}

export interface TriageConfig {
  paths: TriagePaths;
  keywords: readonly string[];
  settings: TriageSettings;
  surveyTable: SurveyResponseTable;
  delivery: DeliveryConfig;
}

// =============================================================================
// PATHS
// =============================================================================

export function resolveTriagePaths(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): TriagePaths {
  const fromEnv = (name: string, fallback: string): string => {
    const value = env[name]?.trim();
    return path.resolve(cwd, value || fallback);
  };

  const inputDir = fromEnv('TRIAGE_INPUT_DIR', './input_cv');

  return {
    inputDir,
    processedDir: env.TRIAGE_PROCESSED_DIR?.trim()
      ? path.resolve(cwd, env.TRIAGE_PROCESSED_DIR.trim())
      : path.join(inputDir, 'processed'),
    outputDir: fromEnv('TRIAGE_OUTPUT_DIR', './output'),
    keywordsFile: fromEnv('TRIAGE_KEYWORDS_FILE', './config/keywords.txt'),
    settingsFile: fromEnv('TRIAGE_SETTINGS_FILE', './config/triage.json'),
    surveyResponsesFile: fromEnv('TRIAGE_SURVEY_RESPONSES_FILE', './config/sample_responses.csv'),
  };
}

// =============================================================================
// KEYWORDS
// =============================================================================

/**
 * Parse the keyword list: trimmed, lower-cased, de-duplicated, first
 * occurrence keeps its position.
 */
export function parseKeywordList(text: string): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    const keyword = line.trim().toLowerCase();
    if (!keyword || keyword.startsWith('#') || seen.has(keyword)) {
      continue;
    }
    seen.add(keyword);
    keywords.push(keyword);
  }

  return keywords;
}

export async function loadKeywords(file: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Keywords file not readable: ${file}`, {
      file,
      cause: describeError(error),
    });
  }

  const keywords = parseKeywordList(text);
  if (keywords.length === 0) {
    throw new ConfigurationError(`Keywords file is empty: ${file}`, { file });
  }

  console.log(`[TriageConfig] Loaded ${keywords.length} keywords`);
  return keywords;
}

// =============================================================================
// SETTINGS
// =============================================================================

export function parseTriageSettings(raw: unknown, source = 'settings'): TriageSettings {
  try {
    return triageSettingsSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid ${source}`, {
        issues: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      });
    }
    throw error;
  }
}

export async function loadSettings(file: string): Promise<TriageSettings> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      console.warn(`[TriageConfig] Settings file not found (${file}), using defaults`);
      return parseTriageSettings({});
    }
    throw new ConfigurationError(`Settings file not readable: ${file}`, {
      file,
      cause: describeError(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Settings file is not valid JSON: ${file}`, {
      file,
      cause: describeError(error),
    });
  }

  return parseTriageSettings(raw, file);
}

// =============================================================================
// SURVEY TABLE
// =============================================================================

export async function loadSurveyResponseTable(file: string): Promise<SurveyResponseTable> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      console.warn(`[TriageConfig] Survey responses file not found: ${file}`);
      return parseSurveyResponseTable('');
    }
    throw new ConfigurationError(`Survey responses file not readable: ${file}`, {
      file,
      cause: describeError(error),
    });
  }

  const table = parseSurveyResponseTable(text, file);
  console.log(`[TriageConfig] Loaded ${table.size} survey responses`);
  return table;
}

// =============================================================================
// DELIVERY
// =============================================================================

export function resolveDelivery(env: NodeJS.ProcessEnv = process.env): DeliveryConfig {
  const raw = env.TRIAGE_DELIVERY_MODE?.trim().toLowerCase() || 'simulated';

  if (raw === 'simulated') {
    return { mode: 'simulated' };
  }

  if (raw === 'resend') {
    const resend = resolveResendConfigFromEnv(env);
    if (!resend) {
      throw new ConfigurationError(
        'TRIAGE_DELIVERY_MODE=resend requires RESEND_API_KEY and EMAIL_FROM_ADDRESS'
      );
    }
    return { mode: 'resend', resend };
  }

  throw new ConfigurationError(`Unknown TRIAGE_DELIVERY_MODE: ${raw}`, {
    allowed: ['simulated', 'resend'],
  });
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load and validate the full configuration. Throws ConfigurationError on
 * any missing or malformed required input.
 */
export async function loadTriageConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Promise<TriageConfig> {
  const paths = resolveTriagePaths(env, cwd);
  const delivery = resolveDelivery(env);
  const keywords = await loadKeywords(paths.keywordsFile);
  const settings = await loadSettings(paths.settingsFile);
  const surveyTable = await loadSurveyResponseTable(paths.surveyResponsesFile);

  const seedOverride = env.TRIAGE_SEED?.trim();
  if (seedOverride) {
    settings.survey.seed = seedOverride;
  }

  return Object.freeze({
    paths: Object.freeze(paths),
    keywords: Object.freeze([...keywords]),
    settings: deepFreeze(settings),
    surveyTable,
    delivery: Object.freeze(delivery),
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
