import * as fs from 'node:fs/promises';

export interface CrawlerSettings {
  maxPages: number;
  maxConcurrency: number;
  timeoutMs: number;
  userAgent: string;
}

export interface LastmodSettings {
  crawler: CrawlerSettings;
  /** Trim and fold line endings before fingerprinting a page. */
  normalizeContent: boolean;
  sortByUrl: boolean;
}

export const DEFAULT_SETTINGS: LastmodSettings = {
  crawler: {
    maxPages: 500,
    maxConcurrency: 4,
    timeoutMs: 10_000,
    userAgent: 'lastmod/0.1 (+sitemap generator)',
  },
  normalizeContent: true,
  sortByUrl: true,
};

export class SettingsError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'SettingsError';
    this.cause = cause;
  }
}

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkKeys(fields: Fields, allowed: readonly string[], scope: string): void {
  for (const key of Object.keys(fields)) {
    if (!allowed.includes(key)) {
      throw new SettingsError(`Unknown setting "${scope}${key}"`);
    }
  }
}

function readBoolean(fields: Fields, key: string, fallback: boolean, scope: string): boolean {
  const value = fields[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new SettingsError(`"${scope}${key}" must be a boolean`);
  }
  return value;
}

function readPositiveInteger(fields: Fields, key: string, fallback: number, scope: string): number {
  const value = fields[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new SettingsError(`"${scope}${key}" must be a positive integer`);
  }
  return value;
}

function readString(fields: Fields, key: string, fallback: string, scope: string): string {
  const value = fields[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new SettingsError(`"${scope}${key}" must be a non-empty string`);
  }
  return value;
}

function mergeCrawler(base: CrawlerSettings, raw: unknown): CrawlerSettings {
  if (raw === undefined) return base;
  if (!isFields(raw)) throw new SettingsError('"crawler" must be an object');
  checkKeys(raw, ['maxPages', 'maxConcurrency', 'timeoutMs', 'userAgent'], 'crawler.');
  return {
    maxPages: readPositiveInteger(raw, 'maxPages', base.maxPages, 'crawler.'),
    maxConcurrency: readPositiveInteger(raw, 'maxConcurrency', base.maxConcurrency, 'crawler.'),
    timeoutMs: readPositiveInteger(raw, 'timeoutMs', base.timeoutMs, 'crawler.'),
    userAgent: readString(raw, 'userAgent', base.userAgent, 'crawler.'),
  };
}

/**
 * Overlays user-supplied settings on `base`.
 * Throws {@link SettingsError} on unknown keys or wrong types.
 */
export function mergeSettings(base: LastmodSettings, raw: unknown): LastmodSettings {
  if (!isFields(raw)) throw new SettingsError('Settings must be a JSON object');
  checkKeys(raw, ['crawler', 'normalizeContent', 'sortByUrl'], '');
  return {
    crawler: mergeCrawler(base.crawler, raw.crawler),
    normalizeContent: readBoolean(raw, 'normalizeContent', base.normalizeContent, ''),
    sortByUrl: readBoolean(raw, 'sortByUrl', base.sortByUrl, ''),
  };
}

export async function loadSettingsFile(filePath: string): Promise<LastmodSettings> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Cannot read settings file ${filePath}: ${reason}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SettingsError(`Settings file ${filePath} is not valid JSON: ${reason}`, error);
  }
  return mergeSettings(DEFAULT_SETTINGS, raw);
}
