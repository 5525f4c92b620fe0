import type Database from 'better-sqlite3';
import { CONFIG_KEYS, type Config, type ConfigKey, type TaggingOptions } from '../models/config.js';
import { ConfigurationError } from './errors.js';
import { DEFAULT_DELIMITER, DISPLAYERS, NORMALIZERS, slug, title } from './tags.js';

// Map config keys to environment variable names
const ENV_KEY_MAP: Record<ConfigKey, string> = {
  untag_on_delete: 'TAGGING_UNTAG_ON_DELETE',
  delete_unused_tags: 'TAGGING_DELETE_UNUSED',
  auto_tag_from_prop: 'TAGGING_AUTO_TAG_PROP',
  tag_delimiter: 'TAGGING_DELIMITER',
  normalizer: 'TAGGING_NORMALIZER',
  displayer: 'TAGGING_DISPLAYER',
};

// Default values for config keys
const DEFAULT_VALUES: Partial<Record<ConfigKey, string>> = {
  untag_on_delete: 'true',
  delete_unused_tags: 'false',
  tag_delimiter: DEFAULT_DELIMITER,
  normalizer: 'slug',
  displayer: 'title',
};

function isConfigKey(key: string): key is ConfigKey {
  return Object.values(CONFIG_KEYS).some(k => k === key);
}

export function getConfig(db: Database.Database, key: string): string | null {
  // Priority: env > db > default
  if (isConfigKey(key)) {
    const envValue = process.env[ENV_KEY_MAP[key]];
    if (envValue) {
      return envValue;
    }
  }

  const row = db
    .prepare<[string], Config>('SELECT key, value FROM config WHERE key = ?')
    .get(key);
  if (row?.value) {
    return row.value;
  }

  return isConfigKey(key) ? DEFAULT_VALUES[key] ?? null : null;
}

export function setConfig(db: Database.Database, key: string, value: string): void {
  if (!isConfigKey(key)) {
    throw new ConfigurationError(
      `Unknown configuration key "${key}" (expected one of: ${Object.values(CONFIG_KEYS).join(', ')})`,
      { key, value }
    );
  }
  db.prepare(
    'INSERT INTO config (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
  ).run(key, value);
}

export function deleteConfig(db: Database.Database, key: string): boolean {
  const result = db.prepare('DELETE FROM config WHERE key = ?').run(key);
  return result.changes > 0;
}

export function getAllConfig(db: Database.Database): Config[] {
  return db.prepare<[], Config>('SELECT key, value FROM config ORDER BY key').all();
}

function parseBoolean(key: string, value: string | null): boolean {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
    case undefined:
      return false;
    default:
      throw new ConfigurationError(`Invalid boolean for ${key}: "${value}"`, { key, value });
  }
}

function pick<T>(registry: Record<string, T>, key: string, name: string): T {
  const strategy = registry[name];
  if (!strategy) {
    throw new ConfigurationError(
      `Unknown ${key} "${name}" (expected one of: ${Object.keys(registry).join(', ')})`,
      { key, value: name }
    );
  }
  return strategy;
}

/**
 * Resolves every tagging setting once. Strategies are looked up by name
 * here so the service never rereads configuration per call.
 */
export function loadTaggingOptions(
  db: Database.Database,
  overrides: Partial<TaggingOptions> = {}
): TaggingOptions {
  const options: TaggingOptions = {
    normalizer: pick(NORMALIZERS, CONFIG_KEYS.NORMALIZER, getConfig(db, CONFIG_KEYS.NORMALIZER) ?? 'slug'),
    displayer: pick(DISPLAYERS, CONFIG_KEYS.DISPLAYER, getConfig(db, CONFIG_KEYS.DISPLAYER) ?? 'title'),
    delimiter: getConfig(db, CONFIG_KEYS.TAG_DELIMITER) ?? DEFAULT_DELIMITER,
    untagOnDelete: parseBoolean(CONFIG_KEYS.UNTAG_ON_DELETE, getConfig(db, CONFIG_KEYS.UNTAG_ON_DELETE)),
    deleteUnusedTags: parseBoolean(
      CONFIG_KEYS.DELETE_UNUSED_TAGS,
      getConfig(db, CONFIG_KEYS.DELETE_UNUSED_TAGS)
    ),
    autoTagFromProp: getConfig(db, CONFIG_KEYS.AUTO_TAG_FROM_PROP),
  };

  return { ...options, ...overrides };
}

export function defaultTaggingOptions(overrides: Partial<TaggingOptions> = {}): TaggingOptions {
  return {
    normalizer: slug,
    displayer: title,
    delimiter: DEFAULT_DELIMITER,
    untagOnDelete: true,
    deleteUnusedTags: false,
    autoTagFromProp: null,
    ...overrides,
  };
}
