/**
 * Engine configuration.
 *
 * Options have typed defaults; a JSON config file (camelCase or snake_case
 * keys) and a named preset can override them. Every value is validated
 * before a run starts, so the engine itself never sees a bad option.
 */

import fs from 'fs-extra';
import { NotePlacement, NumberingStyle } from './types.js';
import { ConfigError } from './errors.js';

export interface EngineConfig {
  /** Prefix of generated ids */
  idPrefix: string;
  maxIdLength: number;
  collisionSuffixLength: number;
  /** Bound of the collision suffix loop */
  maxCollisionAttempts: number;

  caseSensitive: boolean;
  ignoreArticles: string[];
  /** BCP 47 tag used to collate index sort keys */
  locale: string;

  notePlacement: NotePlacement;
  generateBackRefs: boolean;
  backRefSymbol: string;
  backRefTitle: string;
  restartNumberingPerChapter: boolean;
  footnoteNumbering: NumberingStyle;
  endnoteNumbering: NumberingStyle;
  notesFileName: string;
  notesPageTitle: string;
  includeChapterHeadings: boolean;

  generateIndex: boolean;
  indexFileName: string;
  indexTitle: string;
  showLetterHeaders: boolean;
  /** Deepest index level rendered (1 = main entries only) */
  maxTocDepth: number;
  /** Deepest sub-term path kept when parsing index markers */
  maxIndexDepth: number;
  maxEntriesPerLetter: number;

  /** Shortest string the fuzzy title match will compare */
  minFuzzyMatchLength: number;

  /** Stylesheet linked from generated pages */
  stylesheet: string;
}

export type PresetName = 'default' | 'scholarly';

export type ConfigInput = Partial<EngineConfig> & { preset?: PresetName };

export const DEFAULT_CONFIG: Readonly<EngineConfig> = {
  idPrefix: 'ref',
  maxIdLength: 50,
  collisionSuffixLength: 6,
  maxCollisionAttempts: 1000,
  caseSensitive: false,
  ignoreArticles: ['a', 'an', 'the'],
  locale: 'en-US',
  notePlacement: 'inline',
  generateBackRefs: true,
  backRefSymbol: '↩',
  backRefTitle: 'Return to text',
  restartNumberingPerChapter: true,
  footnoteNumbering: 'numeric',
  endnoteNumbering: 'roman',
  notesFileName: 'notes.xhtml',
  notesPageTitle: 'Notes',
  includeChapterHeadings: true,
  generateIndex: true,
  indexFileName: 'index.xhtml',
  indexTitle: 'Index',
  showLetterHeaders: true,
  maxTocDepth: 3,
  maxIndexDepth: 3,
  maxEntriesPerLetter: 1000,
  minFuzzyMatchLength: 3,
  stylesheet: 'styles.css'
};

export const PRESETS: Record<PresetName, Partial<EngineConfig>> = {
  default: {},
  scholarly: {
    notePlacement: 'consolidated',
    generateBackRefs: true,
    includeChapterHeadings: true,
    maxEntriesPerLetter: 2000
  }
};

const NOTE_PLACEMENTS: readonly NotePlacement[] = ['inline', 'consolidated', 'linked'];
const NUMBERING_STYLES: readonly NumberingStyle[] = ['numeric', 'roman', 'alpha'];
const SAFE_ID = /^[A-Za-z][A-Za-z0-9_-]*$/;

type KeysOfType<T, V> = {
  [K in keyof T]-?: [T[K]] extends [V] ? ([V] extends [T[K]] ? K : never) : never
}[keyof T];

const STRING_OPTIONS: KeysOfType<EngineConfig, string>[] = [
  'idPrefix', 'locale', 'backRefSymbol', 'backRefTitle', 'notesFileName',
  'notesPageTitle', 'indexFileName', 'indexTitle', 'stylesheet'
];
const NUMBER_OPTIONS: KeysOfType<EngineConfig, number>[] = [
  'maxIdLength', 'collisionSuffixLength', 'maxCollisionAttempts', 'maxTocDepth',
  'maxIndexDepth', 'maxEntriesPerLetter', 'minFuzzyMatchLength'
];
const BOOLEAN_OPTIONS: KeysOfType<EngineConfig, boolean>[] = [
  'caseSensitive', 'generateBackRefs', 'restartNumberingPerChapter',
  'includeChapterHeadings', 'generateIndex', 'showLetterHeaders'
];
const CONFIG_KEYS: (keyof EngineConfig)[] = [
  ...STRING_OPTIONS, ...NUMBER_OPTIONS, ...BOOLEAN_OPTIONS,
  'ignoreArticles', 'notePlacement', 'footnoteNumbering', 'endnoteNumbering'
];

function isNotePlacement(value: unknown): value is NotePlacement {
  return typeof value === 'string' && NOTE_PLACEMENTS.some(p => p === value);
}

function isNumberingStyle(value: unknown): value is NumberingStyle {
  return typeof value === 'string' && NUMBERING_STYLES.some(s => s === value);
}

function isPresetName(value: unknown): value is PresetName {
  return value === 'default' || value === 'scholarly';
}

function copyDefined<K extends keyof EngineConfig>(to: Partial<EngineConfig>, from: Partial<EngineConfig>, key: K): void {
  const value = from[key];
  if (value !== undefined) {
    to[key] = value;
  }
}

function camelCase(key: string): string {
  return key.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function includes<T extends string>(list: readonly T[], key: string): key is T {
  return list.some(item => item === key);
}

/**
 * Validate an untyped options object (parsed JSON, request body).
 * Keys may be camelCase or snake_case; "popup" placement is read as "linked".
 */
export function parseConfigObject(raw: unknown): ConfigInput {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const result: ConfigInput = {};
  for (const [rawKey, value] of Object.entries(raw)) {
    const key = camelCase(rawKey);

    if (includes(STRING_OPTIONS, key)) {
      if (typeof value !== 'string') throw new ConfigError(`${rawKey} must be a string`, key);
      result[key] = value;
    } else if (includes(NUMBER_OPTIONS, key)) {
      if (typeof value !== 'number') throw new ConfigError(`${rawKey} must be a number`, key);
      result[key] = value;
    } else if (includes(BOOLEAN_OPTIONS, key)) {
      if (typeof value !== 'boolean') throw new ConfigError(`${rawKey} must be a boolean`, key);
      result[key] = value;
    } else if (key === 'ignoreArticles') {
      if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ConfigError(`${rawKey} must be a list of strings`, key);
      }
      result.ignoreArticles = value;
    } else if (key === 'notePlacement') {
      const placement = value === 'popup' ? 'linked' : value;
      if (!isNotePlacement(placement)) {
        throw new ConfigError(`${rawKey} must be one of ${NOTE_PLACEMENTS.join(', ')}`, key);
      }
      result.notePlacement = placement;
    } else if (key === 'footnoteNumbering' || key === 'endnoteNumbering') {
      if (!isNumberingStyle(value)) {
        throw new ConfigError(`${rawKey} must be one of ${NUMBERING_STYLES.join(', ')}`, key);
      }
      result[key] = value;
    } else if (key === 'preset') {
      if (!isPresetName(value)) throw new ConfigError(`Unknown preset: ${String(value)}`, key);
      result.preset = value;
    } else {
      throw new ConfigError(`Unknown configuration option: ${rawKey}`, key);
    }
  }
  return result;
}

function requireInteger(config: EngineConfig, key: KeysOfType<EngineConfig, number>, min: number, max = Infinity): void {
  const value = config[key];
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${key} must be an integer ${range}, got ${value}`, key);
  }
}

function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.Collator.supportedLocalesOf([locale]).length > 0;
  } catch {
    // RangeError: not a well-formed language tag
    return false;
  }
}

/**
 * Merge defaults, preset and overrides, then validate the result.
 */
export function resolveConfig(input: ConfigInput = {}): EngineConfig {
  const { preset = 'default', ...rest } = input;
  // An option given as undefined keeps its default
  const overrides: Partial<EngineConfig> = {};
  for (const key of CONFIG_KEYS) {
    copyDefined(overrides, rest, key);
  }
  const config: EngineConfig = {
    ...DEFAULT_CONFIG,
    ignoreArticles: [...DEFAULT_CONFIG.ignoreArticles],
    ...PRESETS[preset],
    ...overrides
  };

  if (!SAFE_ID.test(config.idPrefix)) {
    throw new ConfigError(`idPrefix must match ${SAFE_ID.source}, got "${config.idPrefix}"`, 'idPrefix');
  }
  // md5 hex digests are 32 characters long
  requireInteger(config, 'collisionSuffixLength', 1, 32);
  requireInteger(config, 'maxIdLength', config.idPrefix.length + config.collisionSuffixLength + 4);
  requireInteger(config, 'maxCollisionAttempts', 1);
  requireInteger(config, 'maxTocDepth', 1);
  requireInteger(config, 'maxIndexDepth', 1);
  requireInteger(config, 'maxEntriesPerLetter', 1);
  requireInteger(config, 'minFuzzyMatchLength', 1);

  if (!isNotePlacement(config.notePlacement)) {
    throw new ConfigError(`Unknown note placement: ${config.notePlacement}`, 'notePlacement');
  }
  if (!isNumberingStyle(config.footnoteNumbering) || !isNumberingStyle(config.endnoteNumbering)) {
    throw new ConfigError('Numbering styles must be numeric, roman or alpha', 'footnoteNumbering');
  }
  if (!isSupportedLocale(config.locale)) {
    throw new ConfigError(`Unsupported locale: ${config.locale}`, 'locale');
  }
  if (config.notesFileName === config.indexFileName) {
    throw new ConfigError('notesFileName and indexFileName must differ', 'notesFileName');
  }

  return config;
}

/**
 * Load configuration from a JSON file. Without a path the defaults apply.
 */
export async function loadConfig(configPath?: string, overrides: ConfigInput = {}): Promise<EngineConfig> {
  if (!configPath) {
    return resolveConfig(overrides);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  console.log(`Loaded config from ${configPath}`);
  return resolveConfig({ ...parseConfigObject(raw), ...overrides });
}
