import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_CONCURRENCY, PhotoDiscoveryOptions } from './discovery/VisualDataDiscovery';
import type { Logger } from './logger';
import { ExtensionMatchMode, MissingDigitsPolicy } from './types/VisualDataType';

export const MATCH_MODES = ['substring', 'suffix'] as const;
export const MISSING_DIGITS_POLICIES = ['zero', 'exclude'] as const;

const KNOWN_KEYS = new Set([
  'exif',
  'matchMode',
  'missingDigits',
  'concurrency',
  'ignore',
]);

export interface VisualDiscoverConfigInput {
  exif?: unknown;
  matchMode?: unknown;
  missingDigits?: unknown;
  concurrency?: unknown;
  ignore?: unknown;
}

export interface DiscoverySettings {
  exif: boolean;
  matchMode: ExtensionMatchMode;
  missingDigits: MissingDigitsPolicy;
  concurrency: number;
  ignore: string[];
}

export interface VisualDiscoverConfig extends DiscoverySettings {
  /** File the settings came from; undefined for built-in defaults */
  sourcePath?: string;
}

/**
 * Values that win over the file, typically from CLI flags
 */
export type ConfigOverrides = Partial<DiscoverySettings>;

export const DEFAULT_SETTINGS: Readonly<DiscoverySettings> = {
  exif: true,
  matchMode: 'substring',
  missingDigits: 'zero',
  concurrency: DEFAULT_CONCURRENCY,
  ignore: [],
};

export class DiscoveryConfigError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'DiscoveryConfigError';
  }
}

export async function loadConfig(
  providedPath: string,
  overrides: ConfigOverrides = {}
): Promise<VisualDiscoverConfig> {
  const absolutePath = path.resolve(providedPath);
  let fileContents: string;
  try {
    fileContents = await fs.readFile(absolutePath, 'utf8');
  } catch (error) {
    throw new DiscoveryConfigError(
      `Unable to read config at ${absolutePath}: ${(error as Error).message}`,
      error
    );
  }

  if (!fileContents.trim()) {
    throw new DiscoveryConfigError('Config file is empty.');
  }

  const parsed = parseConfigFile(fileContents, absolutePath);
  return { ...normalizeConfig(parsed, overrides), sourcePath: absolutePath };
}

export function loadInlineConfig(
  config: VisualDiscoverConfigInput = {},
  overrides: ConfigOverrides = {}
): VisualDiscoverConfig {
  return normalizeConfig(config, overrides);
}

/**
 * Translate settings into the options the discovery functions take
 */
export function toDiscoveryOptions(
  config: DiscoverySettings,
  logger?: Logger
): PhotoDiscoveryOptions {
  return {
    exif: config.exif,
    matchMode: config.matchMode,
    missingDigits: config.missingDigits,
    concurrency: config.concurrency,
    ignore: [...config.ignore],
    logger,
  };
}

function parseConfigFile(contents: string, filename: string): unknown {
  const ext = path.extname(filename).toLowerCase();
  if (ext && ext !== '.json') {
    throw new DiscoveryConfigError(
      `Unsupported config extension "${ext}". Use JSON.`
    );
  }

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new DiscoveryConfigError(
      `Unable to parse config file ${filename} as JSON.`,
      error
    );
  }
}

function normalizeConfig(
  rawConfig: unknown,
  overrides: ConfigOverrides
): DiscoverySettings {
  if (!isPlainObject(rawConfig)) {
    throw new DiscoveryConfigError('Config root must be an object.');
  }

  const unknownKeys = Object.keys(rawConfig).filter(key => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new DiscoveryConfigError(
      `Unknown config key(s): ${unknownKeys.join(', ')}.`
    );
  }

  const exif =
    overrides.exif ??
    expectOptionalBoolean(rawConfig.exif, 'exif') ??
    DEFAULT_SETTINGS.exif;

  const matchMode =
    overrides.matchMode ??
    expectOptionalChoice(rawConfig.matchMode, 'matchMode', MATCH_MODES) ??
    DEFAULT_SETTINGS.matchMode;

  const missingDigits =
    overrides.missingDigits ??
    expectOptionalChoice(
      rawConfig.missingDigits,
      'missingDigits',
      MISSING_DIGITS_POLICIES
    ) ??
    DEFAULT_SETTINGS.missingDigits;

  const concurrency =
    overrides.concurrency ??
    (rawConfig.concurrency === undefined
      ? DEFAULT_SETTINGS.concurrency
      : expectPositiveInteger(rawConfig.concurrency, 'concurrency'));

  const ignore = dedupeStrings([
    ...(rawConfig.ignore === undefined
      ? []
      : validateStringArray(rawConfig.ignore, 'ignore')),
    ...(overrides.ignore ?? []),
  ]);

  return { exif, matchMode, missingDigits, concurrency, ignore };
}

function validateStringArray(value: unknown, label: string): string[] {
  if (!Array.isArray(value)) {
    throw new DiscoveryConfigError(`${label} must be an array of strings.`);
  }
  return value.map((entry, index) =>
    expectString(entry, `${label}[${index}]`, { allowEmpty: false })
  );
}

export function expectString(
  value: unknown,
  label: string,
  options: { allowEmpty?: boolean } = {}
): string {
  if (typeof value !== 'string') {
    throw new DiscoveryConfigError(`${label} must be a string.`);
  }
  if (!options.allowEmpty && value.trim().length === 0) {
    throw new DiscoveryConfigError(`${label} cannot be empty.`);
  }
  return value;
}

function expectOptionalBoolean(
  value: unknown,
  label: string
): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new DiscoveryConfigError(`${label} must be a boolean.`);
  }
  return value;
}

export function expectOptionalChoice<T extends string>(
  value: unknown,
  label: string,
  choices: readonly T[]
): T | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const match = choices.find(choice => choice === value);
  if (match === undefined) {
    throw new DiscoveryConfigError(
      `${label} must be one of: ${choices.join(', ')}.`
    );
  }
  return match;
}

export function expectPositiveInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new DiscoveryConfigError(`${label} must be a positive integer.`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function dedupeStrings(items: string[]): string[] {
  return Array.from(new Set(items));
}
