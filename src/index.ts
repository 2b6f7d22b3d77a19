import {
  ConfigOverrides,
  DiscoveryConfigError,
  MATCH_MODES,
  MISSING_DIGITS_POLICIES,
  VisualDiscoverConfig,
  expectPositiveInteger,
  loadConfig,
  loadInlineConfig,
  toDiscoveryOptions,
} from './config';
import {
  discoverSequence,
  discoverUsingType,
} from './discovery/VisualDataDiscovery';
import { logger, setLogLevel } from './logger';
import { DiscoveryResult } from './types/VisualData';
import { VisualDataType } from './types/VisualDataType';
import { findGlobalConfigPath, getGlobalConfigPath } from './utils/homeDir';

const VERSION = '0.1.0';

const TYPE_CHOICES = ['photo', 'video', 'auto'] as const;
type TypeChoice = (typeof TYPE_CHOICES)[number];

export class VisualDiscoverCliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VisualDiscoverCliError';
  }
}

export type DiscoverCommandOptions = {
  directory: string;
  type: TypeChoice;
  config?: string;
  verbose?: boolean;
  overrides: ConfigOverrides;
};

type ValidateCommandOptions = {
  config?: string;
};

export type ParsedArgs =
  | { kind: 'discover'; options: DiscoverCommandOptions }
  | { kind: 'validate'; options: ValidateCommandOptions };

export interface CliOutput {
  write: (text: string) => void;
}

const stdoutOutput: CliOutput = {
  write: text => {
    process.stdout.write(text);
  },
};

export async function runCli(
  argv: string[] = process.argv,
  output: CliOutput = stdoutOutput
): Promise<void> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printHelp(output);
    return;
  }

  if (args.includes('--version') || args.includes('-v')) {
    output.write(`${VERSION}\n`);
    return;
  }

  const parsed = parseArgs(args);

  if (parsed.kind === 'validate') {
    const config = await resolveConfig(parsed.options.config, {});
    printConfigSummary(config);
    logger.info('Configuration looks good.');
    return;
  }

  await handleDiscoverCommand(parsed.options, output);
}

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0) {
    throw new VisualDiscoverCliError('Provide a directory or the validate command.');
  }

  const [first, ...rest] = args;
  if (first === 'validate') {
    return { kind: 'validate', options: parseValidateOptions(rest) };
  }
  if (first.startsWith('-')) {
    throw new VisualDiscoverCliError('Provide a directory before specifying options.');
  }
  return { kind: 'discover', options: parseDiscoverOptions(first, rest) };
}

function parseValidateOptions(tokens: string[]): ValidateCommandOptions {
  const options: ValidateCommandOptions = {};
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      throw new VisualDiscoverCliError(`Unexpected argument "${token}".`);
    }
    const { flag, inlineValue } = splitFlagToken(token);
    switch (flag) {
      case '--config':
      case '-c': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.config = value;
        i = nextIndex;
        break;
      }
      default:
        throw new VisualDiscoverCliError(`Unknown option "${flag}".`);
    }
  }
  return options;
}

function parseDiscoverOptions(directory: string, tokens: string[]): DiscoverCommandOptions {
  const options: DiscoverCommandOptions = { directory, type: 'auto', overrides: {} };
  const ignore: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      throw new VisualDiscoverCliError(`Unexpected argument "${token}".`);
    }
    const { flag, inlineValue } = splitFlagToken(token);
    switch (flag) {
      case '--config':
      case '-c': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.config = value;
        i = nextIndex;
        break;
      }
      case '--type':
      case '-t': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.type = cliChoice(value, flag, TYPE_CHOICES);
        i = nextIndex;
        break;
      }
      case '--match': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.overrides.matchMode = cliChoice(value, flag, MATCH_MODES);
        i = nextIndex;
        break;
      }
      case '--missing-digits': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.overrides.missingDigits = cliChoice(value, flag, MISSING_DIGITS_POLICIES);
        i = nextIndex;
        break;
      }
      case '--concurrency': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        options.overrides.concurrency = cliPositiveInteger(value, flag);
        i = nextIndex;
        break;
      }
      case '--ignore': {
        const { value, nextIndex } = consumeOptionValue(flag, inlineValue, tokens, i);
        ignore.push(value);
        i = nextIndex;
        break;
      }
      case '--exif':
        options.overrides.exif = true;
        break;
      case '--no-exif':
        options.overrides.exif = false;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      default:
        throw new VisualDiscoverCliError(`Unknown option "${flag}".`);
    }
  }
  if (ignore.length > 0) {
    options.overrides.ignore = ignore;
  }
  return options;
}

function splitFlagToken(token: string): { flag: string; inlineValue?: string } {
  if (token.startsWith('--')) {
    const eqIndex = token.indexOf('=');
    if (eqIndex !== -1) {
      return { flag: token.slice(0, eqIndex), inlineValue: token.slice(eqIndex + 1) };
    }
  }
  return { flag: token };
}

function consumeOptionValue(
  flag: string,
  inlineValue: string | undefined,
  tokens: string[],
  currentIndex: number
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined && inlineValue.length > 0) {
    return { value: inlineValue, nextIndex: currentIndex };
  }
  const nextToken = tokens[currentIndex + 1];
  if (!nextToken) {
    throw new VisualDiscoverCliError(`Option ${flag} requires a value.`);
  }
  return { value: nextToken, nextIndex: currentIndex + 1 };
}

function cliChoice<T extends string>(value: string, flag: string, choices: readonly T[]): T {
  const choice = choices.find(candidate => candidate === value);
  if (choice === undefined) {
    throw new VisualDiscoverCliError(`Option ${flag} must be one of: ${choices.join(', ')}.`);
  }
  return choice;
}

function cliPositiveInteger(value: string, flag: string): number {
  try {
    return expectPositiveInteger(Number(value), flag);
  } catch {
    throw new VisualDiscoverCliError(`Option ${flag} must be a positive integer.`);
  }
}

async function handleDiscoverCommand(
  options: DiscoverCommandOptions,
  output: CliOutput
): Promise<void> {
  if (options.verbose) {
    setLogLevel('debug');
    logger.info('Verbose logging enabled.');
  }

  const config = await resolveConfig(options.config, options.overrides);
  printConfigSummary(config);

  const discoveryOptions = toDiscoveryOptions(config, logger.child({ scope: 'cli' }));
  const result =
    options.type === 'auto'
      ? await discoverSequence(options.directory, discoveryOptions)
      : await discoverUsingType(
          options.directory,
          options.type === 'photo' ? VisualDataType.PHOTO : VisualDataType.VIDEO,
          discoveryOptions
        );

  logger.info(
    { directory: options.directory, type: result.type, count: result.records.length },
    'Discovery finished.'
  );
  output.write(`${formatResult(result)}\n`);
}

/**
 * Render a discovery result as JSON; dates become ISO strings
 */
export function formatResult(result: DiscoveryResult): string {
  return JSON.stringify({ type: result.type, records: result.records }, null, 2);
}

async function resolveConfig(
  provided: string | undefined,
  overrides: ConfigOverrides
): Promise<VisualDiscoverConfig> {
  if (provided) {
    return loadConfig(provided, overrides);
  }
  const globalPath = await findGlobalConfigPath();
  if (globalPath) {
    logger.info({ globalConfig: globalPath }, 'Using global config.');
    return loadConfig(globalPath, overrides);
  }
  return loadInlineConfig({}, overrides);
}

function printConfigSummary(config: VisualDiscoverConfig): void {
  logger.info(
    {
      configPath: config.sourcePath ?? '(defaults)',
      exif: config.exif,
      matchMode: config.matchMode,
      missingDigits: config.missingDigits,
      concurrency: config.concurrency,
      ignore: config.ignore,
    },
    'Loaded visual-discover config.'
  );
}

function printHelp(output: CliOutput): void {
  const lines = [
    `visual-discover v${VERSION}`,
    'Usage: visual-discover <directory> [options]',
    '       visual-discover validate [-c <path>]',
    '',
    'Options:',
    '  -t, --type <photo|video|auto>       Kind of files to discover (default: auto).',
    '      --exif / --no-exif              Require GPS position and time from EXIF.',
    '      --match <substring|suffix>      Extension matching mode.',
    '      --missing-digits <zero|exclude> Digitless file names sort first or are dropped.',
    '      --concurrency <n>               Files read at the same time.',
    '      --ignore <glob>                 Skip matching file names (repeatable).',
    '  -c, --config <path>                 Path to config (JSON).',
    '      --verbose                       Enable debug logging.',
    '  -h, --help                          Show this help message.',
    '  -v, --version                       Show CLI version.',
    '',
    `Defaults are read from ${getGlobalConfigPath()} when present.`,
  ];
  output.write(`${lines.join('\n')}\n`);
}

export { loadConfig, loadInlineConfig, DiscoveryConfigError };
export * from './discovery/VisualDataDiscovery';
export * from './discovery/policies';
export * from './discovery/ordering';
export * from './types/VisualData';
export * from './types/VisualDataType';
export { ExifExtractor } from './metadata/ExifExtractor';
export type { ExifTags, TagReader } from './metadata/ExifExtractor';
