import { parseArgs } from 'node:util';
import { isLogFormat, isLogLevel, type LogFormat, type LogLevel } from './reliability/logger';
import { splitUrls } from './multi-scraper';
import { DEFAULT_SUMMARY_THRESHOLD } from './reconcile';
import type { ExportFormat } from './export';

export type Command = 'reconcile' | 'scrape';

/** Options a config file may supply when the flag was not given. */
export type DefaultedOption = 'concurrency' | 'summaryThreshold' | 'logFormat' | 'logLevel';

const DEFAULT_CONCURRENCY = '2';
const DEFAULT_LOG_FORMAT = 'text';
const DEFAULT_LOG_LEVEL = 'info';

export interface CliOptions {
  command: Command;
  urls: string[];
  settingsPath?: string;
  configPath?: string;
  yes: boolean;
  concurrency: number;
  summaryThreshold: number;
  format: ExportFormat;
  output?: string;
  userAgent?: string;
  help: boolean;
  logFormat: LogFormat;
  logLevel: LogLevel;
  /** Defaulted options that were set on the command line */
  explicit: DefaultedOption[];
}

function parseCommand(value: string | undefined): Command {
  if (value === undefined || value === 'reconcile') {
    return 'reconcile';
  }
  if (value === 'scrape') {
    return 'scrape';
  }
  throw new Error(`Unknown command: ${value}`);
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new Error(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > 1) {
    throw new Error(`--summary-threshold must be in (0, 1], got "${value}"`);
  }
  return parsed;
}

function isDefaultedOption(value: string): value is DefaultedOption {
  return ['concurrency', 'summaryThreshold', 'logFormat', 'logLevel'].includes(value);
}

/**
 * Parses command-line arguments into CLI options.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args,
    options: {
      urls: {
        type: 'string',
        short: 'u',
        multiple: true,
        default: [],
      },
      settings: {
        type: 'string',
        short: 's',
      },
      config: {
        type: 'string',
      },
      yes: {
        type: 'boolean',
        short: 'y',
        default: false,
      },
      concurrency: {
        type: 'string',
      },
      'summary-threshold': {
        type: 'string',
      },
      format: {
        type: 'string',
        short: 'f',
        default: 'json',
      },
      output: {
        type: 'string',
        short: 'o',
      },
      'user-agent': {
        type: 'string',
      },
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
      'log-format': {
        type: 'string',
      },
      'log-level': {
        type: 'string',
      },
    },
    allowPositionals: true,
  });

  const [commandArg, ...urlArgs] = positionals;
  const command = parseCommand(commandArg);

  const logFormat = values['log-format'] ?? DEFAULT_LOG_FORMAT;
  if (!isLogFormat(logFormat)) {
    throw new Error(`--log-format must be text or json, got "${logFormat}"`);
  }
  const logLevel = values['log-level'] ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(logLevel)) {
    throw new Error(`--log-level must be debug, info, warn or error, got "${logLevel}"`);
  }
  const format = values.format ?? 'json';
  if (format !== 'json' && format !== 'csv') {
    throw new Error(`--format must be json or csv, got "${format}"`);
  }

  const given: Record<DefaultedOption, string | undefined> = {
    concurrency: values.concurrency,
    summaryThreshold: values['summary-threshold'],
    logFormat: values['log-format'],
    logLevel: values['log-level'],
  };
  const explicit = Object.entries(given)
    .filter(([, value]) => value !== undefined)
    .map(([option]) => option)
    .filter(isDefaultedOption);

  const urls = [...(values.urls ?? []).flatMap(splitUrls), ...urlArgs];

  return {
    command,
    urls,
    settingsPath: values.settings,
    configPath: values.config,
    yes: values.yes ?? false,
    concurrency: parsePositiveInt(values.concurrency ?? DEFAULT_CONCURRENCY, 'concurrency'),
    summaryThreshold: parseThreshold(values['summary-threshold'] ?? String(DEFAULT_SUMMARY_THRESHOLD)),
    format,
    output: values.output,
    userAgent: values['user-agent'],
    help: values.help ?? false,
    logFormat,
    logLevel,
    explicit,
  };
}

/**
 * Prints usage information to the console.
 */
export function printUsage(): void {
  console.log(`
Usage: npm run dev -- [command] [options]

Commands:
  reconcile             Check sample match pages against the settings file (default)
  scrape <url...>       Extract the stat tables of match pages using the settings file

Options:
  --urls, -u            Comma separated reference match urls (repeatable, prompted if omitted)
  --settings, -s        Path to the YAML settings file (default: config.user.yml, then config.yml)
  --config              Path to JSON config file
  --yes, -y             Save changes without asking
  --concurrency         Pages fetched at once (default: 2)
  --summary-threshold   Share of tables a summary variable must exceed to stay in summary (default: 0.7)
  --format, -f          scrape output: json or csv (default: json)
  --output, -o          scrape output file (default: stdout)
  --user-agent          User-Agent header for requests
  --log-format          Log format: text or json (default: text)
  --log-level           Log level: debug, info, warn, error (default: info)
  --help, -h            Show this help message

Examples:
  npm run dev -- reconcile
  npm run dev -- reconcile -u https://fbref.com/en/matches/0a1b2c3d/Home-Away
  npm run dev -- scrape https://fbref.com/en/matches/0a1b2c3d/Home-Away --format csv -o match.csv
  npm run dev -- --config matchstats.json --log-level debug
`);
}
