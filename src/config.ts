import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import type { CliOptions, DefaultedOption } from './cli';

export const ConfigSchema = z.object({
  concurrency: z.number().int().positive().optional(),
  logFormat: z.enum(['json', 'text']).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  summaryThreshold: z.number().gt(0).lte(1).optional(),
  userAgent: z.string().min(1).optional(),
  settingsPath: z.string().min(1).optional(),
  urls: z.array(z.string().url()).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  const content = readFileSync(path, 'utf-8');
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${path}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const firstIssue = result.error.issues[0];
    const field = firstIssue.path.join('.') || 'root';
    throw new Error(`Invalid config: ${field} - ${firstIssue.message}`);
  }

  return result.data;
}

/**
 * Config file values fill in for options left at their CLI defaults.
 * Reference urls given on the command line win over configured ones.
 */
export function mergeConfigWithCli(cli: CliOptions, config: Config | undefined): CliOptions {
  if (!config) {
    return cli;
  }

  const pick = <K extends DefaultedOption>(option: K, configured: CliOptions[K] | undefined): CliOptions[K] =>
    cli.explicit.includes(option) ? cli[option] : (configured ?? cli[option]);

  return {
    ...cli,
    urls: cli.urls.length > 0 ? cli.urls : (config.urls ?? []),
    concurrency: pick('concurrency', config.concurrency),
    logFormat: pick('logFormat', config.logFormat),
    logLevel: pick('logLevel', config.logLevel),
    summaryThreshold: pick('summaryThreshold', config.summaryThreshold),
    userAgent: cli.userAgent ?? config.userAgent,
    settingsPath: cli.settingsPath ?? config.settingsPath,
  };
}
