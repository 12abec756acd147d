import { writeFile } from 'node:fs/promises';
import { parseCliArgs, printUsage, type CliOptions } from './cli';
import { loadConfig, mergeConfigWithCli } from './config';
import { createLogger, type Logger } from './reliability';
import { MatchPageScraper } from './scraper';
import { MultiPageScraper, splitUrls } from './multi-scraper';
import { SettingsStore, resolveSettingsPath } from './settings';
import { createPrompter, type Prompter } from './prompt';
import { runReconciliation } from './workflow';
import { scrapeMatch } from './match-stats';
import { formatCsv, formatJson, toRecords } from './export';
import type { MatchPage } from './tables';

async function fetchPages(urls: string[], options: CliOptions, logger: Logger): Promise<MatchPage[]> {
  const scraper = new MatchPageScraper({ userAgent: options.userAgent, logger: logger.child('scraper') });
  const multi = new MultiPageScraper({
    urls,
    scraper,
    concurrency: options.concurrency,
    onProgress: (progress) => {
      logger.info(`Fetched ${progress.completed + progress.failed}/${progress.total} pages`);
    },
  });

  const outcome = await multi.run();
  for (const result of outcome.results.filter((r) => !r.success)) {
    logger.warn('Page could not be fetched', { url: result.url, error: result.error });
  }

  if (outcome.pages.length === 0) {
    throw new Error('None of the reference pages could be fetched');
  }
  return outcome.pages;
}

async function reconcile(options: CliOptions, prompter: Prompter, logger: Logger): Promise<void> {
  let urls = options.urls;
  if (urls.length === 0) {
    console.log(
      'Provide match report urls to scan for available variables. ' +
        'Variables not in at least one of these pages will be ignored by the scraper.\n' +
        'A recent match from the top five European leagues or the Champions League ' +
        'should contain all the possible variables.'
    );
    urls = splitUrls(await prompter.ask('Reference URL(s): '));
  }
  if (urls.length === 0) {
    throw new Error('No reference urls given');
  }

  const store = await SettingsStore.open(resolveSettingsPath(process.cwd(), options.settingsPath), logger.child('settings'));
  const pages = await fetchPages(urls, options, logger);

  const outcome = await runReconciliation({
    pages,
    store,
    confirm: prompter.confirm,
    assumeYes: options.yes,
    summaryThreshold: options.summaryThreshold,
    logger: logger.child('reconcile'),
  });
  logger.debug('Reconciliation outcome', { state: outcome.state, history: outcome.history });
}

async function scrape(options: CliOptions, logger: Logger): Promise<void> {
  if (options.urls.length === 0) {
    throw new Error('scrape needs at least one match url');
  }

  const store = await SettingsStore.open(resolveSettingsPath(process.cwd(), options.settingsPath), logger.child('settings'));
  const settings = store.read();
  const pages = await fetchPages(options.urls, options, logger);
  const matches = pages.map((page) => scrapeMatch(page, settings));

  const body = options.format === 'csv' ? formatCsv(toRecords(matches)) : formatJson(matches);
  if (options.output) {
    await writeFile(options.output, body + '\n');
    logger.info(`Wrote ${matches.length} match(es) to ${options.output}`);
  } else {
    process.stdout.write(body + '\n');
  }
}

async function main() {
  const cliOptions = parseCliArgs(process.argv.slice(2));

  if (cliOptions.help) {
    printUsage();
    return;
  }

  const options = cliOptions.configPath
    ? mergeConfigWithCli(cliOptions, loadConfig(cliOptions.configPath))
    : cliOptions;
  const logger = createLogger('matchstats', options.logLevel, options.logFormat);

  if (options.command === 'scrape') {
    await scrape(options, logger);
  } else {
    await reconcile(options, createPrompter(), logger);
  }
}

main().catch((error) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
