import pLimit from 'p-limit';
import type { MatchPage } from './tables';
import type { MatchPageScraper } from './scraper';

export interface MultiScraperConfig {
  urls: string[];
  scraper: Pick<MatchPageScraper, 'fetchPage'>;
  concurrency?: number;
  onProgress?: (progress: FetchProgress) => void;
}

export interface PageResult {
  url: string;
  success: boolean;
  error?: string;
}

export interface FetchProgress {
  total: number;
  completed: number;
  failed: number;
  results: PageResult[];
}

export interface FetchOutcome extends FetchProgress {
  /** Successfully fetched pages, in the order of the input urls */
  pages: MatchPage[];
}

/**
 * Fetches several match pages concurrently. A failed page is recorded in the
 * results and does not stop the others.
 */
export class MultiPageScraper {
  private config: MultiScraperConfig;

  constructor(config: MultiScraperConfig) {
    this.config = config;
  }

  async run(): Promise<FetchOutcome> {
    const limit = pLimit(this.config.concurrency ?? 1);
    const progress: FetchProgress = {
      total: this.config.urls.length,
      completed: 0,
      failed: 0,
      results: [],
    };

    const fetched = await Promise.all(
      this.config.urls.map((url) => limit(() => this.fetchOne(url, progress)))
    );

    return {
      ...progress,
      pages: fetched.filter((page): page is MatchPage => page !== undefined),
    };
  }

  private async fetchOne(url: string, progress: FetchProgress): Promise<MatchPage | undefined> {
    let page: MatchPage | undefined;

    try {
      page = await this.config.scraper.fetchPage(url);
      progress.completed++;
      progress.results.push({ url, success: true });
    } catch (error) {
      progress.failed++;
      progress.results.push({
        url,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.config.onProgress?.(progress);
    return page;
  }
}

/**
 * Splits a comma separated list of urls as typed at the prompt.
 */
export function splitUrls(input: string): string[] {
  return input
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}
