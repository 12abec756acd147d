import * as cheerio from 'cheerio';
import type { MatchPage } from './tables';
import {
  createLogger,
  createReliabilityWrapper,
  resolveReliabilityConfig,
  type Logger,
  type ReliabilityOverrides,
  type ReliabilityWrapper,
} from './reliability';
import { HttpError } from './errors';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface ScraperConfig {
  userAgent?: string;
  reliability?: ReliabilityOverrides;
  logger?: Logger;
}

export function loadMatchPage(url: string, html: string): MatchPage {
  return { url, $: cheerio.load(html) };
}

/**
 * Fetches match report pages through the reliability wrapper and parses them.
 * One instance should be shared by all fetches of a run so requests stay spaced.
 */
export class MatchPageScraper {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly reliability: ReliabilityWrapper;

  constructor(config: ScraperConfig = {}) {
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = resolveReliabilityConfig(config.reliability).requestTimeoutMs;
    this.logger = config.logger ?? createLogger('scraper');
    this.reliability = createReliabilityWrapper(config.reliability, this.logger.child('reliability'));
  }

  async fetchPage(url: string): Promise<MatchPage> {
    const html = await this.reliability.execute(() => this.request(url), url);
    this.logger.debug('Fetched page', { url, bytes: html.length });
    return loadMatchPage(url, html);
  }

  private async request(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpError(response.status, url);
      }

      return await response.text();
    } finally {
      clearTimeout(timeout);
    }
  }
}
