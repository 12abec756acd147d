import { describe, it, expect, vi, afterEach } from 'vitest';
import { MatchPageScraper, DEFAULT_USER_AGENT, loadMatchPage } from '../src/scraper';
import { HttpError } from '../src/errors';
import { createLogger } from '../src/reliability';
import { fullMatchPage, matchHtml } from './fixtures/match-page';

const reliability = {
  rateLimiter: { minDelayMs: 0, jitterMs: 0 },
  retry: { initialDelayMs: 0, maxRetries: 1 },
};
const logger = createLogger('test', 'error');

describe('MatchPageScraper', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('fetches and parses a page', async () => {
    const html = matchHtml(['<table id="stats_a1b2c3d4_summary"></table>']);
    const fetchMock = vi.fn().mockResolvedValue(new Response(html, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const scraper = new MatchPageScraper({ reliability, logger });
    const page = await scraper.fetchPage('https://fbref.com/en/matches/0000aaaa/Home-FC-Away-FC');

    expect(page.url).toBe('https://fbref.com/en/matches/0000aaaa/Home-FC-Away-FC');
    expect(page.$('table').attr('id')).toBe('stats_a1b2c3d4_summary');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][1].headers['User-Agent']).toBe(DEFAULT_USER_AGENT);
  });

  it('sends a configured user agent', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('<html></html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new MatchPageScraper({ reliability, logger, userAgent: 'matchstats-test' }).fetchPage('https://a.test/1');

    expect(fetchMock.mock.calls[0][1].headers['User-Agent']).toBe('matchstats-test');
  });

  it('fails with HttpError on a missing page without retrying', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const fetchMock = vi.fn().mockResolvedValue(new Response('not found', { status: 404 }));
    vi.stubGlobal('fetch', fetchMock);

    const scraper = new MatchPageScraper({ reliability, logger });

    await expect(scraper.fetchPage('https://a.test/missing')).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries a server error', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('<html><body>ok</body></html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const page = await new MatchPageScraper({ reliability, logger }).fetchPage('https://a.test/1');

    expect(page.$('body').text()).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe('loadMatchPage', () => {
  it('builds a queryable page', () => {
    expect(fullMatchPage().$('table').length).toBe(5);
    expect(loadMatchPage('u', '<p>hi</p>').$('p').text()).toBe('hi');
  });
});
