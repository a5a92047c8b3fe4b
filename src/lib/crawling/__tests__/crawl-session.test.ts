/**
 * Crawl Session Tests
 * End-to-end crawls against an in-process fake site
 */

import { CrawlEvent, CrawlSession, runCrawlSession } from '../crawl-session';
import { ConfigurationError } from '../crawl-config';
import { SeedConfiguration } from '../crawling.types';
import type { PageModel } from '../../page-model/page-model.types';
import { FakeSite, FakeHandler } from '../../../__tests__/helpers/fake-site';
import { createSilentLogger, HTML_HEADERS, htmlPage, SITE, testSeed } from '../../../__tests__/helpers/fixtures';

function page(links: string[] = [], extra: { body?: string; delayMs?: number } = {}): FakeHandler {
  return { headers: HTML_HEADERS, body: htmlPage({ links, body: extra.body }), delayMs: extra.delayMs };
}

function createSession(site: FakeSite, overrides: Partial<SeedConfiguration> = {}) {
  const logger = createSilentLogger();
  const session = new CrawlSession(testSeed(overrides), { httpClient: site.client, logger });
  return { session, logger };
}

describe('CrawlSession', () => {
  it('should resolve redirects into final URLs and flag the duplicate body', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/about', '/old']),
      [`${SITE}/about`]: page(),
      [`${SITE}/old`]: { status: 301, headers: { Location: '/about' } },
    });
    const { session } = createSession(site);

    const report = await session.run();

    expect(report.stopReason).toBe('drained');
    expect(report.inventory.map((entry) => [entry.url, entry.outcome, entry.depth])).toEqual([
      [`${SITE}/`, 'fetched', 0],
      [`${SITE}/about`, 'fetched', 1],
      [`${SITE}/old`, 'fetched', 1],
    ]);

    const old = report.inventory.find((entry) => entry.url === `${SITE}/old`);
    expect(old?.finalUrl).toBe(`${SITE}/about`);
    expect(old?.redirectChain).toEqual([{ url: `${SITE}/old`, status: 301, location: `${SITE}/about` }]);

    expect(report.summary.uniqueFinalUrls).toBe(2);
    expect(report.summary.pagesFetched).toBe(3);
    expect(report.findings.filter((f) => f.evidence['kind'] === 'redirect-chain')).toEqual([]);
    expect(report.findings.filter((f) => f.checkId === 'duplicate-content').map((f) => f.url)).toEqual([
      `${SITE}/about`,
      `${SITE}/old`,
    ]);
  });

  it('should skip URLs robots.txt disallows without requesting them', async () => {
    const site = new FakeSite({
      [`${SITE}/robots.txt`]: { body: 'User-agent: *\nDisallow: /private/' },
      [`${SITE}/`]: page(['/private/report', '/public']),
      [`${SITE}/public`]: page(),
    });
    const { session, logger } = createSession(site);

    const report = await session.run();

    const skipped = report.inventory.find((entry) => entry.url === `${SITE}/private/report`);
    expect(skipped).toEqual(expect.objectContaining({ outcome: 'skipped-robots', status: null, attempts: 0 }));
    expect(site.requestsFor(`${SITE}/private/report`)).toHaveLength(0);
    expect(report.summary.pagesSkippedRobots).toBe(1);
    expect(logger.log).toHaveBeenCalledWith(`Crawl site.test: ${SITE}/private/report disallowed by robots.txt`);
  });

  it('should record server errors after retries and flag links to them', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/broken']),
      [`${SITE}/broken`]: { status: 500, body: 'down' },
    });
    const { session, logger } = createSession(site);

    const report = await session.run();

    const broken = report.inventory.find((entry) => entry.url === `${SITE}/broken`);
    expect(broken).toEqual(expect.objectContaining({ outcome: 'failed', status: 500, attempts: 3 }));
    expect(
      report.findings
        .filter((f) => f.severity === 'critical')
        .map((f) => [f.url, f.checkId, f.message])
    ).toEqual([
      [`${SITE}/`, 'broken-internal-link', `Broken internal anchor link to ${SITE}/broken (HTTP 500)`],
      [`${SITE}/broken`, 'status-integrity', 'Server error: HTTP 500'],
    ]);
    expect(logger.warn).toHaveBeenCalledWith(`Crawl site.test: ${SITE}/broken failed after 3 attempt(s): HTTP 500`);
  });

  it('should follow a redirect that only adds a trailing slash', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/about/']),
      [`${SITE}/about`]: { status: 301, headers: { Location: '/about/' } },
      [`${SITE}/about/`]: page([], { body: '<p>About us</p>' }),
    });
    const { session } = createSession(site);

    const report = await session.run();

    const about = report.inventory.find((entry) => entry.url === `${SITE}/about`);
    expect(about).toEqual(
      expect.objectContaining({
        outcome: 'fetched',
        status: 200,
        finalUrl: `${SITE}/about`,
        redirectChain: [{ url: `${SITE}/about`, status: 301, location: `${SITE}/about/` }],
        error: null,
      })
    );
    expect(report.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`, `${SITE}/about`]);
    expect(site.requestsFor(`${SITE}/about/`)).toHaveLength(1);
    expect(report.findings.filter((f) => f.checkId === 'status-integrity')).toEqual([]);
    expect(report.summary.pagesFailed).toBe(0);
  });

  it('should keep crawling past a URL that fails at the transport level', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a', '/b']),
      [`${SITE}/a`]: { error: new Error('connect ECONNREFUSED 10.0.0.1:443') },
      [`${SITE}/b`]: page(['/c']),
      [`${SITE}/c`]: page(),
    });
    const { session } = createSession(site);

    const report = await session.run();

    expect(report.stopReason).toBe('drained');
    expect(report.inventory.map((entry) => [entry.url, entry.outcome])).toEqual([
      [`${SITE}/`, 'fetched'],
      [`${SITE}/a`, 'failed'],
      [`${SITE}/b`, 'fetched'],
      [`${SITE}/c`, 'fetched'],
    ]);
    expect(report.inventory[1]).toEqual(
      expect.objectContaining({ status: null, attempts: 3, error: 'Network connection failed' })
    );
    expect(site.requestsFor(`${SITE}/a`)).toHaveLength(3);
    expect(
      report.findings.filter((f) => f.checkId === 'status-integrity').map((f) => [f.url, f.severity, f.message])
    ).toEqual([[`${SITE}/a`, 'critical', 'Fetch failed: Network connection failed']]);
  });

  it('should record a failed outcome when processing a page throws and carry on', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a', '/b']),
      [`${SITE}/a`]: page(['/only-from-a']),
      [`${SITE}/b`]: page(),
    });
    const { session, logger } = createSession(site);
    session.on(CrawlEvent.PAGE, (visited: PageModel) => {
      if (visited.url === `${SITE}/a`) throw new Error('listener failed');
    });

    const report = await session.run();

    expect(report.stopReason).toBe('drained');
    expect(report.inventory.map((entry) => [entry.url, entry.outcome])).toEqual([
      [`${SITE}/`, 'fetched'],
      [`${SITE}/a`, 'failed'],
      [`${SITE}/b`, 'fetched'],
    ]);
    expect(report.inventory[1]).toEqual(
      expect.objectContaining({ status: null, attempts: 0, error: 'listener failed' })
    );
    expect(logger.error).toHaveBeenCalledWith(`Crawl site.test: unexpected error processing ${SITE}/a:`, 'listener failed');
  });

  it('should include circuit breaker counters in the report when enabled', async () => {
    const site = new FakeSite({ [`${SITE}/`]: page() });
    const { session } = createSession(site, { circuitBreaker: { enabled: true, volumeThreshold: 5 } });

    const report = await session.run();

    expect(report.circuitBreakers).toEqual([
      expect.objectContaining({ host: 'site.test', state: 'closed', successes: 1, failures: 0, rejected: 0 }),
    ]);
  });

  it('should visit every URL of a link cycle once', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a']),
      [`${SITE}/a`]: page(['/']),
    });
    const { session } = createSession(site);

    const report = await session.run();

    expect(report.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`, `${SITE}/a`]);
    expect(site.requestsFor(`${SITE}/`)).toHaveLength(1);
    expect(site.requestsFor(`${SITE}/a`)).toHaveLength(1);
  });

  it('should stop admitting URLs once maxPages is reached', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a', '/b', '/c']),
      [`${SITE}/a`]: page(),
    });
    const { session } = createSession(site, { maxPages: 2 });

    const report = await session.run();

    expect(report.stopReason).toBe('drained');
    expect(report.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`, `${SITE}/a`]);
    expect(site.pageRequests().map((request) => request.url)).toEqual([`${SITE}/`, `${SITE}/a`]);
  });

  it('should not go deeper than maxDepth', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a']),
      [`${SITE}/a`]: page(['/b']),
    });
    const { session } = createSession(site, { maxDepth: 1 });

    const report = await session.run();

    expect(report.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`, `${SITE}/a`]);
    expect(site.requestsFor(`${SITE}/b`)).toHaveLength(0);
    expect(report.summary.maxDepthReached).toBe(1);
  });

  it('should not follow links to other sites', async () => {
    const site = new FakeSite({ [`${SITE}/`]: page(['https://other.test/x']) });
    const { session } = createSession(site);

    const report = await session.run();

    expect(report.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`]);
  });

  it('should skip resources when crawlResources is off', async () => {
    const routes = {
      [`${SITE}/`]: page(['/a'], { body: '<img src="/logo.png" alt="logo">' }),
      [`${SITE}/a`]: page(),
      [`${SITE}/logo.png`]: { headers: { 'content-type': 'image/png' }, body: 'png' },
    };

    const withResources = await createSession(new FakeSite(routes)).session.run();
    const withoutResources = await createSession(new FakeSite(routes), { crawlResources: false }).session.run();

    expect(withResources.inventory.map((entry) => entry.url)).toEqual([
      `${SITE}/`,
      `${SITE}/a`,
      `${SITE}/logo.png`,
    ]);
    expect(withoutResources.inventory.map((entry) => entry.url)).toEqual([`${SITE}/`, `${SITE}/a`]);
  });

  it('should keep per-host requests within the ceiling', async () => {
    const site = new FakeSite({
      [`${SITE}/`]: page(['/a', '/b', '/c']),
      [`${SITE}/a`]: page([], { delayMs: 10 }),
      [`${SITE}/b`]: page([], { delayMs: 10 }),
      [`${SITE}/c`]: page([], { delayMs: 10 }),
    });
    const { session } = createSession(site, { concurrency: 4, perHostConcurrency: 1 });

    await session.run();

    expect(site.maxConcurrency('site.test')).toBe(1);
  });

  it('should report robots.txt outages as a finding', async () => {
    const site = new FakeSite({
      [`${SITE}/robots.txt`]: { status: 503 },
      [`${SITE}/`]: page(),
    });
    const { session } = createSession(site);

    const report = await session.run();

    expect(report.findings.filter((f) => f.checkId === 'robots-unavailable')).toEqual([
      {
        checkId: 'robots-unavailable',
        severity: 'info',
        url: `${SITE}/robots.txt`,
        message: 'robots.txt unavailable for site.test (HTTP 503); crawled without restrictions',
        evidence: { host: 'site.test', status: 503, error: 'HTTP 503' },
      },
    ]);
    expect(report.hosts[0].degraded).toBe(true);
  });

  describe('stopping early', () => {
    it('should stop on cancel and record queued URLs as unvisited', async () => {
      const site = new FakeSite({
        [`${SITE}/`]: page(['/a', '/b', '/c']),
        [`${SITE}/a`]: page(),
        [`${SITE}/b`]: page(),
        [`${SITE}/c`]: page(),
      });
      const { session } = createSession(site, { concurrency: 1 });
      session.on(CrawlEvent.PAGE, (visited: PageModel) => {
        if (visited.url === `${SITE}/a`) session.cancel();
      });

      const report = await session.run();

      expect(report.stopReason).toBe('cancelled');
      expect(report.inventory.map((entry) => [entry.url, entry.outcome])).toEqual([
        [`${SITE}/`, 'fetched'],
        [`${SITE}/a`, 'fetched'],
        [`${SITE}/b`, 'unvisited'],
        [`${SITE}/c`, 'unvisited'],
      ]);
      expect(report.inventory[2].error).toBe('Not fetched: crawl cancelled');
      expect(site.requestsFor(`${SITE}/b`)).toHaveLength(0);
      expect(report.summary.pagesUnvisited).toBe(2);
    });

    it('should stop at the time limit and let in-flight fetches finish', async () => {
      const site = new FakeSite({
        [`${SITE}/`]: page(['/slow', '/next']),
        [`${SITE}/slow`]: page([], { delayMs: 200 }),
        [`${SITE}/next`]: page(),
      });
      const { session, logger } = createSession(site, { concurrency: 1, timeLimitMs: 50 });

      const report = await session.run();

      expect(report.stopReason).toBe('deadline');
      expect(report.inventory.map((entry) => [entry.url, entry.outcome])).toEqual([
        [`${SITE}/`, 'fetched'],
        [`${SITE}/next`, 'unvisited'],
        [`${SITE}/slow`, 'fetched'],
      ]);
      expect(logger.warn).toHaveBeenCalledWith('Crawl site.test: time limit of 50ms reached');
    });
  });

  it('should emit progress as pages complete', async () => {
    const site = new FakeSite({ [`${SITE}/`]: page(['/a']), [`${SITE}/a`]: page() });
    const { session } = createSession(site);
    const visitedCounts: number[] = [];
    session.on(CrawlEvent.PROGRESS, (progress: { visited: number }) => visitedCounts.push(progress.visited));

    await session.run();

    expect(visitedCounts).toEqual([1, 2, 2]);
    expect(session.getProgress()).toEqual(
      expect.objectContaining({ queued: 0, inFlight: 0, visited: 2, pagesFetched: 2 })
    );
  });

  it('should return the same report for repeated runs', async () => {
    const site = new FakeSite({ [`${SITE}/`]: page() });
    const { session } = createSession(site);

    const [first, second] = await Promise.all([session.run(), session.run()]);

    expect(second).toBe(first);
    expect(site.requestsFor(`${SITE}/`)).toHaveLength(1);
  });

  it('should reject invalid configuration before fetching', () => {
    const site = new FakeSite();

    expect(() => runCrawlSession({ seedUrl: 'not a url', maxDepth: -1 }, { httpClient: site.client })).toThrow(
      ConfigurationError
    );
    expect(site.requests).toHaveLength(0);
  });
});
