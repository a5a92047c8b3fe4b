/**
 * Politeness Gate Tests
 */

import { PolitenessGate } from '../politeness-gate';
import { createCrawlConfig } from '../crawl-config';
import { SeedConfiguration } from '../crawling.types';
import { FakeSite } from '../../../__tests__/helpers/fake-site';
import { createSilentLogger, SITE, testSeed } from '../../../__tests__/helpers/fixtures';

const ROBOTS_URL = `${SITE}/robots.txt`;

function createGate(site: FakeSite, overrides: Partial<SeedConfiguration> = {}) {
  const logger = createSilentLogger();
  const gate = new PolitenessGate(createCrawlConfig(testSeed(overrides)), site.client, logger);
  return { gate, logger };
}

describe('PolitenessGate', () => {
  describe('robots.txt', () => {
    it('should apply the rules for the configured user agent', async () => {
      const site = new FakeSite({
        [ROBOTS_URL]: { body: 'User-agent: *\nDisallow: /private/\nSitemap: https://site.test/sitemap.xml' },
      });
      const { gate, logger } = createGate(site);

      expect(await gate.mayFetch(`${SITE}/private/report`)).toBe(false);
      expect(await gate.mayFetch(`${SITE}/public`)).toBe(true);

      const [host] = gate.snapshot();
      expect(host).toEqual({
        host: 'site.test',
        robotsUrl: ROBOTS_URL,
        phase: 'rules-loaded',
        crawlDelayMs: 0,
        robotsStatus: 200,
        robotsError: null,
        degraded: false,
        sitemaps: ['https://site.test/sitemap.xml'],
      });
      expect(logger.log).toHaveBeenCalledWith('Politeness: robots.txt loaded for site.test (1 rule(s), delay 0ms)');
    });

    it('should load robots.txt once per host', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { body: 'User-agent: *\nDisallow:' } });
      const { gate } = createGate(site);

      await Promise.all([gate.mayFetch(`${SITE}/a`), gate.mayFetch(`${SITE}/b`), gate.mayFetch(`${SITE}/c`)]);

      expect(site.requestsFor(ROBOTS_URL)).toHaveLength(1);
      expect(site.requestsFor(ROBOTS_URL)[0].headers['User-Agent']).toBe('SiteAuditBot/1.0');
    });

    it('should allow everything without degrading when robots.txt is missing', async () => {
      const site = new FakeSite();
      const { gate, logger } = createGate(site);

      expect(await gate.mayFetch(`${SITE}/anything`)).toBe(true);

      const [host] = gate.snapshot();
      expect(host.phase).toBe('robots-unavailable');
      expect(host.robotsStatus).toBe(404);
      expect(host.degraded).toBe(false);
      expect(logger.log).toHaveBeenCalledWith('Politeness: no robots.txt for site.test (HTTP 404), allowing all');
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should enter degraded mode when robots.txt errors', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { status: 500, body: 'oops' } });
      const { gate, logger } = createGate(site);

      expect(await gate.mayFetch(`${SITE}/private/report`)).toBe(true);

      const [host] = gate.snapshot();
      expect(host.degraded).toBe(true);
      expect(host.robotsError).toBe('HTTP 500');
      expect(logger.warn).toHaveBeenCalledWith(
        'Politeness: robots.txt for site.test returned HTTP 500, degraded mode (allow all)'
      );
    });

    it('should enter degraded mode when robots.txt cannot be reached', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { error: new Error('connect ECONNREFUSED 10.0.0.1:443') } });
      const { gate } = createGate(site);

      expect(await gate.mayFetch(`${SITE}/page`)).toBe(true);

      const [host] = gate.snapshot();
      expect(host.robotsStatus).toBeNull();
      expect(host.robotsError).toBe('Network connection failed');
      expect(host.degraded).toBe(true);
    });
  });

  describe('delay', () => {
    it('should use the larger of Crawl-delay and the configured floor', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { body: 'User-agent: *\nCrawl-delay: 0.1' } });
      const { gate } = createGate(site, { crawlDelayFloorMs: 200 });

      expect(gate.delay('site.test')).toBe(200);
      await gate.mayFetch(`${SITE}/`);
      expect(gate.delay('site.test')).toBe(200);
    });

    it('should adopt a Crawl-delay above the floor', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { body: 'User-agent: *\nCrawl-delay: 0.1' } });
      const { gate } = createGate(site, { crawlDelayFloorMs: 20 });

      await gate.mayFetch(`${SITE}/`);
      expect(gate.delay('site.test')).toBe(100);
    });
  });

  describe('acquire', () => {
    it('should space request starts by the crawl delay', async () => {
      const site = new FakeSite({ [ROBOTS_URL]: { body: 'User-agent: *\nCrawl-delay: 0.1' } });
      const { gate } = createGate(site);

      const first = await gate.acquire(`${SITE}/a`);
      const firstAt = Date.now();
      first.release();

      const second = await gate.acquire(`${SITE}/b`);
      const secondAt = Date.now();
      second.release();

      expect(secondAt - firstAt).toBeGreaterThanOrEqual(90);
    });

    it('should hold requests beyond the per-host ceiling until a lease is released', async () => {
      const site = new FakeSite();
      const { gate } = createGate(site, { perHostConcurrency: 1 });

      const first = await gate.acquire(`${SITE}/a`);
      let acquired = false;
      const pending = gate.acquire(`${SITE}/b`).then((lease) => {
        acquired = true;
        return lease;
      });

      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(acquired).toBe(false);

      first.release();
      const second = await pending;
      expect(acquired).toBe(true);
      expect(second.host).toBe('site.test');
      second.release();
    });

    it('should track hosts independently', async () => {
      const site = new FakeSite();
      const { gate } = createGate(site, { perHostConcurrency: 1 });

      const first = await gate.acquire(`${SITE}/a`);
      const other = await gate.acquire('https://cdn.site.test/logo.png');

      expect(other.host).toBe('cdn.site.test');
      expect(gate.snapshot().map((host) => host.host)).toEqual(['site.test', 'cdn.site.test']);
      first.release();
      other.release();
    });
  });
});
