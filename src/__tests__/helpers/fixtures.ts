/**
 * Test Fixtures
 * Reusable test data
 */

import type { CrawlLogger, InventoryEntry, SeedConfiguration } from '../../lib/crawling/crawling.types';
import type { PageModel } from '../../lib/page-model/page-model.types';

export const SITE = 'https://site.test';

export const DEFAULT_TITLE = 'Widgets and gadgets';
export const DEFAULT_DESCRIPTION =
  'Hand-made widgets and gadgets for every workshop, shipped within two days.';
export const DEFAULT_VIEWPORT = 'width=device-width, initial-scale=1';

export interface HtmlPageOptions {
  title?: string | null;
  description?: string | null;
  viewport?: string | null;
  head?: string;
  links?: string[];
  body?: string;
}

/**
 * Well-formed HTML page; null omits the element
 */
export function htmlPage(options: HtmlPageOptions = {}): string {
  const title = options.title === undefined ? DEFAULT_TITLE : options.title;
  const description = options.description === undefined ? DEFAULT_DESCRIPTION : options.description;
  const viewport = options.viewport === undefined ? DEFAULT_VIEWPORT : options.viewport;

  const head = [
    title !== null ? `<title>${title}</title>` : '',
    description !== null ? `<meta name="description" content="${description}">` : '',
    viewport !== null ? `<meta name="viewport" content="${viewport}">` : '',
    options.head ?? '',
  ].join('\n');

  const links = (options.links ?? []).map((href) => `<a href="${href}">${href}</a>`).join('\n');

  return `<!DOCTYPE html>
<html>
<head>
${head}
</head>
<body>
<div class="content">
${options.body ?? '<p>Content</p>'}
</div>
<nav>
${links}
</nav>
</body>
</html>`;
}

export const HTML_HEADERS = { 'content-type': 'text/html; charset=utf-8' };

/**
 * Seed configuration with delays small enough for tests
 */
export function testSeed(overrides: Partial<SeedConfiguration> = {}): SeedConfiguration {
  return {
    seedUrl: `${SITE}/`,
    userAgent: 'SiteAuditBot/1.0',
    crawlDelayFloorMs: 0,
    retryBaseDelayMs: 1,
    maxRetryDelayMs: 20,
    fetchTimeoutMs: 1000,
    concurrency: 2,
    ...overrides,
  };
}

export function createSilentLogger(): CrawlLogger & {
  log: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
} {
  return {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/**
 * HTML 200 page model at `${SITE}${path}`
 */
export function pageModel(path: string, overrides: Partial<PageModel> = {}): PageModel {
  const url = `${SITE}${path}`;
  return {
    url,
    finalUrl: url,
    status: 200,
    kind: 'html',
    contentType: HTML_HEADERS['content-type'],
    depth: 1,
    title: DEFAULT_TITLE,
    titleCount: 1,
    metaDescription: DEFAULT_DESCRIPTION,
    metaDescriptionCount: 1,
    metaRobots: null,
    viewport: DEFAULT_VIEWPORT,
    metaTags: {},
    headings: [],
    links: [],
    canonicalLinks: [],
    hreflang: [],
    structuredData: [],
    headers: HTML_HEADERS,
    byteSize: 512,
    truncated: false,
    latencyMs: 10,
    bodyHash: `hash-of-${path}`,
    redirectChain: [],
    redirectLoop: false,
    fetchError: null,
    attempts: 1,
    ...overrides,
  };
}

/**
 * Fetched inventory entry at `${SITE}${path}`
 */
export function inventoryEntry(path: string, overrides: Partial<InventoryEntry> = {}): InventoryEntry {
  const url = `${SITE}${path}`;
  return {
    url,
    outcome: 'fetched',
    status: 200,
    depth: 1,
    parentUrl: `${SITE}/`,
    finalUrl: url,
    redirectChain: [],
    attempts: 1,
    latencyMs: 10,
    contentType: HTML_HEADERS['content-type'],
    error: null,
    ...overrides,
  };
}
