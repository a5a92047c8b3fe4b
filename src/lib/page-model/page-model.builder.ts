/**
 * Page Model Builder
 * Turns a FetchResult into an immutable PageModel using cheerio.
 * Problems found while parsing come back as findings, never as exceptions.
 */

import * as cheerio from 'cheerio';
import { createHash } from 'crypto';
import type { FetchResult, NormalizeOptions } from '../crawling/crawling.types';
import { isNonNavigationalHref, isSameDomain, tryNormalizeUrl } from '../crawling/url-normalizer';
import { CrawlFindingId, Finding } from '../checks/check.types';
import { createFinding } from '../checks/finding';
import {
  HeadingEntry,
  HreflangLink,
  LinkKind,
  OutboundLink,
  PageModel,
  StructuredDataBlock,
} from './page-model.types';

export interface PageModelOptions {
  normalize: NormalizeOptions;

  /**
   * Seed URL; links on the same site are internal
   */
  seedUrl: string;
  depth: number;
}

export interface PageModelBuildResult {
  page: PageModel;
  findings: Finding[];
}

type PageDraft = { -readonly [K in keyof PageModel]: PageModel[K] };

interface MarkupIssues {
  strayEndTags: string[];
  unclosedTags: string[];
  headCount: number;
  bodyCount: number;
}

// Elements whose end tag is required, so imbalance is a real defect
const CONTAINER_TAGS = new Set([
  'div',
  'section',
  'article',
  'main',
  'header',
  'footer',
  'nav',
  'aside',
  'ul',
  'ol',
  'table',
  'form',
  'span',
  'a',
  'button',
  'figure',
]);

const REFERENCE_SELECTORS: Array<{ element: string; attr: string; kind: LinkKind }> = [
  { element: 'a', attr: 'href', kind: 'anchor' },
  { element: 'area', attr: 'href', kind: 'anchor' },
  { element: 'img', attr: 'src', kind: 'image' },
  { element: 'script', attr: 'src', kind: 'script' },
  { element: 'iframe', attr: 'src', kind: 'iframe' },
  { element: 'video', attr: 'src', kind: 'media' },
  { element: 'audio', attr: 'src', kind: 'media' },
  { element: 'source', attr: 'src', kind: 'media' },
];

function relTokens(rel: string | undefined): string[] {
  return (rel ?? '').toLowerCase().split(/\s+/).filter(Boolean);
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Whether the response should be parsed as an HTML document
 */
export function isHtmlResponse(contentType: string | null, body: string | null): boolean {
  if (contentType) {
    const type = contentType.toLowerCase();
    return type.includes('text/html') || type.includes('application/xhtml+xml');
  }
  if (!body) return false;
  return /^\s*(<!doctype html|<html[\s>])/i.test(body);
}

/**
 * SHA-256 of the body. HTML is hashed with comments removed and whitespace collapsed.
 */
export function hashBody(body: string | Uint8Array, html: boolean): string {
  if (!html || typeof body !== 'string') {
    return createHash('sha256').update(body).digest('hex');
  }
  const content = collapseWhitespace(body.replace(/<!--[\s\S]*?-->/g, ''));
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Tag-balance scan over the raw markup. Comments and script/style contents are ignored.
 */
export function scanMarkup(body: string): MarkupIssues {
  const source = body
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style|template)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '');

  const issues: MarkupIssues = { strayEndTags: [], unclosedTags: [], headCount: 0, bodyCount: 0 };
  const stack: string[] = [];
  const tagPattern = /<(\/?)([a-zA-Z][a-zA-Z0-9-]*)\b[^>]*>/g;

  let match: RegExpExecArray | null;
  while ((match = tagPattern.exec(source)) !== null) {
    const closing = match[1] === '/';
    const name = match[2].toLowerCase();

    if (!closing && name === 'head') issues.headCount++;
    if (!closing && name === 'body') issues.bodyCount++;
    if (!CONTAINER_TAGS.has(name)) continue;

    if (!closing) {
      if (!match[0].endsWith('/>')) stack.push(name);
      continue;
    }

    const openIndex = stack.lastIndexOf(name);
    if (openIndex === -1) {
      issues.strayEndTags.push(name);
      continue;
    }
    issues.unclosedTags.push(...stack.splice(openIndex).slice(1));
  }

  issues.unclosedTags.push(...stack);
  return issues;
}

function describeMarkupIssues(issues: MarkupIssues): string[] {
  const problems: string[] = [];
  if (issues.strayEndTags.length > 0) {
    problems.push(`${issues.strayEndTags.length} stray end tag(s)`);
  }
  if (issues.unclosedTags.length > 0) {
    problems.push(`${issues.unclosedTags.length} unclosed element(s)`);
  }
  if (issues.headCount > 1) problems.push(`${issues.headCount} <head> elements`);
  if (issues.bodyCount > 1) problems.push(`${issues.bodyCount} <body> elements`);
  return problems;
}

/**
 * Parse one JSON-LD block, recording what is missing
 */
export function parseStructuredData(raw: string): StructuredDataBlock {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      raw,
      valid: false,
      error: error instanceof Error ? error.message : String(error),
      types: [],
      missingKeys: [],
    };
  }

  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const types: string[] = [];
  const missing = new Set<string>();

  for (const item of items) {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      missing.add('@context');
      missing.add('@type');
      continue;
    }

    const record = new Map<string, unknown>(Object.entries(item));
    if (!record.has('@context')) missing.add('@context');

    const graph = record.get('@graph');
    const nodes: unknown[] = Array.isArray(graph) ? graph : [item];
    for (const node of nodes) {
      const type: unknown =
        typeof node === 'object' && node !== null ? new Map<string, unknown>(Object.entries(node)).get('@type') : undefined;
      if (typeof type === 'string') {
        types.push(type);
      } else if (Array.isArray(type)) {
        types.push(...type.filter((t): t is string => typeof t === 'string'));
      } else {
        missing.add('@type');
      }
    }
  }

  return { raw, valid: true, error: null, types, missingKeys: Array.from(missing).sort() };
}

function freezePage(page: PageModel): PageModel {
  return Object.freeze({
    ...page,
    metaTags: Object.freeze({ ...page.metaTags }),
    headings: Object.freeze(page.headings.map((h) => Object.freeze({ ...h }))),
    links: Object.freeze(page.links.map((l) => Object.freeze({ ...l }))),
    canonicalLinks: Object.freeze([...page.canonicalLinks]),
    hreflang: Object.freeze(page.hreflang.map((h) => Object.freeze({ ...h }))),
    structuredData: Object.freeze(
      page.structuredData.map((block) =>
        Object.freeze({
          ...block,
          types: Object.freeze([...block.types]),
          missingKeys: Object.freeze([...block.missingKeys]),
        })
      )
    ),
    headers: Object.freeze({ ...page.headers }),
    redirectChain: Object.freeze(page.redirectChain.map((hop) => Object.freeze({ ...hop }))),
  });
}

function basePage(result: FetchResult, depth: number): PageDraft {
  return {
    url: result.url,
    finalUrl: result.finalUrl,
    status: result.status,
    kind: result.status === null ? 'unfetched' : 'resource',
    contentType: result.contentType,
    depth,
    title: null,
    titleCount: 0,
    metaDescription: null,
    metaDescriptionCount: 0,
    metaRobots: null,
    viewport: null,
    metaTags: {},
    headings: [],
    links: [],
    canonicalLinks: [],
    hreflang: [],
    structuredData: [],
    headers: result.headers,
    byteSize: result.byteSize,
    truncated: result.truncated,
    latencyMs: result.latencyMs,
    bodyHash: null,
    redirectChain: result.redirectChain,
    redirectLoop: result.redirectLoop,
    fetchError: result.error,
    attempts: result.attempts,
  };
}

/**
 * Build the page model for one fetch result
 */
export function buildPageModel(result: FetchResult, options: PageModelOptions): PageModelBuildResult {
  const page = basePage(result, options.depth);
  const findings: Finding[] = [];

  if (result.status === null) {
    return { page: freezePage(page), findings };
  }
  if (result.body === null) {
    // Binary resource: hash the bytes as received
    if (result.rawBody) page.bodyHash = hashBody(result.rawBody, false);
    return { page: freezePage(page), findings };
  }

  const html = isHtmlResponse(result.contentType, result.body);
  page.bodyHash = hashBody(result.body, html);
  if (!html) {
    return { page: freezePage(page), findings };
  }

  page.kind = 'html';
  const $ = cheerio.load(result.body);

  const malformedLink = (href: string, element: string, reason: string): void => {
    findings.push(
      createFinding(
        CrawlFindingId.MALFORMED_LINK,
        reason === 'malformed' ? 'warning' : 'info',
        result.url,
        `Unusable link dropped: ${href}`,
        { href, element, reason }
      )
    );
  };

  let baseUrl = result.responseUrl;
  const baseHref = $('base[href]').first().attr('href');
  if (baseHref) {
    const resolved = tryNormalizeUrl(baseHref, result.responseUrl, { ...options.normalize, trailingSlash: 'preserve' });
    if (resolved.ok) {
      baseUrl = resolved.url;
    } else {
      malformedLink(baseHref, 'base', resolved.error.reason);
    }
  }

  const resolve = (href: string, element: string): string | null => {
    if (isNonNavigationalHref(href)) return null;
    const normalized = tryNormalizeUrl(href, baseUrl, options.normalize);
    if (!normalized.ok) {
      malformedLink(href, element, normalized.error.reason);
      return null;
    }
    return normalized.url;
  };

  // Title and meta
  const titles = $('title').not('svg title');
  page.titleCount = titles.length;
  const title = titles.length > 0 ? collapseWhitespace(titles.first().text()) : '';
  page.title = title || null;

  const metaTags: Record<string, string> = {};
  $('meta[name]').each((_, el) => {
    const name = ($(el).attr('name') ?? '').trim().toLowerCase();
    const content = $(el).attr('content') ?? '';
    if (!name) return;
    if (name === 'description') page.metaDescriptionCount++;
    if (!(name in metaTags)) metaTags[name] = content.trim();
  });
  page.metaTags = metaTags;
  page.metaDescription = metaTags['description'] || null;
  page.metaRobots = metaTags['robots'] ?? null;
  page.viewport = metaTags['viewport'] ?? null;

  const headings: HeadingEntry[] = [];
  $('h1, h2, h3, h4, h5, h6').each((_, el) => {
    headings.push({
      level: parseInt(($(el).prop('tagName') ?? 'h1').slice(1), 10),
      text: collapseWhitespace($(el).text()),
    });
  });
  page.headings = headings;

  // Outbound references
  const links: OutboundLink[] = [];
  const seen = new Set<string>();
  const addLink = (url: string, kind: LinkKind, text: string | null, nofollow: boolean): void => {
    const key = `${kind} ${url}`;
    if (seen.has(key)) return;
    seen.add(key);
    links.push({ url, kind, internal: isSameDomain(url, options.seedUrl), text, nofollow });
  };

  for (const { element, attr, kind } of REFERENCE_SELECTORS) {
    $(`${element}[${attr}]`).each((_, el) => {
      const url = resolve($(el).attr(attr) ?? '', element);
      if (!url) return;
      const text = kind === 'anchor' ? collapseWhitespace($(el).text()) || null : null;
      addLink(url, kind, text, relTokens($(el).attr('rel')).includes('nofollow'));
    });
  }

  const canonicalLinks: string[] = [];
  const hreflang: HreflangLink[] = [];
  $('link[href]').each((_, el) => {
    const rel = relTokens($(el).attr('rel'));
    const href = $(el).attr('href') ?? '';

    if (rel.includes('canonical')) {
      const url = resolve(href, 'link[rel=canonical]');
      if (url) canonicalLinks.push(url);
      return;
    }

    if (rel.includes('alternate') && $(el).attr('hreflang')) {
      const url = resolve(href, 'link[rel=alternate]');
      if (url) hreflang.push({ lang: ($(el).attr('hreflang') ?? '').toLowerCase(), url });
      return;
    }

    if (rel.includes('stylesheet')) {
      const url = resolve(href, 'link[rel=stylesheet]');
      if (url) addLink(url, 'stylesheet', null, false);
      return;
    }

    if (rel.some((token) => token === 'icon' || token === 'apple-touch-icon')) {
      const url = resolve(href, 'link[rel=icon]');
      if (url) addLink(url, 'icon', null, false);
    }
  });

  page.links = links;
  page.canonicalLinks = canonicalLinks;
  page.hreflang = hreflang;

  page.structuredData = $('script[type]')
    .filter((_, el) => ($(el).attr('type') ?? '').trim().toLowerCase() === 'application/ld+json')
    .map((_, el) => parseStructuredData(($(el).html() ?? '').trim()))
    .get();

  const markup = scanMarkup(result.body);
  const problems = describeMarkupIssues(markup);
  if (problems.length > 0) {
    findings.push(
      createFinding(
        CrawlFindingId.MALFORMED_MARKUP,
        'warning',
        result.url,
        `Malformed markup: ${problems.join(', ')}`,
        {
          strayEndTags: markup.strayEndTags,
          unclosedTags: markup.unclosedTags,
          headCount: markup.headCount,
          bodyCount: markup.bodyCount,
        }
      )
    );
  }

  return { page: freezePage(page), findings };
}
