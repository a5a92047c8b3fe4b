/**
 * URL Normalization Utilities
 * Canonicalization and validation of crawl URLs
 */

import { NormalizeOptions } from './crawling.types';

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  trailingSlash: 'strip',
  stripQueryParams: ['utm_*', 'gclid', 'fbclid', 'msclkid', 'mc_cid', 'mc_eid'],
};

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

// Link schemes that never point at a crawlable document
const NON_NAVIGATIONAL_SCHEMES = ['mailto:', 'tel:', 'javascript:', 'data:', 'sms:', 'about:'];

export type NormalizationFailure = 'malformed' | 'disallowed-scheme';

export class NormalizationError extends Error {
  readonly raw: string;
  readonly reason: NormalizationFailure;

  constructor(raw: string, reason: NormalizationFailure, message: string) {
    super(message);
    this.name = 'NormalizationError';
    this.raw = raw;
    this.reason = reason;
  }
}

export type NormalizeResult =
  | { ok: true; url: string }
  | { ok: false; error: NormalizationError };

function isStrippedParam(name: string, patterns: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return patterns.some((pattern) => {
    const p = pattern.toLowerCase();
    return p.endsWith('*') ? lower.startsWith(p.slice(0, -1)) : lower === p;
  });
}

function applyTrailingSlash(pathname: string, policy: NormalizeOptions['trailingSlash']): string {
  if (pathname === '/' || policy === 'preserve') {
    return pathname;
  }

  if (policy === 'strip') {
    return pathname.replace(/\/+$/, '') || '/';
  }

  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  if (pathname.endsWith('/') || lastSegment.includes('.')) {
    return pathname;
  }
  return `${pathname}/`;
}

/**
 * Normalize a URL: resolve against base, drop the fragment and tracking
 * parameters, sort the query, apply the trailing slash policy.
 * Scheme/host case-folding and default-port removal come from WHATWG URL parsing.
 */
export function normalizeUrl(
  raw: string,
  baseUrl?: string,
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS
): string {
  const input = raw.trim();
  if (input.length === 0 && !baseUrl) {
    throw new NormalizationError(raw, 'malformed', 'Empty URL');
  }

  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(input, baseUrl) : new URL(input);
  } catch {
    throw new NormalizationError(raw, 'malformed', `Malformed URL: ${raw}`);
  }

  if (!ALLOWED_PROTOCOLS.has(urlObj.protocol)) {
    throw new NormalizationError(
      raw,
      'disallowed-scheme',
      `Scheme ${urlObj.protocol} is not crawlable: ${raw}`
    );
  }

  if (!urlObj.hostname) {
    throw new NormalizationError(raw, 'malformed', `URL has no host: ${raw}`);
  }

  // Remove fragment
  urlObj.hash = '';

  // Drop tracking parameters, then sort the rest by name (stable for repeated keys)
  const keptParams = Array.from(urlObj.searchParams.entries())
    .filter(([key]) => !isStrippedParam(key, options.stripQueryParams))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  urlObj.search = '';
  keptParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  urlObj.pathname = applyTrailingSlash(urlObj.pathname, options.trailingSlash);

  return urlObj.href;
}

/**
 * Non-throwing variant of normalizeUrl
 */
export function tryNormalizeUrl(
  raw: string,
  baseUrl?: string,
  options: NormalizeOptions = DEFAULT_NORMALIZE_OPTIONS
): NormalizeResult {
  try {
    return { ok: true, url: normalizeUrl(raw, baseUrl, options) };
  } catch (error) {
    if (error instanceof NormalizationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Links that are not documents (mail, phone, scripts, inline data, empty refs)
 */
export function isNonNavigationalHref(href: string): boolean {
  const trimmed = href.trim().toLowerCase();
  if (trimmed.length === 0) {
    return true;
  }
  return NON_NAVIGATIONAL_SCHEMES.some((scheme) => trimmed.startsWith(scheme));
}

/**
 * Extract host from URL, lower-cased with any leading www. removed
 */
export function extractDomain(url: string): string {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    return hostname.startsWith('www.') ? hostname.substring(4) : hostname;
  } catch {
    return '';
  }
}

/**
 * Host key used by the politeness gate (host plus non-default port)
 */
export function extractHost(url: string): string {
  return new URL(url).host.toLowerCase();
}

/**
 * Check if two URLs are on the same site (www. prefix ignored)
 */
export function isSameDomain(url1: string, url2: string): boolean {
  const domain1 = extractDomain(url1);
  return domain1 !== '' && domain1 === extractDomain(url2);
}

/**
 * Check a URL against regex-source block patterns; invalid patterns are ignored
 */
export function isBlockedUrl(url: string, blockedPatterns: readonly string[]): boolean {
  for (const pattern of blockedPatterns) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch {
      continue;
    }
    if (regex.test(url)) {
      return true;
    }
  }
  return false;
}
