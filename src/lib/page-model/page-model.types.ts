/**
 * Page Model Types
 * Parsed, immutable view of one fetched URL consumed by the check engine
 */

import type { RedirectHop } from '../crawling/crawling.types';

export type PageKind = 'html' | 'resource' | 'unfetched';

/**
 * Element a reference was discovered on
 */
export type LinkKind =
  | 'anchor'
  | 'image'
  | 'script'
  | 'stylesheet'
  | 'iframe'
  | 'media'
  | 'icon';

export interface OutboundLink {
  /**
   * Absolute, normalized target
   */
  url: string;
  kind: LinkKind;

  /**
   * Same site as the crawl seed
   */
  internal: boolean;
  text: string | null;
  nofollow: boolean;
}

export interface HeadingEntry {
  level: number;
  text: string;
}

export interface HreflangLink {
  lang: string;
  url: string;
}

/**
 * One <script type="application/ld+json"> block
 */
export interface StructuredDataBlock {
  raw: string;
  valid: boolean;
  error: string | null;

  /**
   * @type values found on the top-level items
   */
  types: readonly string[];

  /**
   * Required JSON-LD keys absent from at least one top-level item
   */
  missingKeys: readonly string[];
}

export interface PageModel {
  readonly url: string;
  readonly finalUrl: string;
  readonly status: number | null;
  readonly kind: PageKind;
  readonly contentType: string | null;
  readonly depth: number;
  readonly title: string | null;

  /**
   * Number of <title> elements in the document
   */
  readonly titleCount: number;
  readonly metaDescription: string | null;
  readonly metaDescriptionCount: number;
  readonly metaRobots: string | null;
  readonly viewport: string | null;
  readonly metaTags: Readonly<Record<string, string>>;
  readonly headings: readonly HeadingEntry[];
  readonly links: readonly OutboundLink[];
  readonly canonicalLinks: readonly string[];
  readonly hreflang: readonly HreflangLink[];
  readonly structuredData: readonly StructuredDataBlock[];
  readonly headers: Readonly<Record<string, string>>;
  readonly byteSize: number;
  readonly truncated: boolean;
  readonly latencyMs: number;
  readonly bodyHash: string | null;
  readonly redirectChain: readonly RedirectHop[];
  readonly redirectLoop: boolean;
  readonly fetchError: string | null;
  readonly attempts: number;
}
