/**
 * Check Types
 * Type definitions for findings, the crawl index and pluggable technical checks
 */

import type { InventoryEntry } from '../crawling/crawling.types';
import type { PageModel } from '../page-model/page-model.types';

export type Severity = 'info' | 'warning' | 'critical';

/**
 * Check ids raised by the crawl itself rather than by a registered check
 */
export enum CrawlFindingId {
  MALFORMED_LINK = 'malformed-link',
  MALFORMED_MARKUP = 'malformed-markup',
  ROBOTS_UNAVAILABLE = 'robots-unavailable',
  CHECK_ERROR = 'check-error',
}

export type FindingEvidence = Readonly<Record<string, unknown>>;

export interface Finding {
  readonly checkId: string;
  readonly severity: Severity;
  readonly url: string;
  readonly message: string;
  readonly evidence: FindingEvidence;
}

/**
 * Thresholds used by the built-in checks
 */
export interface CheckConfig {
  /**
   * Redirect hops tolerated before a redirect-chain finding
   */
  redirectHopLimit: number;
  titleMinLength: number;
  titleMaxLength: number;
  descriptionMinLength: number;
  descriptionMaxLength: number;
}

export const DEFAULT_CHECK_CONFIG: CheckConfig = {
  redirectHopLimit: 3,
  titleMinLength: 10,
  titleMaxLength: 60,
  descriptionMinLength: 50,
  descriptionMaxLength: 160,
};

/**
 * Read-only lookups over the finished crawl
 */
export interface CrawlIndex {
  getEntry(url: string): InventoryEntry | undefined;
  getPage(url: string): PageModel | undefined;
  isInternal(url: string): boolean;
  pagesWithBodyHash(hash: string): readonly PageModel[];
  pagesWithTitle(title: string): readonly PageModel[];
  pagesWithDescription(description: string): readonly PageModel[];
}

export interface CheckContext {
  index: CrawlIndex;
  config: Readonly<CheckConfig>;
}

/**
 * A technical check. Must not mutate the page or the index.
 */
export interface TechnicalCheck {
  readonly id: string;
  readonly description: string;
  run(page: PageModel, context: CheckContext): Finding[] | Promise<Finding[]>;
}
