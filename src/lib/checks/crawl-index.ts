/**
 * Crawl Index
 * Read-only lookups over a finished crawl, shared by every check
 */

import type { InventoryEntry } from '../crawling/crawling.types';
import { isSameDomain } from '../crawling/url-normalizer';
import type { PageModel } from '../page-model/page-model.types';
import { CrawlIndex } from './check.types';

function isIndexable(page: PageModel): boolean {
  return page.kind === 'html' && page.status !== null && page.status >= 200 && page.status < 300;
}

function addTo(map: Map<string, PageModel[]>, key: string, page: PageModel): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(page);
  } else {
    map.set(key, [page]);
  }
}

export class InMemoryCrawlIndex implements CrawlIndex {
  private entries: Map<string, InventoryEntry> = new Map();
  private pages: Map<string, PageModel> = new Map();
  private byHash: Map<string, PageModel[]> = new Map();
  private byTitle: Map<string, PageModel[]> = new Map();
  private byDescription: Map<string, PageModel[]> = new Map();

  constructor(
    private readonly seedUrl: string,
    inventory: readonly InventoryEntry[],
    pages: readonly PageModel[]
  ) {
    inventory.forEach((entry) => this.entries.set(entry.url, entry));

    for (const page of pages) {
      this.pages.set(page.url, page);
      if (!isIndexable(page)) continue;

      if (page.bodyHash) addTo(this.byHash, page.bodyHash, page);
      if (page.title) addTo(this.byTitle, page.title, page);
      if (page.metaDescription) addTo(this.byDescription, page.metaDescription, page);
    }
  }

  getEntry(url: string): InventoryEntry | undefined {
    return this.entries.get(url);
  }

  getPage(url: string): PageModel | undefined {
    return this.pages.get(url);
  }

  isInternal(url: string): boolean {
    return isSameDomain(url, this.seedUrl);
  }

  /**
   * HTML 2xx pages with this body hash
   */
  pagesWithBodyHash(hash: string): readonly PageModel[] {
    return this.byHash.get(hash) ?? [];
  }

  pagesWithTitle(title: string): readonly PageModel[] {
    return this.byTitle.get(title) ?? [];
  }

  pagesWithDescription(description: string): readonly PageModel[] {
    return this.byDescription.get(description) ?? [];
  }
}
