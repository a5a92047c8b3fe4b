/**
 * Shared predicates for built-in checks
 */

import type { PageModel } from '../../page-model/page-model.types';

/**
 * HTML document served with a 2xx status
 */
export function isHtmlSuccess(page: PageModel): boolean {
  return page.kind === 'html' && page.status !== null && page.status >= 200 && page.status < 300;
}

export function otherUrls(pages: readonly PageModel[], self: string): string[] {
  return pages
    .map((page) => page.url)
    .filter((url) => url !== self)
    .sort();
}
