/**
 * Duplicate Content Check
 * Exact body-hash collisions between HTML pages
 */

import { TechnicalCheck } from '../check.types';
import { createFinding } from '../finding';
import { isHtmlSuccess, otherUrls } from './check.utils';

const ID = 'duplicate-content';

export const duplicateContentCheck: TechnicalCheck = {
  id: ID,
  description: 'Flags HTML pages whose normalized body matches another crawled URL',

  run(page, { index }) {
    if (!isHtmlSuccess(page) || !page.bodyHash) return [];

    const duplicates = otherUrls(index.pagesWithBodyHash(page.bodyHash), page.url);
    if (duplicates.length === 0) return [];

    return [
      createFinding(ID, 'warning', page.url, `Duplicate content shared with ${duplicates.length} other URL(s)`, {
        bodyHash: page.bodyHash,
        duplicates,
      }),
    ];
  },
};
