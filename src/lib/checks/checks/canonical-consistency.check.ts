/**
 * Canonical Consistency Check
 * Canonical declarations checked against what the crawl observed.
 * The redirect-resolved address is authoritative; canonicals are only reported.
 */

import { Finding, TechnicalCheck } from '../check.types';
import { createFinding } from '../finding';
import { isHtmlSuccess } from './check.utils';

const ID = 'canonical-consistency';

export const canonicalConsistencyCheck: TechnicalCheck = {
  id: ID,
  description: 'Checks rel=canonical declarations against crawl results',

  run(page, { index }) {
    if (!isHtmlSuccess(page) || page.canonicalLinks.length === 0) return [];

    const findings: Finding[] = [];
    const canonicals = Array.from(new Set(page.canonicalLinks));

    if (canonicals.length > 1) {
      findings.push(
        createFinding(ID, 'warning', page.url, `Conflicting canonical links (${canonicals.length})`, {
          canonicals,
        })
      );
    }

    for (const canonical of canonicals) {
      if (canonical === page.url || canonical === page.finalUrl) continue;

      const entry = index.getEntry(canonical);
      if (!entry) continue;

      if (entry.outcome === 'failed' || entry.outcome === 'malformed') {
        const reason = entry.status !== null ? `HTTP ${entry.status}` : entry.error ?? 'no response';
        findings.push(
          createFinding(ID, 'warning', page.url, `Canonical target ${canonical} failed (${reason})`, {
            canonical,
            status: entry.status,
          })
        );
      } else if (entry.outcome === 'fetched' && entry.finalUrl !== canonical) {
        findings.push(
          createFinding(ID, 'info', page.url, `Canonical target ${canonical} redirects to ${entry.finalUrl}`, {
            canonical,
            finalUrl: entry.finalUrl,
          })
        );
      }
    }

    return findings;
  },
};
