/**
 * Status Integrity Check
 * HTTP status, fetch failures and redirect chain health
 */

import { Finding, TechnicalCheck } from '../check.types';
import { createFinding } from '../finding';

const ID = 'status-integrity';

export const statusIntegrityCheck: TechnicalCheck = {
  id: ID,
  description: 'Flags failed fetches, error statuses, unresolved redirects, loops and long chains',

  run(page, { config }) {
    const findings: Finding[] = [];
    const chain = page.redirectChain.map((hop) => hop.url);

    if (page.redirectLoop) {
      findings.push(createFinding(ID, 'critical', page.url, 'Redirect loop detected', { chain }));
    } else if (page.status === null) {
      findings.push(
        createFinding(ID, 'critical', page.url, `Fetch failed: ${page.fetchError ?? 'no response'}`, {
          attempts: page.attempts,
        })
      );
    } else if (page.fetchError) {
      findings.push(
        createFinding(ID, 'critical', page.url, `Fetch failed: ${page.fetchError}`, {
          status: page.status,
          chain,
        })
      );
    } else if (page.status >= 500) {
      findings.push(createFinding(ID, 'critical', page.url, `Server error: HTTP ${page.status}`, { status: page.status }));
    } else if (page.status >= 400) {
      findings.push(createFinding(ID, 'warning', page.url, `Client error: HTTP ${page.status}`, { status: page.status }));
    } else if (page.status >= 300) {
      findings.push(
        createFinding(ID, 'info', page.url, `Unresolved redirect: HTTP ${page.status}`, {
          status: page.status,
          location: page.headers['location'] ?? null,
        })
      );
    }

    if (!page.redirectLoop && page.redirectChain.length > config.redirectHopLimit) {
      findings.push(
        createFinding(
          ID,
          'warning',
          page.url,
          `Redirect chain of ${page.redirectChain.length} hops exceeds limit of ${config.redirectHopLimit}`,
          { kind: 'redirect-chain', hops: page.redirectChain.length, chain, finalUrl: page.finalUrl }
        )
      );
    }

    return findings;
  },
};
