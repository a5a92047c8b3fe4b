/**
 * Structured Data Validity Check
 */

import { Finding, TechnicalCheck } from '../check.types';
import { createFinding } from '../finding';

const ID = 'structured-data-validity';

export const structuredDataValidityCheck: TechnicalCheck = {
  id: ID,
  description: 'Flags JSON-LD blocks that fail to parse or lack @context/@type',

  run(page) {
    const findings: Finding[] = [];

    page.structuredData.forEach((block, i) => {
      const position = i + 1;
      if (!block.valid) {
        findings.push(
          createFinding(ID, 'warning', page.url, `JSON-LD block ${position} failed to parse: ${block.error ?? 'unknown error'}`, {
            block: position,
          })
        );
        return;
      }

      if (block.missingKeys.length > 0) {
        findings.push(
          createFinding(ID, 'info', page.url, `JSON-LD block ${position} is missing ${block.missingKeys.join(', ')}`, {
            block: position,
            missingKeys: [...block.missingKeys],
            types: [...block.types],
          })
        );
      }
    });

    return findings;
  },
};
