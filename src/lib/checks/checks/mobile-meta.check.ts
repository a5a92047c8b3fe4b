/**
 * Mobile Meta Check
 * Viewport declaration for mobile rendering
 */

import { Finding, TechnicalCheck } from '../check.types';
import { createFinding } from '../finding';
import { isHtmlSuccess } from './check.utils';

const ID = 'mobile-meta';

/**
 * Parse `width=device-width, initial-scale=1` into lower-cased key/value pairs
 */
export function parseViewport(content: string): Map<string, string> {
  const directives = new Map<string, string>();
  content
    .split(/[,;]/)
    .map((part) => part.trim())
    .filter(Boolean)
    .forEach((part) => {
      const [key, ...rest] = part.split('=');
      directives.set(key.trim().toLowerCase(), rest.join('=').trim().toLowerCase());
    });
  return directives;
}

export const mobileMetaCheck: TechnicalCheck = {
  id: ID,
  description: 'Checks the viewport meta tag on HTML pages',

  run(page) {
    if (!isHtmlSuccess(page)) return [];

    if (page.viewport === null) {
      return [createFinding(ID, 'warning', page.url, 'Missing viewport meta tag')];
    }

    const findings: Finding[] = [];
    const viewport = parseViewport(page.viewport);

    if (viewport.get('width') !== 'device-width') {
      findings.push(
        createFinding(ID, 'warning', page.url, 'Viewport does not set width=device-width', {
          viewport: page.viewport,
        })
      );
    }

    const userScalable = viewport.get('user-scalable');
    if (userScalable === 'no' || userScalable === '0') {
      findings.push(
        createFinding(ID, 'info', page.url, 'Viewport disables user zoom', { viewport: page.viewport })
      );
    }

    const maximumScale = viewport.get('maximum-scale');
    if (maximumScale !== undefined && parseFloat(maximumScale) < 2) {
      findings.push(
        createFinding(ID, 'info', page.url, `Viewport maximum-scale ${maximumScale} limits zoom`, {
          viewport: page.viewport,
        })
      );
    }

    return findings;
  },
};
