/**
 * Check Registry
 * Named technical checks; new checks register at startup without touching the engine
 */

import { TechnicalCheck } from './check.types';
import { statusIntegrityCheck } from './checks/status-integrity.check';
import { mobileMetaCheck } from './checks/mobile-meta.check';
import { duplicateContentCheck } from './checks/duplicate-content.check';
import { metaQualityCheck } from './checks/meta-quality.check';
import { structuredDataValidityCheck } from './checks/structured-data-validity.check';
import { brokenInternalLinkCheck } from './checks/broken-internal-link.check';
import { canonicalConsistencyCheck } from './checks/canonical-consistency.check';

export const BUILT_IN_CHECKS: readonly TechnicalCheck[] = [
  statusIntegrityCheck,
  mobileMetaCheck,
  duplicateContentCheck,
  metaQualityCheck,
  structuredDataValidityCheck,
  brokenInternalLinkCheck,
  canonicalConsistencyCheck,
];

export class CheckRegistry {
  private checks: Map<string, TechnicalCheck> = new Map();

  /**
   * Register a check. Ids are unique; registering an existing id replaces it.
   */
  register(check: TechnicalCheck): void {
    if (!check.id || check.id.trim().length === 0) {
      throw new Error('Check must have an id');
    }
    this.checks.set(check.id, check);
  }

  unregister(id: string): boolean {
    return this.checks.delete(id);
  }

  /**
   * Registered checks in registration order
   */
  list(): TechnicalCheck[] {
    return Array.from(this.checks.values());
  }
}

/**
 * Registry preloaded with every built-in check
 */
export function createDefaultRegistry(): CheckRegistry {
  const registry = new CheckRegistry();
  BUILT_IN_CHECKS.forEach((check) => registry.register(check));
  return registry;
}
