/**
 * Meta Quality Check
 * Title and meta description presence, uniqueness and length
 */

import { CheckContext, Finding, TechnicalCheck } from '../check.types';
import type { PageModel } from '../../page-model/page-model.types';
import { createFinding } from '../finding';
import { isHtmlSuccess, otherUrls } from './check.utils';

const ID = 'meta-quality';

interface MetaField {
  label: string;
  value: string | null;
  count: number;
  min: number;
  max: number;
  samePages: (value: string) => readonly PageModel[];
}

function checkField(page: PageModel, field: MetaField): Finding[] {
  if (field.value === null) {
    return [createFinding(ID, 'warning', page.url, `Missing ${field.label}`)];
  }

  const findings: Finding[] = [];

  if (field.count > 1) {
    findings.push(
      createFinding(ID, 'warning', page.url, `Multiple ${field.label} elements (${field.count})`, {
        count: field.count,
      })
    );
  }

  const duplicates = otherUrls(field.samePages(field.value), page.url);
  if (duplicates.length > 0) {
    findings.push(
      createFinding(ID, 'warning', page.url, `Duplicate ${field.label} shared with ${duplicates.length} other page(s)`, {
        value: field.value,
        duplicates,
      })
    );
  }

  const length = field.value.length;
  if (length < field.min || length > field.max) {
    findings.push(
      createFinding(
        ID,
        'info',
        page.url,
        `${field.label} length ${length} is outside ${field.min}-${field.max} characters`,
        { value: field.value, length, min: field.min, max: field.max }
      )
    );
  }

  return findings;
}

export const metaQualityCheck: TechnicalCheck = {
  id: ID,
  description: 'Checks title and meta description presence, uniqueness and length',

  run(page, { index, config }: CheckContext) {
    if (!isHtmlSuccess(page)) return [];

    return [
      ...checkField(page, {
        label: 'title',
        value: page.title,
        count: page.titleCount,
        min: config.titleMinLength,
        max: config.titleMaxLength,
        samePages: (value) => index.pagesWithTitle(value),
      }),
      ...checkField(page, {
        label: 'meta description',
        value: page.metaDescription,
        count: page.metaDescriptionCount,
        min: config.descriptionMinLength,
        max: config.descriptionMaxLength,
        samePages: (value) => index.pagesWithDescription(value),
      }),
    ];
  },
};
