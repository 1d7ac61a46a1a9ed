import type { CheckStatus, ComplianceResult } from '@pdf-compliance/model';

import { SECTION_CATEGORIES } from '../config/section-keywords';

const FORMAT_CHECKS = [
  'file_type',
  'font_size',
  'font_family',
  'margin',
] as const;

export interface ComplianceSummary {
  totalChecks: number;
  passedChecks: number;

  /** Names of failed checks in report order, e.g. `['margin', 'budget']` */
  failedChecks: string[];

  allPassed: boolean;
}

/**
 * Count pass/fail verdicts of a result.
 * Page-count fields are observations, not checks.
 */
export function summarizeCompliance(result: ComplianceResult): ComplianceSummary {
  const checks: Array<[string, CheckStatus]> = [
    ...FORMAT_CHECKS.map((name): [string, CheckStatus] => [
      name,
      result.format[name],
    ]),
    ...SECTION_CATEGORIES.map((category): [string, CheckStatus] => [
      category,
      result.content[category],
    ]),
  ];

  const failedChecks = checks
    .filter(([, status]) => status === 'fail')
    .map(([name]) => name);

  return {
    totalChecks: checks.length,
    passedChecks: checks.length - failedChecks.length,
    failedChecks,
    allPassed: failedChecks.length === 0,
  };
}
