import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  CheckStatus,
  CompliancePolicy,
  ComplianceResult,
  ContentCheckResult,
  FormatCheckResult,
  FormatSignals,
  MarginMeasurement,
  SectionCategory,
  SectionMatchSet,
} from '@pdf-compliance/model';

import { summarizeCompliance } from '../summary/compliance-summary';

/**
 * Absorbs floating-point noise when a value sits exactly on a tolerance edge
 * (e.g. 86.4 / 72 is 1.2000000000000002)
 */
const TOLERANCE_EPSILON = 1e-9;

const toStatus = (passed: boolean): CheckStatus => (passed ? 'pass' : 'fail');

export const isWithinTolerance = (
  actual: number,
  required: number,
  tolerance: number,
): boolean => Math.abs(actual - required) <= tolerance + TOLERANCE_EPSILON;

/**
 * True when any observed size is within tolerance of the required size
 */
export const hasCompliantFontSize = (
  fontSizes: Iterable<number>,
  policy: CompliancePolicy,
): boolean => {
  for (const size of fontSizes) {
    if (
      isWithinTolerance(size, policy.requiredFontSize, policy.fontSizeTolerance)
    ) {
      return true;
    }
  }
  return false;
};

/**
 * True when any observed font name contains an accepted variant,
 * case-insensitively (`ABCDEF+TimesNewRomanPSMT` contains `timesnewroman`)
 */
export const hasCompliantFontFamily = (
  fontFamilies: Iterable<string>,
  policy: CompliancePolicy,
): boolean => {
  const variants = policy.acceptedFontFamilyVariants.map((variant) =>
    variant.toLowerCase(),
  );
  for (const family of fontFamilies) {
    const name = family.toLowerCase();
    if (variants.some((variant) => name.includes(variant))) {
      return true;
    }
  }
  return false;
};

/**
 * True when every margin is within tolerance of the required margin
 */
export const hasCompliantMargins = (
  margins: MarginMeasurement,
  policy: CompliancePolicy,
): boolean =>
  [margins.left, margins.right, margins.top, margins.bottom].every((margin) =>
    isWithinTolerance(
      margin,
      policy.requiredMarginInches,
      policy.marginToleranceInches,
    ),
  );

export function evaluateFormat(
  signals: FormatSignals,
  policy: CompliancePolicy,
): FormatCheckResult {
  if (!signals.isValidDocument) {
    return {
      file_type: 'fail',
      font_size: 'fail',
      font_family: 'fail',
      margin: 'fail',
    };
  }

  return {
    file_type: 'pass',
    font_size: toStatus(
      hasCompliantFontSize(signals.typography.fontSizes, policy),
    ),
    font_family: toStatus(
      hasCompliantFontFamily(signals.typography.fontFamilies, policy),
    ),
    margin: toStatus(hasCompliantMargins(signals.margins, policy)),
  };
}

export function evaluateContent(
  sections: SectionMatchSet,
  policy: CompliancePolicy,
): ContentCheckResult {
  const verdict = (category: SectionCategory): CheckStatus =>
    toStatus(sections[category].length <= policy.sectionPageLimits[category]);

  return {
    technical_requirements: verdict('technical_requirements'),
    technical_requirements_pages: sections.technical_requirements.length,
    budget: verdict('budget'),
    budget_pages: sections.budget.length,
    qualification: verdict('qualification'),
    qualification_pages: sections.qualification.length,
  };
}

/**
 * ComplianceEvaluator
 *
 * Judges format signals and section matches against a policy.
 * Holds no state besides its logger, so one instance serves any number of
 * policies and documents.
 */
export class ComplianceEvaluator {
  constructor(private readonly logger: LoggerMethods) {}

  evaluate(
    signals: FormatSignals,
    sections: SectionMatchSet,
    policy: CompliancePolicy,
  ): ComplianceResult {
    const result: ComplianceResult = {
      format: evaluateFormat(signals, policy),
      content: evaluateContent(sections, policy),
    };

    const summary = summarizeCompliance(result);
    if (summary.allPassed) {
      this.logger.info(
        `[ComplianceEvaluator] All ${summary.totalChecks} checks passed`,
      );
    } else {
      this.logger.info(
        `[ComplianceEvaluator] ${summary.passedChecks}/${summary.totalChecks} checks passed; failed: ${summary.failedChecks.join(', ')}`,
      );
    }

    return result;
  }
}
