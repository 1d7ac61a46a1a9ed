import type { MarginMeasurement } from './page-geometry';
import type { SectionCategory } from './section-match';
import type { TypographySummary } from './typography';

/**
 * Verdict vocabulary of every compliance check.
 * Serialized as-is by report exporters.
 */
export type CheckStatus = 'pass' | 'fail';

/**
 * Format checks. Field names are part of the report contract.
 */
export interface FormatCheckResult {
  file_type: CheckStatus;
  font_size: CheckStatus;
  font_family: CheckStatus;
  margin: CheckStatus;
}

/**
 * Content checks: a verdict per category plus the observed page count,
 * e.g. `{ budget: 'pass', budget_pages: 3, ... }`.
 */
export type ContentCheckResult = {
  [K in SectionCategory]: CheckStatus;
} & {
  [K in SectionCategory as `${K}_pages`]: number;
};

/**
 * Terminal artifact of one compliance analysis
 */
export interface ComplianceResult {
  format: FormatCheckResult;
  content: ContentCheckResult;
}

/**
 * Format evidence handed to the evaluator.
 *
 * When the document is not parseable no further extraction is attempted,
 * so the invalid variant carries nothing else.
 */
export type FormatSignals =
  | {
      isValidDocument: true;
      typography: TypographySummary;
      margins: MarginMeasurement;
    }
  | {
      isValidDocument: false;
    };
