import type { SectionCategory } from './section-match';

/**
 * Thresholds and limits against which extracted signals are judged.
 *
 * A policy is an immutable value passed explicitly into every evaluation;
 * concurrent analyses with different policies never share state.
 */
export interface CompliancePolicy {
  /** Required body font size in points */
  readonly requiredFontSize: number;

  /** Required font family (matched semantically, see acceptedFontFamilyVariants) */
  readonly requiredFontFamily: string;

  /**
   * Name fragments accepted as the required family.
   * A font passes when its name contains any of them, case-insensitively.
   */
  readonly acceptedFontFamilyVariants: readonly string[];

  /** Required margin on every side, in inches */
  readonly requiredMarginInches: number;

  /** Allowed deviation from requiredFontSize, inclusive */
  readonly fontSizeTolerance: number;

  /** Allowed deviation from requiredMarginInches, inclusive */
  readonly marginToleranceInches: number;

  /** Maximum number of pages each section category may span */
  readonly sectionPageLimits: Readonly<Record<SectionCategory, number>>;
}
