export type {
  CharBox,
  MarginMeasurement,
  PageGeometry,
} from './page-geometry';
export type { TextRun, TypographySummary } from './typography';
export type {
  ExtractionDiagnostic,
  ExtractionOutcome,
  ExtractionStage,
} from './extraction-outcome';
export type {
  SectionCategory,
  SectionMatchSet,
  SectionPatterns,
} from './section-match';
export type { CompliancePolicy } from './compliance-policy';
export type {
  CheckStatus,
  ComplianceResult,
  ContentCheckResult,
  FormatCheckResult,
  FormatSignals,
} from './compliance-result';
