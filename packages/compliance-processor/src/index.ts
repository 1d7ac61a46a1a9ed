export { ComplianceAnalyzer } from './compliance-analyzer';
export type {
  AnalyzeOptions,
  ComplianceAnalysis,
  ComplianceAnalyzerOptions,
} from './compliance-analyzer';
export {
  CompliancePolicyOverridesSchema,
  DEFAULT_COMPLIANCE_POLICY,
  DEFAULT_SECTION_PAGE_LIMITS,
  POLICY_DEFAULTS,
  createCompliancePolicy,
  loadPolicyFromEnv,
} from './config/compliance-policy';
export type { CompliancePolicyOverrides } from './config/compliance-policy';
export { getFontFamilyVariants } from './config/font-families';
export { SECTION_CATEGORIES, SECTION_KEYWORDS } from './config/section-keywords';
export {
  SectionDetector,
  createEmptySectionMatchSet,
} from './detectors/section-detector';
export type { SectionDetectorOptions } from './detectors/section-detector';
export {
  ComplianceEvaluator,
  evaluateContent,
  evaluateFormat,
  hasCompliantFontFamily,
  hasCompliantFontSize,
  hasCompliantMargins,
  isWithinTolerance,
} from './evaluators/compliance-evaluator';
export { summarizeCompliance } from './summary/compliance-summary';
export type { ComplianceSummary } from './summary/compliance-summary';
