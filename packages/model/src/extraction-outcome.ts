/**
 * Best-effort extraction results
 *
 * Extractors never throw past their own boundary. They return a value (possibly
 * empty or defaulted) together with diagnostics describing what went wrong.
 */

/**
 * Pipeline stage that produced a diagnostic
 */
export type ExtractionStage =
  | 'validity'
  | 'typography'
  | 'margin'
  | 'page-text'
  | 'section';

export interface ExtractionDiagnostic {
  stage: ExtractionStage;

  /** Human-readable failure description */
  message: string;

  /** 1-based page number, when the failure is tied to a single page */
  pageNumber?: number;
}

export interface ExtractionOutcome<T> {
  value: T;
  diagnostics: ExtractionDiagnostic[];
}
