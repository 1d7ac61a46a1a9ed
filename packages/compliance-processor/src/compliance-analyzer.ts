import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  CompliancePolicy,
  ComplianceResult,
  ExtractionDiagnostic,
  FormatSignals,
  SectionMatchSet,
  SectionPatterns,
} from '@pdf-compliance/model';
import type {
  PdfParserStrategy,
  ValidityReport,
} from '@pdf-compliance/pdf-parser';

import { createConsoleLogger } from '@pdf-compliance/logger';
import {
  DocumentValidityChecker,
  MarginExtractor,
  TypographyExtractor,
} from '@pdf-compliance/pdf-parser';

import { DEFAULT_COMPLIANCE_POLICY } from './config/compliance-policy';
import { SectionDetector } from './detectors/section-detector';
import { ComplianceEvaluator } from './evaluators/compliance-evaluator';

/**
 * ComplianceAnalyzer Options
 */
export interface ComplianceAnalyzerOptions {
  /**
   * Logger instance (default: console logger at `warn`)
   */
  logger?: LoggerMethods;

  /**
   * Policy used when a call does not pass its own (default: DEFAULT_COMPLIANCE_POLICY)
   */
  policy?: CompliancePolicy;

  /**
   * Section patterns (default: SECTION_KEYWORDS)
   */
  sectionPatterns?: SectionPatterns;

  /**
   * Parser strategies for the validity check, in order (default: pdf.js, then pdf-lib)
   */
  parserStrategies?: readonly PdfParserStrategy[];
}

/**
 * Per-call options
 */
export interface AnalyzeOptions {
  /**
   * Policy for this call only
   */
  policy?: CompliancePolicy;

  /**
   * When aborted, analysis stops at the next checkpoint between stages.
   */
  abortSignal?: AbortSignal;
}

/**
 * Result with the evidence behind it
 */
export interface ComplianceAnalysis {
  result: ComplianceResult;
  signals: FormatSignals;
  sections: SectionMatchSet;
  validity: ValidityReport;
  diagnostics: ExtractionDiagnostic[];
}

/**
 * ComplianceAnalyzer
 *
 * Runs one PDF through the whole pipeline:
 *
 * 1. Validity gate (parser strategies)
 * 2. Typography and page-1 margins, only for valid documents
 * 3. Section detection from page text
 * 4. Evaluation against the policy
 *
 * Each call is independent; nothing is cached between documents.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger } from '@pdf-compliance/logger';
 * import {
 *   ComplianceAnalyzer,
 *   createCompliancePolicy,
 * } from '@pdf-compliance/compliance-processor';
 *
 * const analyzer = new ComplianceAnalyzer({
 *   logger: createConsoleLogger('info'),
 *   policy: createCompliancePolicy({ sectionPageLimits: { budget: 2 } }),
 * });
 *
 * const result = await analyzer.analyze(await readFile('proposal.pdf'));
 * console.log(result.format.margin, result.content.budget_pages);
 * ```
 */
export class ComplianceAnalyzer {
  private readonly logger: LoggerMethods;
  private readonly policy: CompliancePolicy;
  private readonly validityChecker: DocumentValidityChecker;
  private readonly typographyExtractor: TypographyExtractor;
  private readonly marginExtractor: MarginExtractor;
  private readonly sectionDetector: SectionDetector;
  private readonly evaluator: ComplianceEvaluator;

  constructor(options: ComplianceAnalyzerOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger('warn');
    this.policy = options.policy ?? DEFAULT_COMPLIANCE_POLICY;
    this.validityChecker = new DocumentValidityChecker(
      this.logger,
      options.parserStrategies,
    );
    this.typographyExtractor = new TypographyExtractor(this.logger);
    this.marginExtractor = new MarginExtractor(this.logger);
    this.sectionDetector = new SectionDetector(this.logger, {
      patterns: options.sectionPatterns,
    });
    this.evaluator = new ComplianceEvaluator(this.logger);
  }

  async analyze(
    bytes: Uint8Array,
    options?: AnalyzeOptions,
  ): Promise<ComplianceResult> {
    const analysis = await this.analyzeDetailed(bytes, options);
    return analysis.result;
  }

  /**
   * Analyze a document and keep the signals, matches and diagnostics
   *
   * @throws {Error} with name 'AbortError' if the abort signal fires
   */
  async analyzeDetailed(
    bytes: Uint8Array,
    options?: AnalyzeOptions,
  ): Promise<ComplianceAnalysis> {
    const policy = options?.policy ?? this.policy;
    const abortSignal = options?.abortSignal;
    const diagnostics: ExtractionDiagnostic[] = [];

    this.logger.info(
      `[ComplianceAnalyzer] Starting analysis (${bytes.byteLength} bytes)...`,
    );

    this.checkAborted(abortSignal);
    const validity = await this.validityChecker.check(bytes);
    diagnostics.push(
      ...validity.failures.map(
        (failure): ExtractionDiagnostic => ({
          stage: 'validity',
          message: `${failure.strategy}: ${failure.message}`,
        }),
      ),
    );

    this.checkAborted(abortSignal);
    const signals = await this.collectFormatSignals(
      bytes,
      validity,
      diagnostics,
    );

    this.checkAborted(abortSignal);
    const sections = await this.sectionDetector.detect(bytes);
    diagnostics.push(...sections.diagnostics);

    const result = this.evaluator.evaluate(signals, sections.value, policy);

    this.logger.info('[ComplianceAnalyzer] Analysis complete');

    return {
      result,
      signals,
      sections: sections.value,
      validity,
      diagnostics,
    };
  }

  /**
   * Typography and margins for a valid document. An invalid document is never
   * handed to the extractors.
   */
  private async collectFormatSignals(
    bytes: Uint8Array,
    validity: ValidityReport,
    diagnostics: ExtractionDiagnostic[],
  ): Promise<FormatSignals> {
    if (!validity.valid) {
      this.logger.warn(
        '[ComplianceAnalyzer] Document is not a parseable PDF, skipping typography and margin extraction',
      );
      return { isValidDocument: false };
    }

    const typography = await this.typographyExtractor.extract(bytes);
    const margins = await this.marginExtractor.extract(bytes);
    diagnostics.push(...typography.diagnostics, ...margins.diagnostics);

    return {
      isValidDocument: true,
      typography: typography.value,
      margins: margins.value,
    };
  }

  /**
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(abortSignal?: AbortSignal): void {
    if (abortSignal?.aborted) {
      const error = new Error('Compliance analysis was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}
