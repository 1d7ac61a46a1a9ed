import type { LoggerMethods } from '@pdf-compliance/logger';

import type { PdfParserStrategy } from '../strategies';

import { PdfLoadError } from '../errors/pdf-load-error';
import { createDefaultParserStrategies } from '../strategies';

/**
 * Why a single parser strategy rejected a document
 */
export interface StrategyFailure {
  strategy: string;
  message: string;
}

/**
 * Outcome of a validity check
 */
export interface ValidityReport {
  valid: boolean;

  /** Name of the strategy that opened the document, when valid */
  strategy?: string;

  /** Page count reported by that strategy, 0 when invalid */
  pageCount: number;

  /** Rejections from the strategies tried before the verdict */
  failures: StrategyFailure[];
}

/**
 * DocumentValidityChecker
 *
 * Decides whether a byte buffer is a structurally parseable PDF by trying an
 * ordered list of parser strategies until one opens it with at least one page.
 * Parser errors never escape; they are recorded in the report.
 *
 * @example
 * ```typescript
 * const checker = new DocumentValidityChecker(logger);
 * if (await checker.isValid(bytes)) {
 *   // extract typography and margins
 * }
 * ```
 */
export class DocumentValidityChecker {
  private readonly strategies: readonly PdfParserStrategy[];

  constructor(
    private readonly logger: LoggerMethods,
    strategies?: readonly PdfParserStrategy[],
  ) {
    this.strategies = strategies ?? createDefaultParserStrategies();
  }

  async check(bytes: Uint8Array): Promise<ValidityReport> {
    const failures: StrategyFailure[] = [];

    for (const strategy of this.strategies) {
      let message: string;
      try {
        const pageCount = await strategy.countPages(bytes);
        if (pageCount > 0) {
          this.logger.info(
            `[DocumentValidityChecker] ${strategy.name} opened the document (${pageCount} pages)`,
          );
          return { valid: true, strategy: strategy.name, pageCount, failures };
        }
        message = 'Document has no pages';
      } catch (error) {
        message = PdfLoadError.getErrorMessage(error);
      }

      this.logger.warn(
        `[DocumentValidityChecker] ${strategy.name} rejected the document: ${message}`,
      );
      failures.push({ strategy: strategy.name, message });
    }

    return { valid: false, pageCount: 0, failures };
  }

  async isValid(bytes: Uint8Array): Promise<boolean> {
    const report = await this.check(bytes);
    return report.valid;
  }
}
