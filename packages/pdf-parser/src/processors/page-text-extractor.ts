import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  ExtractionDiagnostic,
  ExtractionOutcome,
} from '@pdf-compliance/model';

import type { PdfjsDocument } from '../types/pdfjs-like';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';
import { PdfLoadError } from '../errors/pdf-load-error';
import { isPdfjsTextItem } from '../utils/text-items';

/**
 * Extracts the plain text of every PDF page with pdf.js.
 *
 * Failures are logged as warnings and produce empty strings, so a single
 * unreadable page never hides the text of the others.
 */
export class PageTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Extract text from all pages of a PDF.
   *
   * @returns Map of 1-based page numbers to extracted text strings
   */
  async extractText(
    bytes: Uint8Array,
  ): Promise<ExtractionOutcome<Map<number, string>>> {
    const pageTexts = new Map<number, string>();
    const diagnostics: ExtractionDiagnostic[] = [];

    try {
      await withPdfjsDocument(bytes, async (document) => {
        this.logger.info(
          `[PageTextExtractor] Extracting text from ${document.numPages} pages...`,
        );
        for (let page = 1; page <= document.numPages; page++) {
          pageTexts.set(
            page,
            await this.extractPageText(document, page, diagnostics),
          );
        }
      });
    } catch (error) {
      const message = PdfLoadError.getErrorMessage(error);
      this.logger.warn(`[PageTextExtractor] Extraction failed: ${message}`);
      diagnostics.push({ stage: 'page-text', message });
      return { value: pageTexts, diagnostics };
    }

    const nonEmptyCount = [...pageTexts.values()].filter(
      (t) => t.trim().length > 0,
    ).length;
    this.logger.info(
      `[PageTextExtractor] Extracted text from ${nonEmptyCount}/${pageTexts.size} pages`,
    );

    return { value: pageTexts, diagnostics };
  }

  /**
   * Extract text from a single page. Text items are concatenated in content
   * order, with a line break wherever pdf.js reports an end of line.
   * Returns empty string on failure (logged as warning).
   */
  async extractPageText(
    document: PdfjsDocument,
    page: number,
    diagnostics: ExtractionDiagnostic[] = [],
  ): Promise<string> {
    try {
      const pdfPage = await document.getPage(page);
      const content = await pdfPage.getTextContent();
      return content.items
        .filter(isPdfjsTextItem)
        .map((item) => (item.hasEOL ? `${item.str}\n` : item.str))
        .join('');
    } catch (error) {
      const message = PdfLoadError.getErrorMessage(error);
      this.logger.warn(
        `[PageTextExtractor] Text extraction failed for page ${page}: ${message}`,
      );
      diagnostics.push({ stage: 'page-text', message, pageNumber: page });
      return '';
    }
  }
}
