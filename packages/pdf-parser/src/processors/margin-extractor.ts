import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  ExtractionOutcome,
  MarginMeasurement,
} from '@pdf-compliance/model';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';
import { PdfLoadError } from '../errors/pdf-load-error';
import { computeMargins, getPageGeometry, toCharBox } from '../utils/char-boxes';
import { hasVisibleText, isPdfjsTextItem } from '../utils/text-items';

/**
 * Margins reported when nothing can be measured
 */
export const ZERO_MARGINS: Readonly<MarginMeasurement> = Object.freeze({
  left: 0,
  right: 0,
  top: 0,
  bottom: 0,
});

/**
 * Measures page margins from the first page's character boxes.
 *
 * Only page 1 is sampled. A page without characters yields all-zero margins,
 * which downstream is indistinguishable from a page printed edge to edge.
 */
export class MarginExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  async extract(bytes: Uint8Array): Promise<ExtractionOutcome<MarginMeasurement>> {
    try {
      const margins = await withPdfjsDocument(bytes, async (document) => {
        if (document.numPages < 1) {
          return null;
        }

        const page = await document.getPage(1);
        const content = await page.getTextContent();
        const boxes = content.items
          .filter(isPdfjsTextItem)
          .filter(hasVisibleText)
          .map((item) => toCharBox(item, page.view, content.styles[item.fontName]));

        return boxes.length > 0
          ? computeMargins(boxes, getPageGeometry(page.view))
          : null;
      });

      if (!margins) {
        this.logger.warn('[MarginExtractor] No characters found on page 1');
        return {
          value: { ...ZERO_MARGINS },
          diagnostics: [
            {
              stage: 'margin',
              message: 'No characters found on page 1',
              pageNumber: 1,
            },
          ],
        };
      }

      this.logger.debug(
        `[MarginExtractor] Margins (in): left=${margins.left.toFixed(3)} right=${margins.right.toFixed(3)} top=${margins.top.toFixed(3)} bottom=${margins.bottom.toFixed(3)}`,
      );
      return { value: margins, diagnostics: [] };
    } catch (error) {
      const message = PdfLoadError.getErrorMessage(error);
      this.logger.warn(`[MarginExtractor] Extraction failed: ${message}`);
      return {
        value: { ...ZERO_MARGINS },
        diagnostics: [{ stage: 'margin', message, pageNumber: 1 }],
      };
    }
  }
}
