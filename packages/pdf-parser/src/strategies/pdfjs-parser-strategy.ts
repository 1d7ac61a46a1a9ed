import type { PdfParserStrategy } from './parser-strategy';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';

/**
 * Primary strategy: Mozilla pdf.js, the same parser the extractors use
 */
export class PdfjsParserStrategy implements PdfParserStrategy {
  readonly name = 'pdf.js';

  countPages(bytes: Uint8Array): Promise<number> {
    return withPdfjsDocument(bytes, async (document) => document.numPages);
  }
}
