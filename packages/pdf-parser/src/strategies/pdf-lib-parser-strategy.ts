import type { PdfParserStrategy } from './parser-strategy';

import { PDFDocument } from 'pdf-lib';

import { PdfLoadError } from '../errors/pdf-load-error';

/**
 * Secondary strategy: pdf-lib, an independent object-level parser.
 *
 * Encrypted documents are opened without decrypting; only the page tree is read.
 */
export class PdfLibParserStrategy implements PdfParserStrategy {
  readonly name = 'pdf-lib';

  async countPages(bytes: Uint8Array): Promise<number> {
    try {
      const document = await PDFDocument.load(bytes, {
        ignoreEncryption: true,
        updateMetadata: false,
      });
      return document.getPageCount();
    } catch (error) {
      throw PdfLoadError.fromError('pdf-lib could not open the document', error);
    }
  }
}
