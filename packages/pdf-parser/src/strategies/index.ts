import type { PdfParserStrategy } from './parser-strategy';

import { PdfLibParserStrategy } from './pdf-lib-parser-strategy';
import { PdfjsParserStrategy } from './pdfjs-parser-strategy';

export type { PdfParserStrategy } from './parser-strategy';
export { PdfLibParserStrategy } from './pdf-lib-parser-strategy';
export { PdfjsParserStrategy } from './pdfjs-parser-strategy';

/**
 * Default strategy order: pdf.js first, pdf-lib as fallback
 */
export const createDefaultParserStrategies = (): PdfParserStrategy[] => [
  new PdfjsParserStrategy(),
  new PdfLibParserStrategy(),
];
