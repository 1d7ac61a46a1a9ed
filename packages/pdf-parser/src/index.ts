export { openPdfjsDocument, withPdfjsDocument } from './core/pdfjs-document-loader';
export { PDF_GEOMETRY, PDFJS_LOAD_OPTIONS } from './config/constants';
export { PdfLoadError } from './errors/pdf-load-error';
export {
  PdfLibParserStrategy,
  PdfjsParserStrategy,
  createDefaultParserStrategies,
} from './strategies';
export type { PdfParserStrategy } from './strategies';
export { DocumentValidityChecker } from './validators/document-validity-checker';
export type {
  StrategyFailure,
  ValidityReport,
} from './validators/document-validity-checker';
export { TypographyExtractor } from './processors/typography-extractor';
export { MarginExtractor, ZERO_MARGINS } from './processors/margin-extractor';
export { PageTextExtractor } from './processors/page-text-extractor';
export {
  getTextItemFontSize,
  roundHalfToEven,
} from './utils/text-items';
export {
  computeMargins,
  getPageGeometry,
  toCharBox,
} from './utils/char-boxes';
export type {
  PdfjsDocument,
  PdfjsPage,
  PdfjsTextContent,
  PdfjsTextItem,
  PdfjsTextStyle,
} from './types/pdfjs-like';
