/**
 * Structural view of the pdf.js objects this package reads.
 *
 * pdf.js proxies (`PDFDocumentProxy`, `PDFPageProxy`, `TextContent`) satisfy
 * these interfaces, which keeps the extractors independent of the pdf.js
 * build in use and lets tests hand-build documents.
 */

export interface PdfjsTextStyle {
  fontFamily: string;
  ascent: number;

  /** Descender as a (usually negative) fraction of the font size */
  descent: number;
}

export interface PdfjsTextContent {
  /** Text items mixed with marked-content markers */
  items: readonly unknown[];
  styles: Readonly<Record<string, PdfjsTextStyle>>;
}

/**
 * Text item of `getTextContent()`, narrowed with `isPdfjsTextItem`
 */
export interface PdfjsTextItem {
  str: string;

  /** Text matrix `[a, b, c, d, e, f]` in PDF user space (bottom-left origin) */
  transform: readonly number[];
  width: number;
  height: number;

  /** pdf.js internal font id, e.g. `g_d0_f1` */
  fontName: string;
  hasEOL: boolean;
}

/**
 * Objects resolved by the pdf.js worker (fonts, images), keyed by id
 */
export interface PdfjsObjectStore {
  has(objId: string): boolean;
  get(objId: string): unknown;
}

export interface PdfjsPage {
  /** Page view box `[x0, y0, x1, y1]` in points */
  view: readonly number[];
  commonObjs: PdfjsObjectStore;
  getTextContent(): Promise<PdfjsTextContent>;
  getOperatorList(): Promise<unknown>;
}

export interface PdfjsDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPage>;
  destroy(): Promise<void>;
}
