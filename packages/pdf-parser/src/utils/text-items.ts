import type { PdfjsTextItem } from '../types/pdfjs-like';

/**
 * Narrow a `getTextContent()` entry to a text item.
 * Marked-content markers and malformed entries are rejected.
 */
export const isPdfjsTextItem = (item: unknown): item is PdfjsTextItem => {
  if (typeof item !== 'object' || item === null) {
    return false;
  }

  return (
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform) &&
    item.transform.length >= 6 &&
    item.transform.every((value: unknown) => typeof value === 'number') &&
    'width' in item &&
    typeof item.width === 'number' &&
    'height' in item &&
    typeof item.height === 'number' &&
    'fontName' in item &&
    typeof item.fontName === 'string' &&
    'hasEOL' in item &&
    typeof item.hasEOL === 'boolean'
  );
};

/**
 * Whether a text item carries visible characters
 */
export const hasVisibleText = (item: PdfjsTextItem): boolean =>
  item.str.trim().length > 0;

/**
 * Font size of a text item in points.
 *
 * Uses the vertical scale of the text matrix so horizontal scaling (`Tz`)
 * does not inflate the size; falls back to the horizontal scale for
 * degenerate matrices.
 */
export const getTextItemFontSize = (item: PdfjsTextItem): number => {
  const [a, b, c, d] = item.transform;
  return Math.hypot(c, d) || Math.hypot(a, b);
};

/**
 * Values this close to a .5 tie are treated as ties (pdf.js reports
 * 10.5pt text as 10.499999999999998 or similar)
 */
const TIE_EPSILON = 1e-9;

/**
 * Round to the nearest integer, with .5 ties going to the even neighbour
 * (10.5 → 10, 11.5 → 12, 12.5 → 12)
 */
export const roundHalfToEven = (value: number): number => {
  const floor = Math.floor(value);
  if (Math.abs(value - floor - 0.5) <= TIE_EPSILON) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(value);
};
