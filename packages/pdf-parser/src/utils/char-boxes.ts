import type { CharBox, MarginMeasurement, PageGeometry } from '@pdf-compliance/model';

import type { PdfjsTextItem, PdfjsTextStyle } from '../types/pdfjs-like';

import { PDF_GEOMETRY } from '../config/constants';
import { getTextItemFontSize } from './text-items';

/**
 * Page size from a pdf.js view box `[x0, y0, x1, y1]`
 */
export const getPageGeometry = (view: readonly number[]): PageGeometry => {
  const [x0 = 0, y0 = 0, x1 = 0, y1 = 0] = view;
  return { width: x1 - x0, height: y1 - y0 };
};

/**
 * Bounding box of a text item in top-left page coordinates.
 *
 * The box spans from the descender line (`baseline + descent * size`) up one
 * font size, and is shifted so the view box origin sits at (0, 0).
 */
export const toCharBox = (
  item: PdfjsTextItem,
  view: readonly number[],
  style?: PdfjsTextStyle,
): CharBox => {
  const [viewX0 = 0, viewY0 = 0] = view;
  const { height: pageHeight } = getPageGeometry(view);
  const size = getTextItemFontSize(item);
  const descent = style && Number.isFinite(style.descent) ? style.descent : 0;

  const x0 = item.transform[4] - viewX0;
  const boxBottom = item.transform[5] - viewY0 + descent * size;
  const boxTop = boxBottom + size;

  return {
    x0,
    x1: x0 + item.width,
    top: pageHeight - boxTop,
    bottom: pageHeight - boxBottom,
  };
};

/**
 * Derive margins in inches from the box enclosing every character.
 * `boxes` must not be empty.
 */
export const computeMargins = (
  boxes: readonly CharBox[],
  geometry: PageGeometry,
): MarginMeasurement => {
  const minX = Math.min(...boxes.map((box) => box.x0));
  const maxX = Math.max(...boxes.map((box) => box.x1));
  const minTop = Math.min(...boxes.map((box) => box.top));
  const maxBottom = Math.max(...boxes.map((box) => box.bottom));
  const { POINTS_PER_INCH } = PDF_GEOMETRY;

  return {
    left: minX / POINTS_PER_INCH,
    right: (geometry.width - maxX) / POINTS_PER_INCH,
    top: minTop / POINTS_PER_INCH,
    bottom: (geometry.height - maxBottom) / POINTS_PER_INCH,
  };
};
