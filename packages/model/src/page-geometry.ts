/**
 * Page geometry types shared by the margin extractor and its consumers.
 *
 * All point values use a top-left page origin: `top` grows downward from the
 * upper edge of the page view box. One inch is 72 points.
 */

/**
 * Physical page size in points
 */
export interface PageGeometry {
  width: number;
  height: number;
}

/**
 * Bounding box of one extracted character (or run of characters) in points
 */
export interface CharBox {
  /** Left edge */
  x0: number;

  /** Right edge */
  x1: number;

  /** Distance from the top of the page to the upper edge of the box */
  top: number;

  /** Distance from the top of the page to the lower edge of the box */
  bottom: number;
}

/**
 * Page margins in inches, measured from each page edge to the nearest character
 */
export interface MarginMeasurement {
  left: number;
  right: number;
  top: number;
  bottom: number;
}
