/**
 * One observed span of text sharing a single font family and size
 */
export interface TextRun {
  /** Font name as reported by the parser, without normalization */
  fontFamily: string;

  /** Font size in points, rounded to the nearest integer */
  fontSize: number;

  /** 0-based page index */
  pageIndex: number;
}

/**
 * Distinct font sizes and families observed anywhere in a document.
 * Empty sets mean no typography evidence was found.
 */
export interface TypographySummary {
  fontSizes: ReadonlySet<number>;
  fontFamilies: ReadonlySet<string>;
}
