/**
 * Page geometry constants
 */
export const PDF_GEOMETRY = {
  /**
   * PDF user-space units (points) per inch
   */
  POINTS_PER_INCH: 72,
} as const;

/**
 * Options passed to pdf.js `getDocument` for every load
 */
export const PDFJS_LOAD_OPTIONS = {
  /**
   * Errors only; pdf.js warnings about missing standard font data are noise here
   */
  verbosity: 0,

  /**
   * Never compile font programs with `eval`
   */
  isEvalSupported: false,

  /**
   * No DOM in Node.js, so fonts are never attached as FontFace objects
   */
  disableFontFace: true,

  useSystemFonts: false,
} as const;
