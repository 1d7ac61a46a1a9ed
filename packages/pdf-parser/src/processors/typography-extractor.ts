import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  ExtractionDiagnostic,
  ExtractionOutcome,
  TextRun,
  TypographySummary,
} from '@pdf-compliance/model';

import type {
  PdfjsDocument,
  PdfjsPage,
  PdfjsTextStyle,
} from '../types/pdfjs-like';

import { withPdfjsDocument } from '../core/pdfjs-document-loader';
import { PdfLoadError } from '../errors/pdf-load-error';
import {
  getTextItemFontSize,
  hasVisibleText,
  isPdfjsTextItem,
  roundHalfToEven,
} from '../utils/text-items';

/**
 * Collects the distinct rounded font sizes and font names used anywhere in a PDF.
 *
 * Sizes are rounded to whole points, ties to even, because renderers report
 * fractional variations of the same size. Font names are kept exactly as pdf.js loads
 * them (e.g. `ABCDEF+TimesNewRomanPSMT`).
 *
 * A page that fails to parse is skipped with a diagnostic; if the document
 * itself cannot be opened, both sets come back empty.
 */
export class TypographyExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  async extract(
    bytes: Uint8Array,
  ): Promise<ExtractionOutcome<TypographySummary>> {
    const fontSizes = new Set<number>();
    const fontFamilies = new Set<string>();
    const diagnostics: ExtractionDiagnostic[] = [];

    try {
      await withPdfjsDocument(bytes, async (document) => {
        for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
          const runs = await this.readPageRuns(document, pageNumber, diagnostics);
          for (const run of runs) {
            fontSizes.add(run.fontSize);
            fontFamilies.add(run.fontFamily);
          }
        }
      });
    } catch (error) {
      const message = PdfLoadError.getErrorMessage(error);
      this.logger.warn(`[TypographyExtractor] Extraction failed: ${message}`);
      diagnostics.push({ stage: 'typography', message });
      return {
        value: { fontSizes: new Set(), fontFamilies: new Set() },
        diagnostics,
      };
    }

    this.logger.info(
      `[TypographyExtractor] Found ${fontSizes.size} font size(s) and ${fontFamilies.size} font name(s)`,
    );

    return { value: { fontSizes, fontFamilies }, diagnostics };
  }

  /**
   * Read the text runs of one page. Returns no runs (and records a
   * diagnostic) when the page cannot be read.
   */
  private async readPageRuns(
    document: PdfjsDocument,
    pageNumber: number,
    diagnostics: ExtractionDiagnostic[],
  ): Promise<TextRun[]> {
    try {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      const fontNames = await this.resolveFontNames(page, content.styles);

      return content.items
        .filter(isPdfjsTextItem)
        .filter(hasVisibleText)
        .map((item) => ({
          fontFamily: fontNames.get(item.fontName) ?? item.fontName,
          fontSize: roundHalfToEven(getTextItemFontSize(item)),
          pageIndex: pageNumber - 1,
        }));
    } catch (error) {
      const message = PdfLoadError.getErrorMessage(error);
      this.logger.warn(
        `[TypographyExtractor] Skipping page ${pageNumber}: ${message}`,
      );
      diagnostics.push({ stage: 'typography', message, pageNumber });
      return [];
    }
  }

  /**
   * Map pdf.js internal font ids to real font names.
   *
   * Font objects only reach `commonObjs` once the page's operator list has
   * been built. When that fails, the generic family from the text styles is
   * used instead.
   */
  private async resolveFontNames(
    page: PdfjsPage,
    styles: Readonly<Record<string, PdfjsTextStyle>>,
  ): Promise<Map<string, string>> {
    let fontsLoaded = true;
    try {
      await page.getOperatorList();
    } catch (error) {
      fontsLoaded = false;
      this.logger.debug(
        `[TypographyExtractor] Operator list unavailable, using style families: ${PdfLoadError.getErrorMessage(error)}`,
      );
    }

    const names = new Map<string, string>();
    for (const [fontId, style] of Object.entries(styles)) {
      const font =
        fontsLoaded && page.commonObjs.has(fontId)
          ? page.commonObjs.get(fontId)
          : undefined;
      names.set(fontId, getFontName(font) ?? (style.fontFamily || fontId));
    }
    return names;
  }
}

function getFontName(font: unknown): string | undefined {
  if (
    typeof font === 'object' &&
    font !== null &&
    'name' in font &&
    typeof font.name === 'string' &&
    font.name.length > 0
  ) {
    return font.name;
  }
  return undefined;
}
