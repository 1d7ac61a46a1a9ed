import type { LoggerMethods } from '@pdf-compliance/logger';
import type {
  ExtractionOutcome,
  SectionCategory,
  SectionMatchSet,
  SectionPatterns,
} from '@pdf-compliance/model';

import { PageTextExtractor } from '@pdf-compliance/pdf-parser';

import { SECTION_CATEGORIES, SECTION_KEYWORDS } from '../config/section-keywords';

/**
 * SectionDetector options
 */
export interface SectionDetectorOptions {
  /**
   * Patterns per category (default: SECTION_KEYWORDS)
   */
  patterns?: SectionPatterns;

  /**
   * Source of per-page plain text (default: pdf.js PageTextExtractor)
   */
  pageTextExtractor?: Pick<PageTextExtractor, 'extractText'>;
}

/**
 * Compile a pattern as a case-insensitive, stateless regular expression.
 * Global and sticky flags are dropped so `test` never depends on `lastIndex`.
 */
const compilePattern = (pattern: string | RegExp): RegExp => {
  if (typeof pattern === 'string') {
    return new RegExp(pattern, 'i');
  }
  const flags = pattern.flags.replace(/[gyi]/g, '');
  return new RegExp(pattern.source, `${flags}i`);
};

export const createEmptySectionMatchSet = (): SectionMatchSet => ({
  technical_requirements: [],
  budget: [],
  qualification: [],
});

/**
 * SectionDetector
 *
 * Assigns pages to topical section categories by keyword presence.
 * Pages are visited in ascending order; within a category the first matching
 * pattern records the page once and the remaining patterns are skipped.
 */
export class SectionDetector {
  private readonly compiledPatterns: ReadonlyArray<{
    category: SectionCategory;
    patterns: RegExp[];
  }>;
  private readonly pageTextExtractor: Pick<PageTextExtractor, 'extractText'>;

  constructor(
    private readonly logger: LoggerMethods,
    options?: SectionDetectorOptions,
  ) {
    const patterns = options?.patterns ?? SECTION_KEYWORDS;
    this.compiledPatterns = SECTION_CATEGORIES.map((category) => ({
      category,
      patterns: patterns[category].map(compilePattern),
    }));
    this.pageTextExtractor =
      options?.pageTextExtractor ?? new PageTextExtractor(logger);
  }

  /**
   * Extract page text from PDF bytes and detect sections
   */
  async detect(bytes: Uint8Array): Promise<ExtractionOutcome<SectionMatchSet>> {
    const pageTexts = await this.pageTextExtractor.extractText(bytes);
    const matches = this.detectInPages(pageTexts.value);

    this.logger.info(
      `[SectionDetector] Detected sections: ${SECTION_CATEGORIES.map(
        (category) => `${category}=${matches[category].length}`,
      ).join(', ')}`,
    );

    return { value: matches, diagnostics: pageTexts.diagnostics };
  }

  /**
   * Detect sections in already extracted page text
   *
   * @param pageTexts Map of 1-based page numbers to page text
   */
  detectInPages(pageTexts: ReadonlyMap<number, string>): SectionMatchSet {
    const matches = createEmptySectionMatchSet();
    const pageNumbers = [...pageTexts.keys()].sort((a, b) => a - b);

    for (const pageNumber of pageNumbers) {
      const text = pageTexts.get(pageNumber);
      if (!text) {
        continue;
      }

      const lowered = text.toLowerCase();
      for (const { category, patterns } of this.compiledPatterns) {
        if (!patterns.some((pattern) => pattern.test(lowered))) {
          continue;
        }
        if (!matches[category].includes(pageNumber)) {
          matches[category].push(pageNumber);
        }
      }
    }

    return matches;
  }
}
