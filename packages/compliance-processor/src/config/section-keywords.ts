import type { SectionCategory, SectionPatterns } from '@pdf-compliance/model';

/**
 * Section categories in report order
 */
export const SECTION_CATEGORIES = [
  'technical_requirements',
  'budget',
  'qualification',
] as const satisfies readonly SectionCategory[];

/**
 * Default detection patterns per category.
 *
 * Patterns are searched (not anchored) in lower-cased page text, so partial
 * words such as `competenc` match "competence" and "competency" alike.
 */
export const SECTION_KEYWORDS: SectionPatterns = {
  technical_requirements: [
    'technical\\s+requirements?',
    'technical\\s+specifications?',
    'system\\s+requirements?',
    'technical\\s+details',
  ],
  budget: ['budget', 'financial', 'cost', 'pricing', 'expenses?'],
  qualification: [
    'qualifications?',
    'credentials?',
    'experience',
    'expertise',
    'competenc',
  ],
};
