/**
 * Topical section buckets detected by keyword patterns
 */
export type SectionCategory = 'technical_requirements' | 'budget' | 'qualification';

/**
 * Ordered detection patterns per category.
 * Strings are compiled as case-insensitive regular expressions.
 */
export type SectionPatterns = Readonly<
  Record<SectionCategory, readonly (string | RegExp)[]>
>;

/**
 * 1-based page numbers where each category matched.
 *
 * Pages appear in ascending traversal order and at most once per category.
 */
export type SectionMatchSet = Record<SectionCategory, number[]>;
