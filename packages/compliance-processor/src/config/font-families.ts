/**
 * Name fragments under which common families appear in embedded font names.
 * Keys are lower-cased family names.
 */
const KNOWN_FONT_FAMILY_VARIANTS: Readonly<Record<string, readonly string[]>> = {
  'times new roman': ['Times', 'Times-Roman', 'TimesNewRoman', 'Times New Roman'],
  'courier new': ['Courier', 'CourierNew', 'Courier New'],
};

/**
 * Accepted name fragments for a required font family.
 *
 * Families without a known list accept the name as written, without
 * spaces (`TimesNewRoman`) and hyphenated (`Times-New-Roman`), since PDF
 * producers strip or replace spaces in PostScript names.
 */
export const getFontFamilyVariants = (family: string): string[] => {
  const name = family.trim();
  const known = KNOWN_FONT_FAMILY_VARIANTS[name.toLowerCase()];
  if (known) {
    return [...known];
  }

  return [
    ...new Set([name, name.replace(/\s+/g, ''), name.replace(/\s+/g, '-')]),
  ];
};
