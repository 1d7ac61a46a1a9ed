import type { CompliancePolicy } from '@pdf-compliance/model';

import { z } from 'zod';

import { getFontFamilyVariants } from './font-families';

/**
 * Default page limits per section category
 */
export const DEFAULT_SECTION_PAGE_LIMITS = {
  technical_requirements: 8,
  budget: 4,
  qualification: 4,
} as const;

/**
 * Default policy values
 */
export const POLICY_DEFAULTS = {
  requiredFontSize: 12,
  requiredFontFamily: 'Times New Roman',
  requiredMarginInches: 1.0,
  fontSizeTolerance: 1,
  marginToleranceInches: 0.2,
} as const;

/**
 * Shape of policy overrides.
 *
 * Only types are checked. Value ranges (e.g. a negative tolerance) are the
 * caller's responsibility.
 */
export const CompliancePolicyOverridesSchema = z
  .object({
    requiredFontSize: z.number(),
    requiredFontFamily: z.string(),
    acceptedFontFamilyVariants: z.array(z.string()),
    requiredMarginInches: z.number(),
    fontSizeTolerance: z.number(),
    marginToleranceInches: z.number(),
    sectionPageLimits: z
      .object({
        technical_requirements: z.number(),
        budget: z.number(),
        qualification: z.number(),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type CompliancePolicyOverrides = z.input<
  typeof CompliancePolicyOverridesSchema
>;

/**
 * Build an immutable policy from partial overrides.
 *
 * When `requiredFontFamily` is overridden without `acceptedFontFamilyVariants`,
 * the variants are derived from the new family.
 *
 * @throws {z.ZodError} When an override has the wrong type or an unknown key
 */
export function createCompliancePolicy(
  overrides: CompliancePolicyOverrides = {},
): CompliancePolicy {
  const parsed = CompliancePolicyOverridesSchema.parse(overrides);
  const requiredFontFamily =
    parsed.requiredFontFamily ?? POLICY_DEFAULTS.requiredFontFamily;
  const limits = parsed.sectionPageLimits ?? {};

  return Object.freeze({
    requiredFontSize: parsed.requiredFontSize ?? POLICY_DEFAULTS.requiredFontSize,
    requiredFontFamily,
    acceptedFontFamilyVariants: Object.freeze(
      parsed.acceptedFontFamilyVariants ??
        getFontFamilyVariants(requiredFontFamily),
    ),
    requiredMarginInches:
      parsed.requiredMarginInches ?? POLICY_DEFAULTS.requiredMarginInches,
    fontSizeTolerance:
      parsed.fontSizeTolerance ?? POLICY_DEFAULTS.fontSizeTolerance,
    marginToleranceInches:
      parsed.marginToleranceInches ?? POLICY_DEFAULTS.marginToleranceInches,
    sectionPageLimits: Object.freeze({
      technical_requirements:
        limits.technical_requirements ??
        DEFAULT_SECTION_PAGE_LIMITS.technical_requirements,
      budget: limits.budget ?? DEFAULT_SECTION_PAGE_LIMITS.budget,
      qualification:
        limits.qualification ?? DEFAULT_SECTION_PAGE_LIMITS.qualification,
    }),
  });
}

/**
 * Policy used when none is given
 */
export const DEFAULT_COMPLIANCE_POLICY: CompliancePolicy =
  createCompliancePolicy();

const optionalNumber = z.coerce.number().optional();

/**
 * Environment variables read by loadPolicyFromEnv
 */
const PolicyEnvSchema = z.object({
  COMPLIANCE_FONT_SIZE: optionalNumber,
  COMPLIANCE_FONT_FAMILY: z.string().optional(),
  COMPLIANCE_MARGIN_INCHES: optionalNumber,
  COMPLIANCE_MARGIN_TOLERANCE: optionalNumber,
  COMPLIANCE_FONT_SIZE_TOLERANCE: optionalNumber,
  COMPLIANCE_LIMIT_TECHNICAL_REQUIREMENTS: optionalNumber,
  COMPLIANCE_LIMIT_BUDGET: optionalNumber,
  COMPLIANCE_LIMIT_QUALIFICATION: optionalNumber,
});

/**
 * Build a policy from `COMPLIANCE_*` environment variables.
 * Unset or empty variables keep their defaults.
 *
 * @throws {z.ZodError} When a numeric variable is not a number
 */
export function loadPolicyFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): CompliancePolicy {
  const present = Object.fromEntries(
    Object.entries(env).flatMap(([key, value]): Array<[string, string]> => {
      const trimmed = value?.trim();
      return trimmed ? [[key, trimmed]] : [];
    }),
  );

  const vars = PolicyEnvSchema.parse(present);

  return createCompliancePolicy({
    requiredFontSize: vars.COMPLIANCE_FONT_SIZE,
    requiredFontFamily: vars.COMPLIANCE_FONT_FAMILY,
    requiredMarginInches: vars.COMPLIANCE_MARGIN_INCHES,
    marginToleranceInches: vars.COMPLIANCE_MARGIN_TOLERANCE,
    fontSizeTolerance: vars.COMPLIANCE_FONT_SIZE_TOLERANCE,
    sectionPageLimits: {
      technical_requirements: vars.COMPLIANCE_LIMIT_TECHNICAL_REQUIREMENTS,
      budget: vars.COMPLIANCE_LIMIT_BUDGET,
      qualification: vars.COMPLIANCE_LIMIT_QUALIFICATION,
    },
  });
}
