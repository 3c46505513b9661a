import { z } from 'zod';
import type { FrostInputV1 } from '../schema/FrostInputV1';
import { InvalidInputError } from '../errors';
import type { InputIssue } from '../errors';

// ─── Plausibility Schema ──────────────────────────────────────────────────────
//
// Physical-plausibility rules for the seven user inputs.  Mean annual
// temperature is signed (ground colder than freezing is legitimate), so it is
// only required to be a finite number.
//
// Freezing season length may be zero: that season collapses vs and is
// reported downstream as a degenerate zero-depth result, not rejected here.

const finite = (label: string) =>
  z.number({
    required_error: `${label} is required`,
    invalid_type_error: `${label} must be a number`,
  }).finite(`${label} must be finite`);

export const FrostInputSchema = z.object({
  unitSystem: z.enum(['imperial', 'metric'], {
    errorMap: () => ({ message: "unitSystem must be 'imperial' or 'metric'" }),
  }),
  waterContentFormat: z.enum(['percent', 'fraction'], {
    errorMap: () => ({ message: "waterContentFormat must be 'percent' or 'fraction'" }),
  }).optional(),
  thermalConductivity: finite('thermalConductivity').gt(0, 'thermalConductivity must be > 0'),
  dryDensity: finite('dryDensity').gt(0, 'dryDensity must be > 0'),
  waterContent: finite('waterContent').gte(0, 'waterContent must be ≥ 0'),
  meanAnnualTemp: finite('meanAnnualTemp'),
  meanAnnualTempSource: z.enum(['ground', 'air'], {
    errorMap: () => ({ message: "meanAnnualTempSource must be 'ground' or 'air'" }),
  }).optional(),
  airFreezingIndex: finite('airFreezingIndex').gte(0, 'airFreezingIndex must be ≥ 0'),
  nFactor: finite('nFactor').gt(0, 'nFactor must be > 0'),
  freezingSeasonDays: finite('freezingSeasonDays').gte(0, 'freezingSeasonDays must be ≥ 0'),
});

function valueAt(raw: unknown, field: string): unknown {
  if (typeof raw !== 'object' || raw === null) return undefined;
  return Object.entries(raw).find(([key]) => key === field)?.[1];
}

/**
 * Input Validator – checks the raw shell input before any derived quantity
 * is computed.
 *
 * Pure: returns the parsed input or throws `InvalidInputError` naming the
 * first offending field.  The full issue list is attached to the error so a
 * form can highlight every bad field at once.
 */
export function validateFrostInput(raw: unknown): FrostInputV1 {
  const parsed = FrostInputSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  const issues: InputIssue[] = parsed.error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'input',
    message: issue.message,
  }));
  const [first] = issues;
  throw new InvalidInputError(
    first.field,
    `Invalid frost input: ${first.message}`,
    valueAt(raw, first.field),
    issues,
  );
}
