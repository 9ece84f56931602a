import { z } from 'zod';
import { GlassDesignError, type GlassDesignErrorCode } from './GlassDesignError';
import {
  DURATION_CLASSES,
  EDGE_CONDITIONS,
  GLASS_TYPES,
  PRESTRESS_ORIENTATIONS,
  SAFETY_CLASSES,
  STANDARDS,
  SURFACE_FINISHES,
  SURFACE_PROFILES,
  type DesignRequest,
  type FactorInputs,
  type GlassType,
  type MaterialSampleRow,
} from './types';

const finite = () => z.number().finite();

export const DurationClassSchema = z.enum(DURATION_CLASSES);

export const MaterialSampleRowSchema = z.object({
  productId: z.string().min(1),
  temperatureC: finite(),
  durationClass: DurationClassSchema,
  shearModulusMPa: finite().nonnegative(),
});

export const PaneLayerSchema = z.discriminatedUnion('role', [
  z.object({
    role: z.literal('ply'),
    thicknessMm: finite().positive(),
    glassType: z.enum(GLASS_TYPES),
  }),
  z.object({
    role: z.literal('interlayer'),
    thicknessMm: finite().positive(),
    productId: z.string().min(1),
  }),
]);

export const SupportGeometrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('beam'), spanMm: finite().positive() }),
  z.object({
    kind: z.literal('plate'),
    shortSideMm: finite().positive(),
    longSideMm: finite().positive(),
  }),
]);

export const LoadActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('stress'), valueMPa: finite().nonnegative() }),
  z.object({ kind: z.literal('moment'), valueNmmPerMm: finite().nonnegative() }),
]);

export const LoadCaseSchema = z.object({
  name: z.string().optional(),
  durationClass: DurationClassSchema,
  temperatureC: finite(),
  action: LoadActionSchema,
});

export const FactorInputsSchema = z.object({
  standard: z.enum(STANDARDS),
  edgeCondition: z.enum(EDGE_CONDITIONS),
  surfaceProfile: z.enum(SURFACE_PROFILES),
  surfaceFinish: z.enum(SURFACE_FINISHES),
  prestressOrientation: z.enum(PRESTRESS_ORIENTATIONS),
  safetyClass: z.enum(SAFETY_CLASSES),
});

export const DesignRequestSchema = FactorInputsSchema.extend({
  stack: z.array(PaneLayerSchema),
  geometry: SupportGeometrySchema,
  loadCases: z.array(LoadCaseSchema).min(1),
});

export const DesignStrengthTableInputSchema = FactorInputsSchema.extend({
  glassType: z.enum(GLASS_TYPES),
});

/**
 * Map the first zod issue onto the engine's error taxonomy.
 * An unknown enumeration value is an unsupported combination, not a malformed request.
 */
export function toGlassDesignError(
  error: z.ZodError,
  subject: string,
  mapEnumValues = true
): GlassDesignError {
  const issue = error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  let code: GlassDesignErrorCode = 'InvalidRequest';
  if (mapEnumValues && issue?.code === 'invalid_enum_value') {
    code = issue.path[issue.path.length - 1] === 'durationClass'
      ? 'UnsupportedDurationClass'
      : 'UnsupportedCombination';
  }
  const message = issue
    ? `Invalid ${subject}${path ? ` at '${path}'` : ''}: ${issue.message}`
    : `Invalid ${subject}`;
  return new GlassDesignError(code, message, { path, issues: error.issues });
}

export function parseDesignRequest(input: unknown): DesignRequest {
  const parsed = DesignRequestSchema.safeParse(input);
  if (!parsed.success) throw toGlassDesignError(parsed.error, 'design request');
  return parsed.data;
}

export function parseMaterialSampleRow(input: unknown): MaterialSampleRow {
  const parsed = MaterialSampleRowSchema.safeParse(input);
  if (!parsed.success) throw toGlassDesignError(parsed.error, 'material sample', false);
  return parsed.data;
}

export function parseDesignStrengthTableInput(input: unknown): FactorInputs & { glassType: GlassType } {
  const parsed = DesignStrengthTableInputSchema.safeParse(input);
  if (!parsed.success) throw toGlassDesignError(parsed.error, 'design strength input');
  return parsed.data;
}
