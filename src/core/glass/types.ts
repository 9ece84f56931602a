/**
 * Glass design types
 * Shared data model for interlayer data, laminate stacks, load cases and results.
 *
 * All units:
 *   - Thickness / lengths: mm
 *   - Strengths / moduli: N/mm² (MPa)
 *   - Moments: N·mm per mm width
 *   - Temperatures: °C
 */

// ---------------------------------------------------------------------------
// Categorical inputs
// ---------------------------------------------------------------------------

export const DURATION_CLASSES = ['instantaneous', 'short', 'medium', 'long', 'permanent'] as const;
export type DurationClass = (typeof DURATION_CLASSES)[number];

export const GLASS_TYPES = ['annealed', 'heatStrengthened', 'toughened', 'chemicallyStrengthened'] as const;
export type GlassType = (typeof GLASS_TYPES)[number];

export const STANDARDS = ['EN16612', 'IStructE'] as const;
export type DesignStandard = (typeof STANDARDS)[number];

export const EDGE_CONDITIONS = ['noEdgeStress', 'asCut', 'arrissed', 'ground', 'polished'] as const;
export type EdgeCondition = (typeof EDGE_CONDITIONS)[number];

export const SURFACE_PROFILES = ['float', 'drawnSheet', 'patterned', 'wiredPolished', 'wiredPatterned'] as const;
export type SurfaceProfile = (typeof SURFACE_PROFILES)[number];

export const SURFACE_FINISHES = ['none', 'sandBlasted', 'acidEtched'] as const;
export type SurfaceFinish = (typeof SURFACE_FINISHES)[number];

export const PRESTRESS_ORIENTATIONS = ['horizontal', 'vertical'] as const;
export type PrestressOrientation = (typeof PRESTRESS_ORIENTATIONS)[number];

export const SAFETY_CLASSES = ['CC1', 'CC2', 'CC3'] as const;
export type SafetyClass = (typeof SAFETY_CLASSES)[number];

export interface IDurationClassInfo {
  label: string;
  /** Representative load duration (s) */
  seconds: number;
  description: string;
}

export const DURATION_CLASS_INFO: Record<DurationClass, IDurationClassInfo> = {
  instantaneous: { label: '3 sec', seconds: 3, description: 'Impact, single wind gust' },
  short: { label: '10 min', seconds: 600, description: 'Wind storm (cumulative)' },
  medium: { label: '1 day', seconds: 86_400, description: 'Maintenance, daily temperature' },
  long: { label: '1 month', seconds: 2_592_000, description: 'Snow' },
  permanent: { label: '50 years', seconds: 1_576_800_000, description: 'Self-weight, permanent' },
};

// ---------------------------------------------------------------------------
// Interlayer data
// ---------------------------------------------------------------------------

export interface MaterialSample {
  readonly productId: string;
  readonly temperatureC: number;
  readonly durationClass: DurationClass;
  readonly shearModulusMPa: number;
}

/** Input row shape for table ingestion (long format) */
export type MaterialSampleRow = MaterialSample;

/** Soft condition: query temperature outside the sampled range, value clamped */
export interface OutOfRangeExtrapolation {
  code: 'OutOfRangeExtrapolation';
  productId: string;
  durationClass: DurationClass;
  requestedTemperatureC: number;
  clampedTemperatureC: number;
}

export interface InterpolatedModulus {
  shearModulusMPa: number;
  /** True when the query hit a sample verbatim */
  exact: boolean;
  warning?: OutOfRangeExtrapolation;
}

// ---------------------------------------------------------------------------
// Pane build-up and geometry
// ---------------------------------------------------------------------------

export interface GlassPly {
  role: 'ply';
  thicknessMm: number;
  glassType: GlassType;
}

export interface InterlayerLayer {
  role: 'interlayer';
  thicknessMm: number;
  productId: string;
}

export type PaneLayer = GlassPly | InterlayerLayer;

/** Ordered from one face of the pane to the other */
export type LaminateStack = PaneLayer[];

export type SupportGeometry =
  | { kind: 'beam'; spanMm: number }
  | { kind: 'plate'; shortSideMm: number; longSideMm: number };

export interface EffectiveThicknessResult {
  /** Effective thickness for bending stress (governing ply) */
  bendingMm: number;
  /** Effective thickness for deflection */
  deflectionMm: number;
  /** Shear transfer coefficient, 0 = layered, 1 = monolithic */
  omega: number;
  layeredLimit: { bendingMm: number; deflectionMm: number };
  monolithicLimit: { bendingMm: number; deflectionMm: number };
  /** Bending effective thickness per ply, in stack order */
  plies: number[];
}

// ---------------------------------------------------------------------------
// Load cases and requests
// ---------------------------------------------------------------------------

export type LoadAction =
  | { kind: 'stress'; valueMPa: number }
  | { kind: 'moment'; valueNmmPerMm: number };

export interface LoadCase {
  name?: string;
  durationClass: DurationClass;
  temperatureC: number;
  action: LoadAction;
}

export interface FactorInputs {
  standard: DesignStandard;
  edgeCondition: EdgeCondition;
  surfaceProfile: SurfaceProfile;
  surfaceFinish: SurfaceFinish;
  prestressOrientation: PrestressOrientation;
  safetyClass: SafetyClass;
}

export interface DesignRequest extends FactorInputs {
  stack: LaminateStack;
  geometry: SupportGeometry;
  loadCases: LoadCase[];
}

// ---------------------------------------------------------------------------
// Factors and results
// ---------------------------------------------------------------------------

export interface FactorSet {
  kMod: number;        // Load duration factor
  kE: number;          // Edge strength factor
  kSp: number;         // Surface profile factor
  kSpFinish: number;   // Surface finish factor k'sp
  kV: number;          // Strengthening (prestress) factor, 0 for annealed
  gammaMA: number;     // Material factor, annealed component
  gammaMV: number | null; // Material factor, prestress component (null for annealed)
  fgk: number;         // Characteristic strength of annealed glass (MPa)
  fbk: number;         // Characteristic bending strength of the glass type (MPa)
}

export type FactorKey = 'kMod' | 'kE' | 'kSp' | 'kSpFinish' | 'gammaMA';

export interface IFactorStepTrace {
  step: string;
  value: number;
}

export interface DesignResult {
  index: number;
  loadCase: LoadCase;
  shearModulusMPa: number | null;
  thickness: EffectiveThicknessResult;
  /** Bending-stress effective thickness of the governing ply */
  effectiveThicknessMm: number;
  governingPly: number;
  glassType: GlassType;
  factors: FactorSet;
  designStrengthMPa: number;
  characteristicStrengthMPa: number;
  /** In the units of the load case action */
  characteristicResistance: number;
  /** In the units of the load case action */
  designResistance: number;
  utilizationRatio: number;
  steps: IFactorStepTrace[];
  status: 'OK' | 'FAIL';
  warnings: OutOfRangeExtrapolation[];
}

export interface DesignReport {
  standard: DesignStandard;
  results: DesignResult[];
  governing: DesignResult;
  governingIndex: number;
  maxUtilization: number;
  status: 'OK' | 'FAIL';
  warnings: OutOfRangeExtrapolation[];
}
