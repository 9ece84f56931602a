/**
 * Glass design standards data
 * EN 16612 and IStructE "Structural Use of Glass in Buildings"
 *
 * Strengths in N/mm² (MPa). A missing table cell means the standard does not
 * define that combination.
 */

import type {
  DesignStandard,
  DurationClass,
  EdgeCondition,
  FactorKey,
  GlassType,
  PrestressOrientation,
  SafetyClass,
  SurfaceFinish,
  SurfaceProfile,
} from '../glass/types';

/** Characteristic strength of annealed glass, fg;k (EN 16612) */
export const FGK_ANNEALED = 45;

export type GlassCategory = 'annealed' | 'prestressed';

export interface IGlassTypeData {
  name: string;
  product: string;   // Product standard
  fbk: number;       // Characteristic bending strength (MPa)
  category: GlassCategory;
}

export const GLASS_TYPE_DATA: Record<GlassType, IGlassTypeData> = {
  annealed: { name: 'Annealed', product: 'EN 572-1', fbk: 45, category: 'annealed' },
  heatStrengthened: { name: 'Heat strengthened', product: 'EN 1863-1', fbk: 70, category: 'prestressed' },
  toughened: { name: 'Thermally toughened', product: 'EN 12150-1', fbk: 120, category: 'prestressed' },
  chemicallyStrengthened: { name: 'Chemically strengthened', product: 'EN 12337-1', fbk: 150, category: 'prestressed' },
};

// Load duration factor kmod = 0.663·t^(-1/16), t in hours, 0.25 ≤ kmod ≤ 1
export const KMOD: Record<DurationClass, number> = {
  instantaneous: 1.0,   // 3 s
  short: 0.74,          // 10 min
  medium: 0.54,         // 1 day
  long: 0.44,           // 1 month
  permanent: 0.29,      // 50 years
};

/** kmod for an arbitrary load duration (s) */
export function kmodForDuration(seconds: number): number {
  const hours = seconds / 3600;
  const k = 0.663 * Math.pow(hours, -1 / 16);
  return Math.min(1, Math.max(0.25, k));
}

// Surface profile factor ksp
export const KSP: Record<SurfaceProfile, number> = {
  float: 1.0,
  drawnSheet: 1.0,
  patterned: 0.75,
  wiredPolished: 0.75,
  wiredPatterned: 0.6,
};

// Surface finish factor k'sp
export const KSP_FINISH: Record<SurfaceFinish, number> = {
  none: 1.0,
  sandBlasted: 0.6,
  acidEtched: 1.0,
};

// Strengthening factor kv (toughening process orientation)
export const KV: Record<PrestressOrientation, number> = {
  horizontal: 1.0,
  vertical: 0.6,
};

// Consequence class factor KFI applied to the material partial factors
export const KFI: Record<SafetyClass, number> = {
  CC1: 0.9,
  CC2: 1.0,
  CC3: 1.1,
};

export type FactorStep =
  | { op: 'start' }                        // fg;k
  | { op: 'multiply'; factor: FactorKey }
  | { op: 'divide'; factor: FactorKey }
  | { op: 'addPrestress' };                // + kv·(fb;k − fg;k)/γM;v

export interface IGlassStandard {
  name: string;
  description: string;
  gammaMA: number;   // Material factor, annealed component
  gammaMV: number;   // Material factor, surface prestress component
  safetyClasses: SafetyClass[];
  glassTypes: GlassType[];
  /** Edge strength factor ke per edge condition and glass category */
  kE: Record<EdgeCondition, Partial<Record<GlassCategory, number>>>;
  /** Factor application order for fg;d */
  steps: FactorStep[];
}

export const GLASS_STANDARDS: Record<DesignStandard, IGlassStandard> = {
  EN16612: {
    name: 'EN 16612',
    description: 'Glass in building — Determination of the lateral load resistance of glass panes',
    gammaMA: 1.8,
    gammaMV: 1.2,
    safetyClasses: ['CC1', 'CC2'],
    glassTypes: ['annealed', 'heatStrengthened', 'toughened', 'chemicallyStrengthened'],
    kE: {
      noEdgeStress: { annealed: 1.0, prestressed: 1.0 },
      asCut: { annealed: 0.8 },
      arrissed: { annealed: 0.8, prestressed: 1.0 },
      ground: { annealed: 0.8, prestressed: 1.0 },
      polished: { annealed: 0.8, prestressed: 1.0 },
    },
    // fg;d = ke·kmod·ksp·k'sp·fg;k/γM;A + kv·(fb;k − fg;k)/γM;v
    steps: [
      { op: 'start' },
      { op: 'multiply', factor: 'kE' },
      { op: 'multiply', factor: 'kMod' },
      { op: 'multiply', factor: 'kSp' },
      { op: 'multiply', factor: 'kSpFinish' },
      { op: 'divide', factor: 'gammaMA' },
      { op: 'addPrestress' },
    ],
  },
  IStructE: {
    name: 'IStructE',
    description: 'Structural Use of Glass in Buildings',
    gammaMA: 1.6,
    gammaMV: 1.2,
    safetyClasses: ['CC1', 'CC2', 'CC3'],
    glassTypes: ['annealed', 'heatStrengthened', 'toughened'],
    kE: {
      noEdgeStress: { annealed: 1.0, prestressed: 1.0 },
      asCut: { annealed: 0.8 },
      arrissed: { annealed: 0.8, prestressed: 1.0 },
      ground: { annealed: 0.9, prestressed: 1.0 },
      polished: { annealed: 1.0, prestressed: 1.0 },
    },
    // fg;d = (kmod·ksp·k'sp·fg;k/γM;A + kv·(fb;k − fg;k)/γM;v)·ke
    steps: [
      { op: 'start' },
      { op: 'multiply', factor: 'kMod' },
      { op: 'multiply', factor: 'kSp' },
      { op: 'multiply', factor: 'kSpFinish' },
      { op: 'divide', factor: 'gammaMA' },
      { op: 'addPrestress' },
      { op: 'multiply', factor: 'kE' },
    ],
  },
};
