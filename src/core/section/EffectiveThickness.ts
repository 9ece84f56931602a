/**
 * Effective thickness of laminated glass — EN 16612 (Annex B, Wölfel–Bennison)
 *
 * Two-ply laminate, ply thicknesses h1, h2 and interlayer thickness hv:
 *   hs  = (h1 + h2)/2 + hv
 *   hs1 = hs·h1/(h1 + h2),  hs2 = hs·h2/(h1 + h2)
 *   Is  = h1·hs2² + h2·hs1²
 *   ω   = 1 / (1 + 9.6·E·Is·hv / (G·hs²·a²))
 *   hef,w     = ∛(h1³ + h2³ + 12·ω·Is)
 *   hef,σ,1   = √(hef,w³ / (h1 + 2·ω·hs2))
 *   hef,σ,2   = √(hef,w³ / (h2 + 2·ω·hs1))
 *
 * ω = 0 is the layered limit (plies act independently), ω = 1 the monolithic
 * limit (full composite action). All dimensions in mm, moduli in MPa.
 *
 * d(hef,σ,j²)/dω has the sign of 6·Is·hj − hs,k·(h1³ + h2³) for every ω, so
 * hef,σ,j is either rising or falling over the whole range. Stacks whose
 * governing ply at ω = 1 has a falling hef,σ are rejected: for them the bending
 * thickness would overshoot its monolithic limit at some finite G.
 */

import { DEFAULT_ENGINE_CONFIG } from '../config/EngineConfig';
import { GlassDesignError } from '../glass/GlassDesignError';
import type {
  EffectiveThicknessResult,
  GlassPly,
  InterlayerLayer,
  LaminateStack,
  SupportGeometry,
} from '../glass/types';

/** Shear transfer length a (mm) */
export function shearTransferLength(geometry: SupportGeometry): number {
  const a = geometry.kind === 'beam'
    ? geometry.spanMm
    : Math.min(geometry.shortSideMm, geometry.longSideMm);
  if (!(a > 0) || !Number.isFinite(a)) {
    throw new GlassDesignError('InvalidStackConfiguration', `Support geometry length must be positive, got ${a}`, {
      geometry,
    });
  }
  return a;
}

function invalid(message: string, details: Record<string, unknown> = {}): GlassDesignError {
  return new GlassDesignError('InvalidStackConfiguration', message, details);
}

export interface IParsedStack {
  plies: GlassPly[];
  interlayers: InterlayerLayer[];
}

/**
 * Check layer ordering and split a stack into plies and interlayers.
 * Supported: a single ply, or ply / interlayer / ply.
 */
export function parseStack(stack: LaminateStack): IParsedStack {
  const plies: GlassPly[] = [];
  const interlayers: InterlayerLayer[] = [];

  stack.forEach((layer, i) => {
    if (!(layer.thicknessMm > 0) || !Number.isFinite(layer.thicknessMm)) {
      throw invalid(`Layer ${i} has non-positive thickness ${layer.thicknessMm}`, { layer: i });
    }
    const previous = i > 0 ? stack[i - 1] : undefined;
    if (previous && previous.role === layer.role) {
      throw invalid(`Layers ${i - 1} and ${i} are both ${layer.role === 'ply' ? 'plies' : 'interlayers'}`, {
        layer: i,
      });
    }
    if (layer.role === 'ply') plies.push(layer);
    else interlayers.push(layer);
  });

  if (plies.length === 0) {
    throw invalid('Stack has no structural glass ply');
  }
  if (stack[0].role !== 'ply' || stack[stack.length - 1].role !== 'ply') {
    throw invalid('Stack must start and end with a glass ply');
  }
  if (plies.length > 2) {
    throw invalid(`Laminates of ${plies.length} plies are not covered; use one or two plies`, {
      plies: plies.length,
    });
  }
  if (plies.length === 2) {
    const h1 = plies[0].thicknessMm;
    const h2 = plies[1].thicknessMm;
    const hv = interlayers[0].thicknessMm;
    if (!bendingThicknessRises(h1, h2, hv)) {
      throw invalid(
        `Plies of ${h1} mm and ${h2} mm on a ${hv} mm interlayer are too dissimilar: ` +
        'the bending effective thickness of the governing ply falls as shear transfer increases',
        { plies: [h1, h2], interlayerMm: hv }
      );
    }
  }
  return { plies, interlayers };
}

export function stackPlies(stack: LaminateStack): GlassPly[] {
  return parseStack(stack).plies;
}

/** Sum of glass ply thicknesses (mm) */
export function nominalGlassThickness(stack: LaminateStack): number {
  return stackPlies(stack).reduce((sum, ply) => sum + ply.thicknessMm, 0);
}

interface ILaminateSection {
  hs: number;
  hs1: number;
  hs2: number;
  Is: number;
}

function laminateSection(h1: number, h2: number, hv: number): ILaminateSection {
  const hs = 0.5 * (h1 + h2) + hv;
  const hs1 = (hs * h1) / (h1 + h2);
  const hs2 = (hs * h2) / (h1 + h2);
  return { hs, hs1, hs2, Is: h1 * hs2 * hs2 + h2 * hs1 * hs1 };
}

interface ILaminateThickness {
  deflectionMm: number;
  plies: [number, number];
}

function twoPlyThickness(h1: number, h2: number, hv: number, omega: number): ILaminateThickness {
  const { hs1, hs2, Is } = laminateSection(h1, h2, hv);
  const hw3 = h1 ** 3 + h2 ** 3 + 12 * omega * Is;
  return {
    deflectionMm: Math.cbrt(hw3),
    plies: [Math.sqrt(hw3 / (h1 + 2 * omega * hs2)), Math.sqrt(hw3 / (h2 + 2 * omega * hs1))],
  };
}

/**
 * True when the bending effective thickness of a two-ply laminate rises strictly
 * with ω, i.e. a ply governing at ω = 1 has a rising hef,σ.
 */
export function bendingThicknessRises(h1: number, h2: number, hv: number): boolean {
  const { hs1, hs2, Is } = laminateSection(h1, h2, hv);
  const layered3 = h1 ** 3 + h2 ** 3;
  const rising = [6 * Is * h1 - hs2 * layered3 > 0, 6 * Is * h2 - hs1 * layered3 > 0];
  const full = twoPlyThickness(h1, h2, hv, 1).plies;
  const governing = Math.min(...full);
  return full.some((h, j) => h === governing && rising[j]);
}

/** Shear transfer coefficient ω for a two-ply laminate */
export function shearTransferCoefficient(
  h1: number,
  h2: number,
  hv: number,
  shearModulusMPa: number,
  a: number,
  glassModulusMPa: number = DEFAULT_ENGINE_CONFIG.glassModulusMPa
): number {
  if (!(shearModulusMPa > 0)) return 0;
  if (shearModulusMPa === Infinity) return 1;
  const { hs, Is } = laminateSection(h1, h2, hv);
  return 1 / (1 + (9.6 * glassModulusMPa * Is * hv) / (shearModulusMPa * hs * hs * a * a));
}

export function resolveEffectiveThickness(
  stack: LaminateStack,
  shearModulusMPa: number,
  geometry: SupportGeometry,
  glassModulusMPa: number = DEFAULT_ENGINE_CONFIG.glassModulusMPa
): EffectiveThicknessResult {
  const { plies, interlayers } = parseStack(stack);
  const a = shearTransferLength(geometry);

  if (plies.length === 1) {
    const h = plies[0].thicknessMm;
    const limit = { bendingMm: h, deflectionMm: h };
    return {
      bendingMm: h,
      deflectionMm: h,
      omega: 1,
      layeredLimit: limit,
      monolithicLimit: limit,
      plies: [h],
    };
  }

  if (Number.isNaN(shearModulusMPa) || shearModulusMPa < 0) {
    throw new GlassDesignError('InvalidRequest', `Shear modulus must be non-negative, got ${shearModulusMPa}`, {
      shearModulusMPa,
    });
  }

  const h1 = plies[0].thicknessMm;
  const h2 = plies[1].thicknessMm;
  const hv = interlayers[0].thicknessMm;
  const omega = shearTransferCoefficient(h1, h2, hv, shearModulusMPa, a, glassModulusMPa);

  const actual = twoPlyThickness(h1, h2, hv, omega);
  const layered = twoPlyThickness(h1, h2, hv, 0);
  const monolithic = twoPlyThickness(h1, h2, hv, 1);

  return {
    bendingMm: Math.min(...actual.plies),
    deflectionMm: actual.deflectionMm,
    omega,
    layeredLimit: { bendingMm: Math.min(...layered.plies), deflectionMm: layered.deflectionMm },
    monolithicLimit: { bendingMm: Math.min(...monolithic.plies), deflectionMm: monolithic.deflectionMm },
    plies: [...actual.plies],
  };
}
