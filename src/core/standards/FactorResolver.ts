/**
 * Factor Resolver
 * Categorical design inputs → numeric modification and partial factors,
 * and the standard's ordered application of those factors to fg;d.
 */

import { GlassDesignError } from '../glass/GlassDesignError';
import type {
  DurationClass,
  FactorInputs,
  FactorSet,
  GlassType,
  IFactorStepTrace,
} from '../glass/types';
import {
  FGK_ANNEALED,
  GLASS_STANDARDS,
  GLASS_TYPE_DATA,
  KFI,
  KMOD,
  KSP,
  KSP_FINISH,
  KV,
  type FactorStep,
  type IGlassStandard,
} from './GlassStandards';

export interface IFactorQuery extends FactorInputs {
  glassType: GlassType;
  durationClass: DurationClass;
}

function cell<T>(table: Partial<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function unsupported(message: string, query: Partial<IFactorQuery>): GlassDesignError {
  return new GlassDesignError('UnsupportedCombination', message, { ...query });
}

function required<T>(value: T | undefined, what: string, query: IFactorQuery): T {
  if (value === undefined) throw unsupported(`Unsupported ${what}`, query);
  return value;
}

export function getStandard(standard: string): IGlassStandard {
  const data = cell(GLASS_STANDARDS, standard);
  if (!data) {
    throw new GlassDesignError('UnsupportedCombination', `Unknown design standard '${standard}'`, { standard });
  }
  return data;
}

export function resolveFactors(query: IFactorQuery): FactorSet {
  const std = getStandard(query.standard);
  const glass = required(cell(GLASS_TYPE_DATA, query.glassType), `glass type '${query.glassType}'`, query);

  if (!std.glassTypes.includes(query.glassType)) {
    throw unsupported(`${std.name} does not cover ${glass.name.toLowerCase()} glass`, query);
  }
  if (!std.safetyClasses.includes(query.safetyClass)) {
    throw unsupported(`${std.name} does not cover consequence class ${query.safetyClass}`, query);
  }

  const kMod = cell(KMOD, query.durationClass);
  if (kMod === undefined) {
    throw new GlassDesignError('UnsupportedDurationClass', `Unknown load duration class '${query.durationClass}'`, {
      ...query,
    });
  }

  const edgeRow = required(cell(std.kE, query.edgeCondition), `edge condition '${query.edgeCondition}'`, query);
  const kE = edgeRow[glass.category];
  if (kE === undefined) {
    throw unsupported(
      `${std.name} defines no edge strength factor for ${query.edgeCondition} edges on ${glass.category} glass`,
      query
    );
  }

  const kSp = required(cell(KSP, query.surfaceProfile), `surface profile '${query.surfaceProfile}'`, query);
  const kSpFinish = required(cell(KSP_FINISH, query.surfaceFinish), `surface finish '${query.surfaceFinish}'`, query);
  const kfi = required(cell(KFI, query.safetyClass), `consequence class '${query.safetyClass}'`, query);
  const prestressed = glass.category === 'prestressed';
  const kV = prestressed
    ? required(cell(KV, query.prestressOrientation), `prestress orientation '${query.prestressOrientation}'`, query)
    : 0;

  return {
    kMod,
    kE,
    kSp,
    kSpFinish,
    kV,
    gammaMA: std.gammaMA * kfi,
    gammaMV: prestressed ? std.gammaMV * kfi : null,
    fgk: FGK_ANNEALED,
    fbk: glass.fbk,
  };
}

function stepLabel(step: FactorStep): string {
  switch (step.op) {
    case 'start': return 'fg;k';
    case 'multiply': return `× ${step.factor}`;
    case 'divide': return `÷ ${step.factor}`;
    case 'addPrestress': return '+ kV·(fb;k − fg;k)/γM;v';
  }
}

export interface IDesignStrength {
  fgd: number;
  steps: IFactorStepTrace[];
}

/**
 * Apply the factor steps of a standard in order, recording the running value.
 * The prestress step adds nothing for annealed glass (no γM;v).
 */
export function applyFactorSteps(steps: readonly FactorStep[], factors: FactorSet): IDesignStrength {
  let value = 0;
  const trace: IFactorStepTrace[] = [];

  for (const step of steps) {
    switch (step.op) {
      case 'start':
        value = factors.fgk;
        break;
      case 'multiply':
        value *= factors[step.factor];
        break;
      case 'divide':
        value /= factors[step.factor];
        break;
      case 'addPrestress':
        if (factors.gammaMV !== null) {
          value += (factors.kV * (factors.fbk - factors.fgk)) / factors.gammaMV;
        }
        break;
    }
    trace.push({ step: stepLabel(step), value });
  }
  return { fgd: value, steps: trace };
}

/** Design strength fg;d for one glass type and duration class */
export function designStrength(query: IFactorQuery): IDesignStrength & { factors: FactorSet } {
  const factors = resolveFactors(query);
  return { ...applyFactorSteps(getStandard(query.standard).steps, factors), factors };
}
