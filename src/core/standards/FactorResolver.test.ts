import { describe, expect, it } from 'vitest';
import { GlassDesignError } from '../glass/GlassDesignError';
import { DURATION_CLASS_INFO, DURATION_CLASSES, type FactorSet } from '../glass/types';
import { applyFactorSteps, designStrength, resolveFactors, type IFactorQuery } from './FactorResolver';
import { GLASS_STANDARDS, KMOD, kmodForDuration } from './GlassStandards';

const base: IFactorQuery = {
  standard: 'EN16612',
  glassType: 'annealed',
  edgeCondition: 'noEdgeStress',
  surfaceProfile: 'float',
  surfaceFinish: 'none',
  prestressOrientation: 'horizontal',
  safetyClass: 'CC2',
  durationClass: 'short',
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof GlassDesignError) return err.code;
    throw err;
  }
  return undefined;
}

describe('resolveFactors', () => {
  it('resolves annealed glass under EN 16612', () => {
    expect(resolveFactors(base)).toEqual({
      kMod: 0.74,
      kE: 1.0,
      kSp: 1.0,
      kSpFinish: 1.0,
      kV: 0,
      gammaMA: 1.8,
      gammaMV: null,
      fgk: 45,
      fbk: 45,
    });
  });

  it('resolves prestress factors for toughened glass', () => {
    const f = resolveFactors({ ...base, glassType: 'toughened', prestressOrientation: 'vertical' });
    expect(f.kV).toBe(0.6);
    expect(f.gammaMV).toBe(1.2);
    expect(f.fbk).toBe(120);
  });

  it('applies the consequence class to the material factors', () => {
    const f = resolveFactors({ ...base, glassType: 'heatStrengthened', safetyClass: 'CC1' });
    expect(f.gammaMA).toBeCloseTo(1.62, 12);
    expect(f.gammaMV).toBeCloseTo(1.08, 12);
  });

  it('uses the IStructE material factor and edge table', () => {
    const f = resolveFactors({ ...base, standard: 'IStructE', edgeCondition: 'ground' });
    expect(f.gammaMA).toBe(1.6);
    expect(f.kE).toBe(0.9);
  });

  it('rejects combinations a standard does not define', () => {
    expect(codeOf(() => resolveFactors({ ...base, standard: 'IStructE', glassType: 'chemicallyStrengthened' }))).toBe(
      'UnsupportedCombination'
    );
    expect(codeOf(() => resolveFactors({ ...base, safetyClass: 'CC3' }))).toBe('UnsupportedCombination');
    expect(codeOf(() => resolveFactors({ ...base, glassType: 'toughened', edgeCondition: 'asCut' }))).toBe(
      'UnsupportedCombination'
    );
  });

  it('matches the kmod formula for each representative duration', () => {
    for (const dc of DURATION_CLASSES) {
      expect(KMOD[dc]).toBeCloseTo(kmodForDuration(DURATION_CLASS_INFO[dc].seconds), 2);
    }
  });

  it('bounds kmod to [0.25, 1]', () => {
    expect(kmodForDuration(1)).toBe(1);
    expect(kmodForDuration(1e12)).toBe(0.25);
  });
});

describe('applyFactorSteps', () => {
  // Edge factor below 1 on prestressed glass makes the order observable
  const factors: FactorSet = {
    kMod: 0.74,
    kE: 0.8,
    kSp: 1.0,
    kSpFinish: 1.0,
    kV: 1.0,
    gammaMA: 1.8,
    gammaMV: 1.2,
    fgk: 45,
    fbk: 120,
  };

  it('applies ke to the annealed component only under EN 16612', () => {
    const { fgd, steps } = applyFactorSteps(GLASS_STANDARDS.EN16612.steps, factors);
    expect(fgd).toBeCloseTo(14.8 + 62.5, 10);
    expect(steps.map(s => s.step)).toEqual([
      'fg;k',
      '× kE',
      '× kMod',
      '× kSp',
      '× kSpFinish',
      '÷ gammaMA',
      '+ kV·(fb;k − fg;k)/γM;v',
    ]);
    expect(steps[0].value).toBe(45);
    expect(steps[1].value).toBe(36);
  });

  it('applies ke to the total under IStructE', () => {
    const { fgd, steps } = applyFactorSteps(GLASS_STANDARDS.IStructE.steps, factors);
    expect(fgd).toBeCloseTo((18.5 + 62.5) * 0.8, 10);
    expect(steps[steps.length - 1].step).toBe('× kE');
  });

  it('adds no prestress component for annealed glass', () => {
    const { fgd } = applyFactorSteps(GLASS_STANDARDS.EN16612.steps, { ...factors, kE: 1, kV: 0, gammaMV: null, fbk: 45 });
    expect(fgd).toBeCloseTo(18.5, 10);
  });
});

describe('designStrength', () => {
  it('gives 18.5 MPa for annealed float glass under short loads', () => {
    expect(designStrength(base).fgd).toBeCloseTo(18.5, 10);
  });

  it('gives 81 MPa for horizontally toughened glass', () => {
    expect(designStrength({ ...base, glassType: 'toughened' }).fgd).toBeCloseTo(81, 10);
  });

  it('reduces sand blasted surfaces', () => {
    expect(designStrength({ ...base, surfaceFinish: 'sandBlasted' }).fgd).toBeCloseTo(11.1, 10);
  });
});
