import { beforeEach, describe, expect, it } from 'vitest';
import { ConsoleService } from '../console/ConsoleService';
import { GlassDesignError } from '../glass/GlassDesignError';
import type { DesignRequest, LaminateStack, LoadCase } from '../glass/types';
import { MaterialPropertyTable } from '../materials/MaterialPropertyTable';
import { createDesignStrengthCalculator, evaluate, governingIndex } from './DesignStrengthCalculator';

const table = MaterialPropertyTable.fromSamples([
  { productId: 'PVB-A', temperatureC: 20, durationClass: 'short', shearModulusMPa: 4.0 },
  { productId: 'PVB-A', temperatureC: 40, durationClass: 'short', shearModulusMPa: 1.0 },
  { productId: 'PVB-A', temperatureC: 20, durationClass: 'instantaneous', shearModulusMPa: 10.0 },
]);

const laminate: LaminateStack = [
  { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
  { role: 'interlayer', thicknessMm: 0.76, productId: 'PVB-A' },
  { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
];

function stressCase(valueMPa: number, temperatureC = 30, name?: string): LoadCase {
  return { name, durationClass: 'short', temperatureC, action: { kind: 'stress', valueMPa } };
}

function request(overrides: Partial<DesignRequest> = {}): DesignRequest {
  return {
    standard: 'EN16612',
    edgeCondition: 'noEdgeStress',
    surfaceProfile: 'float',
    surfaceFinish: 'none',
    prestressOrientation: 'horizontal',
    safetyClass: 'CC2',
    stack: laminate,
    geometry: { kind: 'beam', spanMm: 1000 },
    loadCases: [stressCase(10)],
    ...overrides,
  };
}

function errorOf(fn: () => unknown): GlassDesignError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GlassDesignError) return err;
    throw err;
  }
  throw new Error('expected a GlassDesignError');
}

describe('DesignStrengthCalculator', () => {
  const calculator = createDesignStrengthCalculator(table);

  beforeEach(() => {
    ConsoleService.clear();
  });

  it('evaluates a laminated pane under a stress action', () => {
    const report = calculator.evaluate(request());
    const r = report.results[0];

    expect(r.shearModulusMPa).toBeCloseTo(2.0, 12);
    expect(r.designStrengthMPa).toBeCloseTo(18.5, 10);
    expect(r.characteristicResistance).toBe(45);
    expect(r.designResistance).toBeCloseTo(18.5, 10);
    expect(r.utilizationRatio).toBeCloseTo(10 / 18.5, 10);
    expect(r.status).toBe('OK');
    expect(r.effectiveThicknessMm).toBe(r.thickness.bendingMm);
    expect(r.effectiveThicknessMm).toBeGreaterThan(r.thickness.layeredLimit.bendingMm);
    expect(r.effectiveThicknessMm).toBeLessThan(r.thickness.monolithicLimit.bendingMm);
    expect(report.status).toBe('OK');
    expect(report.warnings).toEqual([]);
  });

  it('evaluates a monolithic pane under a moment action', () => {
    const report = calculator.evaluate(
      request({
        stack: [{ role: 'ply', thicknessMm: 10, glassType: 'toughened' }],
        loadCases: [{ durationClass: 'instantaneous', temperatureC: 20, action: { kind: 'moment', valueNmmPerMm: 1000 } }],
      })
    );
    const r = report.results[0];

    expect(r.shearModulusMPa).toBeNull();
    expect(r.effectiveThicknessMm).toBe(10);
    expect(r.designStrengthMPa).toBeCloseTo(87.5, 10);
    expect(r.characteristicResistance).toBeCloseTo(2000, 8);
    expect(r.designResistance).toBeCloseTo(87.5 * 100 / 6, 8);
    expect(r.utilizationRatio).toBeCloseTo(6000 / 8750, 10);
  });

  it('lets the weakest ply govern a mixed laminate', () => {
    const stack: LaminateStack = [
      { role: 'ply', thicknessMm: 6, glassType: 'toughened' },
      { role: 'interlayer', thicknessMm: 0.76, productId: 'PVB-A' },
      { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
    ];
    const r = calculator.evaluate(request({ stack })).results[0];
    expect(r.governingPly).toBe(1);
    expect(r.glassType).toBe('annealed');
    expect(r.designStrengthMPa).toBeCloseTo(18.5, 10);
  });

  it('pairs each ply strength with that ply thickness under a moment action', () => {
    const layered = MaterialPropertyTable.fromSamples([
      { productId: 'PVB-0', temperatureC: 20, durationClass: 'instantaneous', shearModulusMPa: 0 },
    ]);
    const stack: LaminateStack = [
      { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
      { role: 'interlayer', thicknessMm: 0.76, productId: 'PVB-0' },
      { role: 'ply', thicknessMm: 10, glassType: 'toughened' },
    ];
    const loadCases: LoadCase[] = [
      { durationClass: 'instantaneous', temperatureC: 20, action: { kind: 'moment', valueNmmPerMm: 500 } },
    ];
    const r = evaluate(layered, request({ stack, loadCases }), { logEvaluations: false }).results[0];

    // layered plies: hef,σ,j² = (6³ + 10³) / hj
    expect(r.thickness.omega).toBe(0);
    expect(r.governingPly).toBe(0);
    expect(r.glassType).toBe('annealed');
    expect(r.effectiveThicknessMm).toBeCloseTo(Math.sqrt(1216 / 6), 10);
    expect(r.designStrengthMPa).toBeCloseTo(25, 10);
    expect(r.characteristicResistance).toBeCloseTo((45 * 1216) / 36, 8);
    expect(r.designResistance).toBeCloseTo((25 * 1216) / 36, 8);
    expect(r.utilizationRatio).toBeCloseTo(500 / ((25 * 1216) / 36), 10);
  });

  it('marks a case over capacity as FAIL', () => {
    const report = calculator.evaluate(request({ loadCases: [stressCase(5), stressCase(20)] }));
    expect(report.results.map(r => r.status)).toEqual(['OK', 'FAIL']);
    expect(report.status).toBe('FAIL');
    expect(report.governingIndex).toBe(1);
    expect(report.maxUtilization).toBeCloseTo(20 / 18.5, 10);
  });

  it('picks the earliest of tied governing cases', () => {
    const report = calculator.evaluate(
      request({ loadCases: [stressCase(10, 30, 'A'), stressCase(5, 30, 'B'), stressCase(10, 30, 'C')] })
    );
    expect(report.results[0].utilizationRatio).toBe(report.results[2].utilizationRatio);
    expect(report.governingIndex).toBe(0);
    expect(report.governing.loadCase.name).toBe('A');
  });

  it('is idempotent', () => {
    const req = request({ loadCases: [stressCase(10), stressCase(8, 55)] });
    expect(calculator.evaluate(req)).toEqual(calculator.evaluate(req));
  });

  it('records extrapolation warnings without aborting', () => {
    const report = calculator.evaluate(request({ loadCases: [stressCase(10, 20), stressCase(10, 90)] }));
    expect(report.results[0].warnings).toEqual([]);
    expect(report.results[1].shearModulusMPa).toBe(1.0);
    expect(report.results[1].warnings).toEqual([
      {
        code: 'OutOfRangeExtrapolation',
        productId: 'PVB-A',
        durationClass: 'short',
        requestedTemperatureC: 90,
        clampedTemperatureC: 40,
      },
    ]);
    expect(report.warnings).toHaveLength(1);
    expect(ConsoleService.getEntries().map(e => e.type)).toEqual(['info', 'warning']);
  });

  it('aborts the whole evaluation on an unknown product', () => {
    const stack: LaminateStack = [
      { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
      { role: 'interlayer', thicknessMm: 0.76, productId: 'EVA-Z' },
      { role: 'ply', thicknessMm: 6, glassType: 'annealed' },
    ];
    const err = errorOf(() => calculator.evaluate(request({ stack, loadCases: [stressCase(1), stressCase(2)] })));
    expect(err.code).toBe('UnknownProduct');
    expect(ConsoleService.getEntries().map(e => e.type)).toEqual(['error']);
  });

  it('aborts on a duration class without data and names the load case', () => {
    const err = errorOf(() =>
      calculator.evaluate(
        request({ loadCases: [stressCase(1), { durationClass: 'permanent', temperatureC: 20, action: { kind: 'stress', valueMPa: 1 } }] })
      )
    );
    expect(err.code).toBe('UnsupportedDurationClass');
    expect(err.loadCaseIndex).toBe(1);
    expect(err.message).toMatch(/^Load case 1: /);
  });

  it('aborts on an unsupported factor combination', () => {
    const err = errorOf(() => calculator.evaluate(request({ safetyClass: 'CC3' })));
    expect(err.code).toBe('UnsupportedCombination');
    expect(err.loadCaseIndex).toBe(0);
  });

  it('aborts on an invalid stack', () => {
    const err = errorOf(() => calculator.evaluate(request({ stack: [laminate[1]] })));
    expect(err.code).toBe('InvalidStackConfiguration');
  });

  it('reports an empty stack as an invalid stack configuration', () => {
    expect(errorOf(() => calculator.evaluate(request({ stack: [] }))).code).toBe('InvalidStackConfiguration');
  });

  it('rejects a request without load cases', () => {
    expect(errorOf(() => calculator.evaluate(request({ loadCases: [] }))).code).toBe('InvalidRequest');
  });

  it('uses the configured interpolation mode', () => {
    const report = evaluate(table, request(), { interpolation: 'linear', logEvaluations: false });
    expect(report.results[0].shearModulusMPa).toBe(2.5);
    expect(ConsoleService.getEntries()).toEqual([]);
  });
});

describe('governingIndex', () => {
  it('prefers the highest utilization and the earliest on ties', () => {
    expect(governingIndex([{ utilizationRatio: 0.2 }, { utilizationRatio: 0.9 }, { utilizationRatio: 0.9 }])).toBe(1);
    expect(governingIndex([{ utilizationRatio: 0.5 }])).toBe(0);
  });
});
