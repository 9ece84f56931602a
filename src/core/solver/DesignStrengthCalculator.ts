/**
 * Design Strength Calculator
 *
 * Evaluates every load case of a design request:
 *   1. interlayer shear modulus at the case temperature and duration
 *   2. effective thickness of the stack
 *   3. factors per glass ply for the case duration
 *   4. characteristic resistance per ply  MRk,j = fb;k,j · hef,σ,j²/6
 *   5. design strength fg;d,j via the standard's factor steps, MRd,j = fg;d,j · hef,σ,j²/6
 *   6. utilization = action / resistance of the governing ply
 * and picks the governing case (highest utilization, earliest on ties).
 *
 * A report is produced for all cases or not at all.
 */

import { ConsoleService } from '../console/ConsoleService';
import { createEngineConfig, type IEngineConfig } from '../config/EngineConfig';
import { GlassDesignError } from '../glass/GlassDesignError';
import { parseDesignRequest } from '../glass/schema';
import type {
  DesignReport,
  DesignRequest,
  DesignResult,
  FactorSet,
  GlassType,
  IFactorStepTrace,
  LoadCase,
  OutOfRangeExtrapolation,
} from '../glass/types';
import type { MaterialPropertyTable } from '../materials/MaterialPropertyTable';
import { ModulusInterpolator } from '../materials/ModulusInterpolator';
import { parseStack, resolveEffectiveThickness } from '../section/EffectiveThickness';
import { applyFactorSteps, getStandard, resolveFactors } from '../standards/FactorResolver';

export interface IDesignStrengthCalculator {
  evaluate(request: DesignRequest): DesignReport;
}

interface IPlyStrength {
  ply: number;
  glassType: GlassType;
  factors: FactorSet;
  fgd: number;
  steps: IFactorStepTrace[];
  thicknessMm: number;
  /** In the units of the load case action */
  characteristicResistance: number;
  /** In the units of the load case action */
  designResistance: number;
}

/** Section modulus per unit width (mm³/mm) */
function sectionModulus(thicknessMm: number): number {
  return (thicknessMm * thicknessMm) / 6;
}

function actionValue(loadCase: LoadCase): number {
  return loadCase.action.kind === 'stress' ? loadCase.action.valueMPa : loadCase.action.valueNmmPerMm;
}

function caseLabel(loadCase: LoadCase, index: number): string {
  return loadCase.name ? `'${loadCase.name}'` : `#${index}`;
}

/** Index of the highest utilization; the earliest wins on ties */
export function governingIndex(results: readonly Pick<DesignResult, 'utilizationRatio'>[]): number {
  let best = 0;
  for (let i = 1; i < results.length; i++) {
    if (results[i].utilizationRatio > results[best].utilizationRatio) best = i;
  }
  return best;
}

export class DesignStrengthCalculator implements IDesignStrengthCalculator {
  private readonly config: IEngineConfig;
  private readonly interpolator: ModulusInterpolator;

  constructor(
    private readonly table: MaterialPropertyTable,
    config: Partial<IEngineConfig> = {}
  ) {
    this.config = createEngineConfig(config);
    this.interpolator = new ModulusInterpolator(table, this.config.interpolation);
  }

  evaluate(input: DesignRequest): DesignReport {
    try {
      const request = parseDesignRequest(input);
      const report = this.evaluateValidated(request);
      if (this.config.logEvaluations) {
        const g = report.governing;
        ConsoleService.log(
          `${getStandard(request.standard).name}: ${report.results.length} load case(s), ` +
          `governing ${caseLabel(g.loadCase, g.index)} UC = ${g.utilizationRatio.toFixed(3)} → ${report.status}`
        );
      }
      for (const w of report.warnings) {
        ConsoleService.warn(
          `${w.productId} (${w.durationClass}): ${w.requestedTemperatureC} °C outside sampled range, ` +
          `modulus taken at ${w.clampedTemperatureC} °C`
        );
      }
      return report;
    } catch (err) {
      if (err instanceof GlassDesignError) {
        ConsoleService.error(`Evaluation aborted [${err.code}]: ${err.message}`);
      }
      throw err;
    }
  }

  private evaluateValidated(request: DesignRequest): DesignReport {
    const { plies, interlayers } = parseStack(request.stack);
    for (const layer of interlayers) {
      if (!this.table.hasProduct(layer.productId)) {
        throw new GlassDesignError('UnknownProduct', `Unknown interlayer product '${layer.productId}'`, {
          productId: layer.productId,
        });
      }
    }

    const results = request.loadCases.map((loadCase, index) => {
      try {
        return this.evaluateCase(request, loadCase, index, plies.map(p => p.glassType));
      } catch (err) {
        if (err instanceof GlassDesignError && err.loadCaseIndex === undefined) {
          throw err.atLoadCase(index);
        }
        throw err;
      }
    });

    const gi = governingIndex(results);
    const governing = results[gi];
    return {
      standard: request.standard,
      results,
      governing,
      governingIndex: gi,
      maxUtilization: governing.utilizationRatio,
      status: results.every(r => r.status === 'OK') ? 'OK' : 'FAIL',
      warnings: results.flatMap(r => r.warnings),
    };
  }

  private evaluateCase(
    request: DesignRequest,
    loadCase: LoadCase,
    index: number,
    plyGlassTypes: GlassType[]
  ): DesignResult {
    // 1. Interlayer modulus — the softest interlayer controls shear transfer
    const warnings: OutOfRangeExtrapolation[] = [];
    let shearModulusMPa: number | null = null;
    for (const layer of request.stack) {
      if (layer.role !== 'interlayer') continue;
      const m = this.interpolator.interpolate(layer.productId, loadCase.temperatureC, loadCase.durationClass);
      if (m.warning) warnings.push(m.warning);
      shearModulusMPa = shearModulusMPa === null ? m.shearModulusMPa : Math.min(shearModulusMPa, m.shearModulusMPa);
    }

    // 2. Effective thickness
    const thickness = resolveEffectiveThickness(
      request.stack,
      shearModulusMPa ?? 0,
      request.geometry,
      this.config.glassModulusMPa
    );

    // 3-5. Factors, design strength and resistances per ply; the weakest ply governs
    const standard = getStandard(request.standard);
    const isStress = loadCase.action.kind === 'stress';
    const strengths: IPlyStrength[] = plyGlassTypes.map((glassType, ply) => {
      const factors = resolveFactors({
        standard: request.standard,
        edgeCondition: request.edgeCondition,
        surfaceProfile: request.surfaceProfile,
        surfaceFinish: request.surfaceFinish,
        prestressOrientation: request.prestressOrientation,
        safetyClass: request.safetyClass,
        glassType,
        durationClass: loadCase.durationClass,
      });
      const { fgd, steps } = applyFactorSteps(standard.steps, factors);
      const thicknessMm = thickness.plies[ply];
      const W = sectionModulus(thicknessMm);
      return {
        ply,
        glassType,
        factors,
        fgd,
        steps,
        thicknessMm,
        characteristicResistance: isStress ? factors.fbk : factors.fbk * W,
        designResistance: isStress ? fgd : fgd * W,
      };
    });
    const governing = strengths.reduce((min, s) => (s.designResistance < min.designResistance ? s : min));

    // 6. Utilization
    const utilizationRatio = actionValue(loadCase) / governing.designResistance;

    return {
      index,
      loadCase,
      shearModulusMPa,
      thickness,
      effectiveThicknessMm: governing.thicknessMm,
      governingPly: governing.ply,
      glassType: governing.glassType,
      factors: governing.factors,
      designStrengthMPa: governing.fgd,
      characteristicStrengthMPa: governing.factors.fbk,
      characteristicResistance: governing.characteristicResistance,
      designResistance: governing.designResistance,
      utilizationRatio,
      steps: governing.steps,
      status: utilizationRatio <= 1 ? 'OK' : 'FAIL',
      warnings,
    };
  }
}

export function createDesignStrengthCalculator(
  table: MaterialPropertyTable,
  config: Partial<IEngineConfig> = {}
): IDesignStrengthCalculator {
  return new DesignStrengthCalculator(table, config);
}

/** One-shot evaluation against a table */
export function evaluate(
  table: MaterialPropertyTable,
  request: DesignRequest,
  config: Partial<IEngineConfig> = {}
): DesignReport {
  return new DesignStrengthCalculator(table, config).evaluate(request);
}
