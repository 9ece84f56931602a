/**
 * Modulus Interpolator
 *
 * Shear modulus of an interlayer at an arbitrary temperature for one load
 * duration class. Duration is a discrete axis: only samples of the requested
 * class take part, never neighbouring classes.
 *
 * Between two sampled temperatures the modulus is interpolated log-linearly
 * (ln G linear in T). Outside the sampled range the nearest boundary sample is
 * used and an OutOfRangeExtrapolation warning is attached.
 */

import { DEFAULT_ENGINE_CONFIG, type InterpolationMode } from '../config/EngineConfig';
import { GlassDesignError } from '../glass/GlassDesignError';
import type { DurationClass, InterpolatedModulus, MaterialSample } from '../glass/types';
import type { MaterialPropertyTable } from './MaterialPropertyTable';

/**
 * Interpolate between two samples at temperature t (t1 < t < t2).
 * A zero modulus has no logarithm; such a segment falls back to linear.
 */
export function interpolateSegment(
  lower: MaterialSample,
  upper: MaterialSample,
  temperatureC: number,
  mode: InterpolationMode
): number {
  const t = (temperatureC - lower.temperatureC) / (upper.temperatureC - lower.temperatureC);
  const g1 = lower.shearModulusMPa;
  const g2 = upper.shearModulusMPa;

  if (mode === 'logLinear' && g1 > 0 && g2 > 0) {
    return Math.exp(Math.log(g1) + (Math.log(g2) - Math.log(g1)) * t);
  }
  return g1 + (g2 - g1) * t;
}

export class ModulusInterpolator {
  constructor(
    private readonly table: MaterialPropertyTable,
    private readonly mode: InterpolationMode = DEFAULT_ENGINE_CONFIG.interpolation
  ) {}

  interpolate(productId: string, temperatureC: number, durationClass: DurationClass): InterpolatedModulus {
    const exact = this.table.lookup(productId, temperatureC, durationClass);
    if (exact) {
      return { shearModulusMPa: exact.shearModulusMPa, exact: true };
    }

    const samples = this.table.samplesFor(productId, durationClass);
    if (samples.length === 0) {
      throw new GlassDesignError(
        'UnsupportedDurationClass',
        `No shear modulus data for '${productId}' at load duration '${durationClass}'`,
        { productId, durationClass, available: this.table.durationClasses(productId) }
      );
    }

    const first = samples[0];
    const last = samples[samples.length - 1];

    if (temperatureC < first.temperatureC || temperatureC > last.temperatureC) {
      const boundary = temperatureC < first.temperatureC ? first : last;
      return {
        shearModulusMPa: boundary.shearModulusMPa,
        exact: false,
        warning: {
          code: 'OutOfRangeExtrapolation',
          productId,
          durationClass,
          requestedTemperatureC: temperatureC,
          clampedTemperatureC: boundary.temperatureC,
        },
      };
    }

    // first.temperatureC < temperatureC < last.temperatureC here, so a bracket exists
    for (let i = 1; i < samples.length; i++) {
      const upper = samples[i];
      if (temperatureC < upper.temperatureC) {
        return {
          shearModulusMPa: interpolateSegment(samples[i - 1], upper, temperatureC, this.mode),
          exact: false,
        };
      }
    }
    return { shearModulusMPa: last.shearModulusMPa, exact: false };
  }
}

export function interpolateModulus(
  table: MaterialPropertyTable,
  productId: string,
  temperatureC: number,
  durationClass: DurationClass,
  mode: InterpolationMode = DEFAULT_ENGINE_CONFIG.interpolation
): InterpolatedModulus {
  return new ModulusInterpolator(table, mode).interpolate(productId, temperatureC, durationClass);
}
