/**
 * Interlayer comparison queries — data behind the comparison chart and the
 * modulus surface plot. No rendering happens here.
 */

import { DEFAULT_ENGINE_CONFIG, type InterpolationMode } from '../config/EngineConfig';
import {
  DURATION_CLASS_INFO,
  type DurationClass,
  type OutOfRangeExtrapolation,
} from '../glass/types';
import type { MaterialPropertyTable } from './MaterialPropertyTable';
import { ModulusInterpolator } from './ModulusInterpolator';

export interface IInterlayerComparisonQuery {
  productIds: string[];
  temperatureC: number;
  durationClasses: DurationClass[];
}

export interface InterlayerComparisonEntry {
  productId: string;
  durationClass: DurationClass;
  label: string;
  shearModulusMPa: number;
  warning?: OutOfRangeExtrapolation;
}

/** One entry per (product, duration), products outermost, in query order */
export function compareInterlayers(
  table: MaterialPropertyTable,
  query: IInterlayerComparisonQuery,
  mode: InterpolationMode = DEFAULT_ENGINE_CONFIG.interpolation
): InterlayerComparisonEntry[] {
  const interpolator = new ModulusInterpolator(table, mode);
  const entries: InterlayerComparisonEntry[] = [];

  for (const productId of query.productIds) {
    for (const durationClass of query.durationClasses) {
      const m = interpolator.interpolate(productId, query.temperatureC, durationClass);
      const entry: InterlayerComparisonEntry = {
        productId,
        durationClass,
        label: DURATION_CLASS_INFO[durationClass].label,
        shearModulusMPa: m.shearModulusMPa,
      };
      if (m.warning) entry.warning = m.warning;
      entries.push(entry);
    }
  }
  return entries;
}

export interface ModulusSurfacePoint {
  temperatureC: number;
  durationClass: DurationClass;
  durationSeconds: number;
  shearModulusMPa: number;
}

/** All samples of a product, ordered by duration then temperature */
export function modulusSurface(table: MaterialPropertyTable, productId: string): ModulusSurfacePoint[] {
  return table.samplesFor(productId).map(s => ({
    temperatureC: s.temperatureC,
    durationClass: s.durationClass,
    durationSeconds: DURATION_CLASS_INFO[s.durationClass].seconds,
    shearModulusMPa: s.shearModulusMPa,
  }));
}
