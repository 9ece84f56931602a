/**
 * Engine Configuration — defaults and overrides
 */

import { DURATION_CLASS_INFO, DURATION_CLASSES, type DurationClass } from '../glass/types';

export type InterpolationMode = 'logLinear' | 'linear';

/** How non-numeric cells of an interlayer sheet are treated on ingestion */
export type MissingCellPolicy = 'skip' | { fill: number };

export interface IEngineConfig {
  /** Young's modulus of soda lime silicate glass (MPa) */
  glassModulusMPa: number;
  /** Interpolation of shear modulus between sampled temperatures */
  interpolation: InterpolationMode;
  /** Sheet column label → duration class */
  durationLabels: Record<string, DurationClass>;
  missingCellPolicy: MissingCellPolicy;
  /** Write a summary entry to the engine log per evaluation */
  logEvaluations: boolean;
}

function defaultDurationLabels(): Record<string, DurationClass> {
  const labels: Record<string, DurationClass> = {};
  for (const dc of DURATION_CLASSES) {
    labels[DURATION_CLASS_INFO[dc].label] = dc;
  }
  return labels;
}

export const DEFAULT_ENGINE_CONFIG: IEngineConfig = {
  glassModulusMPa: 70_000,
  interpolation: 'logLinear',
  durationLabels: defaultDurationLabels(),
  missingCellPolicy: 'skip',
  logEvaluations: true,
};

export function createEngineConfig(overrides: Partial<IEngineConfig> = {}): IEngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    durationLabels: { ...DEFAULT_ENGINE_CONFIG.durationLabels, ...overrides.durationLabels },
  };
}
