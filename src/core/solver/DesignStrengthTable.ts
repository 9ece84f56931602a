/**
 * Design strength per load duration
 * fg;d for one glass type across every duration class, shortest first.
 */

import { GlassDesignError } from '../glass/GlassDesignError';
import { parseDesignStrengthTableInput } from '../glass/schema';
import {
  DURATION_CLASS_INFO,
  DURATION_CLASSES,
  type DurationClass,
  type FactorInputs,
  type GlassType,
} from '../glass/types';
import { designStrength } from '../standards/FactorResolver';

export interface IDesignStrengthTableInput extends FactorInputs {
  glassType: GlassType;
}

export interface DesignStrengthRow {
  durationClass: DurationClass;
  label: string;
  kMod: number;
  /** Design strength fg;d (MPa) */
  fgd: number;
}

export function tabulateDesignStrength(input: IDesignStrengthTableInput): DesignStrengthRow[] {
  const query = parseDesignStrengthTableInput(input);

  return DURATION_CLASSES.map(durationClass => {
    const { fgd, factors } = designStrength({ ...query, durationClass });
    return {
      durationClass,
      label: DURATION_CLASS_INFO[durationClass].label,
      kMod: factors.kMod,
      fgd,
    };
  });
}

/** Row with the lowest design strength; the longest duration wins ties */
export function minimumDesignStrength(rows: readonly DesignStrengthRow[]): DesignStrengthRow {
  if (rows.length === 0) {
    throw new GlassDesignError('InvalidRequest', 'No design strength rows');
  }
  return rows.reduce((min, row) => (row.fgd <= min.fgd ? row : min));
}
