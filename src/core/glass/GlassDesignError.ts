/**
 * Fatal errors raised by the design engine.
 * Extrapolation is not an error: see OutOfRangeExtrapolation in ./types.
 */

export type GlassDesignErrorCode =
  | 'UnknownProduct'
  | 'UnsupportedDurationClass'
  | 'InvalidStackConfiguration'
  | 'UnsupportedCombination'
  | 'InvalidRequest';

export class GlassDesignError extends Error {
  readonly code: GlassDesignErrorCode;
  readonly details: Record<string, unknown>;
  /** Load case position when raised during evaluate */
  readonly loadCaseIndex?: number;

  constructor(
    code: GlassDesignErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    loadCaseIndex?: number
  ) {
    super(message);
    this.name = 'GlassDesignError';
    this.code = code;
    this.details = details;
    this.loadCaseIndex = loadCaseIndex;
  }

  /** Copy of this error tagged with the load case it occurred in */
  atLoadCase(index: number): GlassDesignError {
    return new GlassDesignError(this.code, `Load case ${index}: ${this.message}`, this.details, index);
  }
}

export function isGlassDesignError(value: unknown): value is GlassDesignError {
  return value instanceof GlassDesignError;
}
