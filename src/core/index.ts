/**
 * Glass Design Strength Engine
 *
 * Library surface consumed by the presentation and report layers.
 */

export * from './glass/types';
export { GlassDesignError, isGlassDesignError, type GlassDesignErrorCode } from './glass/GlassDesignError';
export { parseDesignRequest, DesignRequestSchema, MaterialSampleRowSchema } from './glass/schema';

export {
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  type IEngineConfig,
  type InterpolationMode,
  type MissingCellPolicy,
} from './config/EngineConfig';
export { ConsoleService, type ConsoleEntry } from './console/ConsoleService';

// Interlayer data
export {
  MaterialPropertyTable,
  loadMaterialTable,
  loadMaterialTableFromSheets,
  rowsFromSheet,
  TEMPERATURE_COLUMN,
  type Sheet,
  type SheetRow,
} from './materials/MaterialPropertyTable';
export { ModulusInterpolator, interpolateModulus } from './materials/ModulusInterpolator';
export {
  compareInterlayers,
  modulusSurface,
  type IInterlayerComparisonQuery,
  type InterlayerComparisonEntry,
  type ModulusSurfacePoint,
} from './materials/InterlayerComparison';
export { loadReferenceInterlayerTable, REFERENCE_INTERLAYER_SHEETS } from './data/InterlayerDatabase';

// Section
export {
  resolveEffectiveThickness,
  parseStack,
  bendingThicknessRises,
  shearTransferCoefficient,
  nominalGlassThickness,
  stackPlies,
} from './section/EffectiveThickness';

// Standards
export { GLASS_STANDARDS, GLASS_TYPE_DATA, KMOD, kmodForDuration } from './standards/GlassStandards';
export { resolveFactors, applyFactorSteps, designStrength, type IFactorQuery } from './standards/FactorResolver';

// Solver
export {
  DesignStrengthCalculator,
  createDesignStrengthCalculator,
  evaluate,
  governingIndex,
  type IDesignStrengthCalculator,
} from './solver/DesignStrengthCalculator';
export {
  tabulateDesignStrength,
  minimumDesignStrength,
  type DesignStrengthRow,
  type IDesignStrengthTableInput,
} from './solver/DesignStrengthTable';
