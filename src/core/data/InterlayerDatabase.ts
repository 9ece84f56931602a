/**
 * Reference interlayer shear modulus dataset.
 *
 * One sheet per product, laid out like the interlayer spreadsheet: a row per
 * temperature and a column per load duration. Values are indicative for a
 * generic PVB and a generic ionoplast interlayer; project work should load the
 * manufacturer's data through loadMaterialTableFromSheets instead.
 */

import { DEFAULT_ENGINE_CONFIG, type IEngineConfig } from '../config/EngineConfig';
import { loadMaterialTableFromSheets, type MaterialPropertyTable, type Sheet } from '../materials/MaterialPropertyTable';
import referenceSheets from './interlayers.json';

export const REFERENCE_INTERLAYER_SHEETS: Readonly<Record<string, Sheet>> = referenceSheets;

export function loadReferenceInterlayerTable(
  config: Pick<IEngineConfig, 'durationLabels' | 'missingCellPolicy'> = DEFAULT_ENGINE_CONFIG
): MaterialPropertyTable {
  return loadMaterialTableFromSheets({ ...REFERENCE_INTERLAYER_SHEETS }, config);
}
