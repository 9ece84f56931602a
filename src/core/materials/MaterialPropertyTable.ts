/**
 * MaterialPropertyTable.ts
 *
 * Immutable interlayer shear modulus dataset, keyed by product.
 * Each product holds a sparse set of (temperature, load duration) sample points.
 *
 * Units:
 *   - Shear modulus: N/mm² (MPa)
 *   - Temperature: °C
 */

import { ConsoleService } from '../console/ConsoleService';
import { DEFAULT_ENGINE_CONFIG, type IEngineConfig } from '../config/EngineConfig';
import { GlassDesignError } from '../glass/GlassDesignError';
import { parseMaterialSampleRow } from '../glass/schema';
import { DURATION_CLASSES, type DurationClass, type MaterialSample, type MaterialSampleRow } from '../glass/types';

/** Column holding the temperature in a wide interlayer sheet */
export const TEMPERATURE_COLUMN = 'Temperature (°C)';

/** One spreadsheet row: temperature plus one cell per load duration label */
export type SheetRow = Record<string, unknown>;
export type Sheet = SheetRow[];

function sampleKey(temperatureC: number, durationClass: DurationClass): string {
  return `${durationClass}@${temperatureC}`;
}

interface ProductSamples {
  byKey: Map<string, MaterialSample>;
  /** Samples per duration class, sorted by temperature */
  byDuration: Map<DurationClass, readonly MaterialSample[]>;
}

export class MaterialPropertyTable {
  private readonly products: ReadonlyMap<string, ProductSamples>;
  readonly size: number;

  private constructor(products: Map<string, ProductSamples>, size: number) {
    this.products = products;
    this.size = size;
    Object.freeze(this);
  }

  /** Build a table from validated samples. Duplicate (temperature, duration) pairs are rejected. */
  static fromSamples(samples: readonly MaterialSample[]): MaterialPropertyTable {
    const products = new Map<string, ProductSamples>();
    const grouped = new Map<string, Map<DurationClass, MaterialSample[]>>();

    for (const raw of samples) {
      const sample: MaterialSample = Object.freeze({
        productId: raw.productId,
        temperatureC: raw.temperatureC,
        durationClass: raw.durationClass,
        shearModulusMPa: raw.shearModulusMPa,
      });

      let product = products.get(sample.productId);
      if (!product) {
        product = { byKey: new Map(), byDuration: new Map() };
        products.set(sample.productId, product);
        grouped.set(sample.productId, new Map());
      }

      const key = sampleKey(sample.temperatureC, sample.durationClass);
      if (product.byKey.has(key)) {
        throw new GlassDesignError(
          'InvalidRequest',
          `Duplicate sample for '${sample.productId}' at ${sample.temperatureC} °C, ${sample.durationClass}`,
          { productId: sample.productId, temperatureC: sample.temperatureC, durationClass: sample.durationClass }
        );
      }
      product.byKey.set(key, sample);

      const perDuration = grouped.get(sample.productId);
      if (perDuration) {
        const list = perDuration.get(sample.durationClass) ?? [];
        list.push(sample);
        perDuration.set(sample.durationClass, list);
      }
    }

    for (const [productId, perDuration] of grouped) {
      const product = products.get(productId);
      if (!product) continue;
      for (const [dc, list] of perDuration) {
        list.sort((a, b) => a.temperatureC - b.temperatureC);
        product.byDuration.set(dc, Object.freeze(list));
      }
    }

    return new MaterialPropertyTable(products, samples.length);
  }

  hasProduct(productId: string): boolean {
    return this.products.has(productId);
  }

  productIds(): string[] {
    return [...this.products.keys()].sort();
  }

  private product(productId: string): ProductSamples {
    const product = this.products.get(productId);
    if (!product) {
      throw new GlassDesignError('UnknownProduct', `Unknown interlayer product '${productId}'`, { productId });
    }
    return product;
  }

  /** Exact-match lookup; never interpolates */
  lookup(productId: string, temperatureC: number, durationClass: DurationClass): MaterialSample | undefined {
    return this.product(productId).byKey.get(sampleKey(temperatureC, durationClass));
  }

  /**
   * Samples of a product sorted by temperature.
   * Without a duration class, all samples in duration-class order.
   */
  samplesFor(productId: string, durationClass?: DurationClass): readonly MaterialSample[] {
    const product = this.product(productId);
    if (durationClass !== undefined) {
      return product.byDuration.get(durationClass) ?? [];
    }
    return DURATION_CLASSES.flatMap(dc => product.byDuration.get(dc) ?? []);
  }

  durationClasses(productId: string): DurationClass[] {
    const product = this.product(productId);
    return DURATION_CLASSES.filter(dc => product.byDuration.has(dc));
  }

  temperatures(productId: string): number[] {
    const temps = new Set<number>();
    for (const sample of this.product(productId).byKey.values()) {
      temps.add(sample.temperatureC);
    }
    return [...temps].sort((a, b) => a - b);
  }
}

// ---------------------------------------------------------------------------
// Ingestion
// ---------------------------------------------------------------------------

/** Validate long-format rows and build the table */
export function loadMaterialTable(rows: readonly unknown[]): MaterialPropertyTable {
  const samples: MaterialSampleRow[] = rows.map((row, i) => {
    try {
      return parseMaterialSampleRow(row);
    } catch (err) {
      if (err instanceof GlassDesignError) {
        throw new GlassDesignError(err.code, `Row ${i}: ${err.message}`, { ...err.details, row: i });
      }
      throw err;
    }
  });
  return MaterialPropertyTable.fromSamples(samples);
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * Convert a wide interlayer sheet (temperature rows × duration columns) into long rows.
 * Columns without a duration mapping are skipped and logged.
 */
export function rowsFromSheet(
  productId: string,
  sheet: Sheet,
  config: Pick<IEngineConfig, 'durationLabels' | 'missingCellPolicy'> = DEFAULT_ENGINE_CONFIG
): MaterialSampleRow[] {
  const rows: MaterialSampleRow[] = [];
  const skippedColumns = new Set<string>();

  sheet.forEach((sheetRow, i) => {
    const temperatureC = toNumber(sheetRow[TEMPERATURE_COLUMN]);
    if (temperatureC === null) {
      throw new GlassDesignError(
        'InvalidRequest',
        `Sheet '${productId}' row ${i}: missing or non-numeric '${TEMPERATURE_COLUMN}'`,
        { productId, row: i }
      );
    }

    for (const [column, cell] of Object.entries(sheetRow)) {
      if (column === TEMPERATURE_COLUMN) continue;
      const durationClass = Object.prototype.hasOwnProperty.call(config.durationLabels, column)
        ? config.durationLabels[column]
        : undefined;
      if (durationClass === undefined) {
        skippedColumns.add(column);
        continue;
      }

      let modulus = toNumber(cell);
      if (modulus === null) {
        if (config.missingCellPolicy === 'skip') continue;
        modulus = config.missingCellPolicy.fill;
      }
      rows.push({ productId, temperatureC, durationClass, shearModulusMPa: modulus });
    }
  });

  for (const column of skippedColumns) {
    ConsoleService.warn(`Interlayer sheet '${productId}': column '${column}' has no duration class, skipped`);
  }
  return rows;
}

/** Ingest one wide sheet per product */
export function loadMaterialTableFromSheets(
  sheets: Record<string, Sheet>,
  config: Pick<IEngineConfig, 'durationLabels' | 'missingCellPolicy'> = DEFAULT_ENGINE_CONFIG
): MaterialPropertyTable {
  const rows = Object.entries(sheets).flatMap(([productId, sheet]) => rowsFromSheet(productId, sheet, config));
  return loadMaterialTable(rows);
}
