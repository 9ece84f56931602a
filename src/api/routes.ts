// API route definitions for the glass design engine

import { ConsoleService } from '../core/console/ConsoleService';
import type { DesignReport } from '../core/glass/types';
import { isGlassDesignError, type GlassDesignErrorCode } from '../core/glass/GlassDesignError';
import { parseDesignRequest, parseDesignStrengthTableInput } from '../core/glass/schema';
import type { MaterialPropertyTable } from '../core/materials/MaterialPropertyTable';
import type { IDesignStrengthCalculator } from '../core/solver/DesignStrengthCalculator';
import { tabulateDesignStrength, type DesignStrengthRow } from '../core/solver/DesignStrengthTable';

export const API_NAME = 'glass-design-strength';
export const API_VERSION = '1.0.0';

export interface ApiError {
  code: GlassDesignErrorCode | 'InternalError';
  message: string;
}

export type ApiEvaluateResponse =
  | { success: true; report: DesignReport }
  | { success: false; error: ApiError };

export type ApiDesignStrengthResponse =
  | { success: true; rows: DesignStrengthRow[] }
  | { success: false; error: ApiError };

export interface ApiInterlayersResponse {
  success: true;
  interlayers: { productId: string; durationClasses: string[]; temperatures: number[] }[];
}

export interface ApiHealthResponse {
  status: string;
  version: string;
}

export interface ApiInfoResponse {
  name: string;
  version: string;
  endpoints: { path: string; method: string; description: string }[];
}

export interface ApiResult<T> {
  status: number;
  body: T;
}

export interface IApiContext {
  table: MaterialPropertyTable;
  calculator: IDesignStrengthCalculator;
}

function failure(err: unknown): ApiResult<{ success: false; error: ApiError }> {
  if (isGlassDesignError(err)) {
    return { status: 400, body: { success: false, error: { code: err.code, message: err.message } } };
  }
  const message = err instanceof Error ? err.message : String(err);
  ConsoleService.error(`API internal error: ${message}`);
  return { status: 500, body: { success: false, error: { code: 'InternalError', message } } };
}

export function handleHealth(): ApiResult<ApiHealthResponse> {
  return { status: 200, body: { status: 'ok', version: API_VERSION } };
}

export function handleInfo(): ApiResult<ApiInfoResponse> {
  return {
    status: 200,
    body: {
      name: API_NAME,
      version: API_VERSION,
      endpoints: [
        { path: '/api/health', method: 'GET', description: 'Health check' },
        { path: '/api/info', method: 'GET', description: 'API info' },
        { path: '/api/interlayers', method: 'GET', description: 'Interlayer products in the loaded table' },
        { path: '/api/evaluate', method: 'POST', description: 'Evaluate a design request' },
        { path: '/api/design-strength', method: 'POST', description: 'Design strength per load duration' },
      ],
    },
  };
}

export function handleInterlayers(ctx: IApiContext): ApiResult<ApiInterlayersResponse> {
  return {
    status: 200,
    body: {
      success: true,
      interlayers: ctx.table.productIds().map(productId => ({
        productId,
        durationClasses: ctx.table.durationClasses(productId),
        temperatures: ctx.table.temperatures(productId),
      })),
    },
  };
}

export function handleEvaluate(ctx: IApiContext, body: unknown): ApiResult<ApiEvaluateResponse> {
  try {
    const report = ctx.calculator.evaluate(parseDesignRequest(body));
    return { status: 200, body: { success: true, report } };
  } catch (err) {
    return failure(err);
  }
}

export function handleDesignStrength(body: unknown): ApiResult<ApiDesignStrengthResponse> {
  try {
    const rows = tabulateDesignStrength(parseDesignStrengthTableInput(body));
    return { status: 200, body: { success: true, rows } };
  } catch (err) {
    return failure(err);
  }
}
