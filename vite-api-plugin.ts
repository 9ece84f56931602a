import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Plugin } from 'vite';
import {
  handleDesignStrength,
  handleEvaluate,
  handleHealth,
  handleInfo,
  handleInterlayers,
  type ApiResult,
  type IApiContext,
} from './src/api/routes';
import { ConsoleService } from './src/core/console/ConsoleService';
import { loadReferenceInterlayerTable } from './src/core/data/InterlayerDatabase';
import { createDesignStrengthCalculator } from './src/core/solver/DesignStrengthCalculator';

function send<T>(res: ServerResponse, result: ApiResult<T>) {
  res.statusCode = result.status;
  res.end(JSON.stringify(result.body));
}

function setCors(res: ServerResponse, methods: string) {
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', methods);
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

/** Read a JSON body, then hand it to the route handler */
function postRoute(handler: (body: unknown) => ApiResult<unknown>) {
  return (req: IncomingMessage, res: ServerResponse) => {
    setCors(res, 'POST, OPTIONS');

    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    if (req.method !== 'POST') {
      res.statusCode = 405;
      res.end(JSON.stringify({ success: false, error: 'Method not allowed. Use POST with a JSON body.' }));
      return;
    }

    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on('end', () => {
      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch {
        send(res, {
          status: 400,
          body: { success: false, error: { code: 'InvalidRequest', message: 'Invalid JSON body' } },
        });
        return;
      }
      send(res, handler(data));
    });
  };
}

/**
 * Vite plugin that adds local API middleware endpoints for the design engine.
 * These endpoints are available during development via the Vite dev server.
 *
 * Endpoints:
 *   GET  /api/health          - Health check
 *   GET  /api/info            - API description
 *   GET  /api/interlayers     - Products in the reference interlayer table
 *   POST /api/evaluate        - Evaluate a design request, return the design report
 *   POST /api/design-strength - Design strength per load duration for one glass type
 */
export function apiPlugin(ctx?: IApiContext): Plugin {
  return {
    name: 'glass-design-api',
    configureServer(server) {
      const table = ctx?.table ?? loadReferenceInterlayerTable();
      const context: IApiContext = {
        table,
        calculator: ctx?.calculator ?? createDesignStrengthCalculator(table),
      };
      ConsoleService.log(`Interlayer table loaded: ${table.productIds().join(', ')} (${table.size} samples)`, 'system');

      server.middlewares.use('/api/health', (_req, res) => {
        setCors(res, 'GET');
        send(res, handleHealth());
      });

      server.middlewares.use('/api/info', (_req, res) => {
        setCors(res, 'GET');
        send(res, handleInfo());
      });

      server.middlewares.use('/api/interlayers', (_req, res) => {
        setCors(res, 'GET');
        send(res, handleInterlayers(context));
      });

      server.middlewares.use('/api/evaluate', postRoute(body => handleEvaluate(context, body)));
      server.middlewares.use('/api/design-strength', postRoute(handleDesignStrength));
    },
  };
}
