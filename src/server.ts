#!/usr/bin/env node
/**
 * worktime HTTP server
 *
 * Thin JSON wrapper over the engine for schedulers and admin tools. Engine
 * calls are queued so only one runs at a time on the shared connection.
 */

import * as http from 'http';
import { z } from 'zod';
import { initDatabase, closeDatabase } from './lib/database';
import { loadRuntimeConfig } from './lib/config';
import { ConfigurationError, toApiError } from './lib/errors';
import { dateSchema, parseOptions, recordEventSchema } from './lib/validation';
import { runBatch } from './lib/services/batch-processor';
import { reprocess } from './lib/services/reprocess';
import { closeOpenSessions } from './lib/services/session-admin';
import { getDepartmentStats, getEmployeeStats, getSystemStats } from './lib/services/stats-reporter';
import { recordEvents } from './lib/repositories/access-event.repository';
import { ErrorCodes, type ApiResponse } from './types/api';

const ACTOR = 'api';
const MAX_BODY_BYTES = 5 * 1024 * 1024;

// One engine call at a time
let requestQueue: Promise<void> = Promise.resolve();

function enqueue<T>(fn: () => Promise<T>): Promise<T> {
  const result = requestQueue.then(fn, fn);
  requestQueue = result.then(() => {}, () => {});
  return result;
}

const processBodySchema = z.object({
  employeeId: z.string().optional(),
  deviceId: z.string().optional(),
  fromDate: z.string().optional(),
  toDate: z.string().optional(),
  batchSize: z.number().optional(),
  forceProcess: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

const reprocessBodySchema = z.object({
  employeeId: z.string().optional(),
  date: z.string().optional(),
  fromDate: z.string().optional(),
  toDate: z.string().optional(),
});

const closeSessionsBodySchema = z.object({
  employeeId: z.string().optional(),
  date: dateSchema.optional(),
  reason: z.string(),
  closedBy: z.string(),
  closedAt: z.string().optional(),
});

const statsBodySchema = z.object({
  scope: z.enum(['system', 'departments', 'employee']).default('system'),
  employeeId: z.string().optional(),
  departmentId: z.string().optional(),
  fromDate: z.string().optional(),
  toDate: z.string().optional(),
});

const eventsBodySchema = z.object({
  events: z.array(recordEventSchema).min(1),
});

export interface RouteResult {
  status: number;
  body: ApiResponse<unknown>;
}

function ok(data: unknown): RouteResult {
  return { status: 200, body: { success: true, data } };
}

/**
 * HTTP status for an engine error code
 */
export function statusForError(code: string): number {
  switch (code) {
    case ErrorCodes.VALIDATION_ERROR:
    case ErrorCodes.INVALID_INPUT:
      return 400;
    case ErrorCodes.DB_NOT_FOUND:
      return 404;
    case ErrorCodes.CONFIRMATION_REQUIRED:
    case ErrorCodes.DUPLICATE_ENTRY:
    case ErrorCodes.DB_CONSTRAINT_VIOLATION:
      return 409;
    case ErrorCodes.DB_CONNECTION_ERROR:
      return 503;
    default:
      return 500;
  }
}

export function errorResult(error: unknown): RouteResult {
  const apiError = toApiError(error);
  return { status: statusForError(apiError.code), body: { success: false, error: apiError } };
}

/**
 * Route one request. `body` is the parsed JSON body (empty object for GET).
 */
export async function dispatch(method: string, path: string, body: unknown): Promise<RouteResult> {
  if (method === 'GET' && path === '/health') {
    return ok({ status: 'ok', timestamp: new Date().toISOString() });
  }
  if (method !== 'POST') {
    return { status: 405, body: { success: false, error: { code: ErrorCodes.INVALID_INPUT, message: 'Method not allowed' } } };
  }

  try {
    switch (path) {
      case '/process': {
        const input = parseOptions(processBodySchema, body, 'request body');
        const report = await enqueue(() => runBatch({
          selector: {
            employeeId: input.employeeId,
            deviceId: input.deviceId,
            fromDate: input.fromDate,
            toDate: input.toDate,
          },
          batchSize: input.batchSize,
          forceProcess: input.forceProcess,
          dryRun: input.dryRun,
          verbose: input.verbose,
          actor: ACTOR,
        }));
        return ok(report);
      }

      case '/reprocess': {
        const input = parseOptions(reprocessBodySchema, body, 'request body');
        return ok(await enqueue(() => reprocess({ ...input, actor: ACTOR })));
      }

      case '/close-sessions': {
        const input = parseOptions(closeSessionsBodySchema, body, 'request body');
        return ok(await enqueue(() => closeOpenSessions(input)));
      }

      case '/stats': {
        const input = parseOptions(statsBodySchema, body, 'request body');
        const period = { fromDate: input.fromDate, toDate: input.toDate };
        if (input.scope === 'employee') {
          const employeeId = input.employeeId;
          if (!employeeId) {
            throw new ConfigurationError('employeeId is required for employee stats');
          }
          return ok(await enqueue(() => getEmployeeStats(employeeId, period)));
        }
        if (input.scope === 'departments') {
          return ok(await enqueue(() => getDepartmentStats(period, input.departmentId)));
        }
        return ok(await enqueue(() => getSystemStats(period)));
      }

      case '/events': {
        const input = parseOptions(eventsBodySchema, body, 'request body');
        return ok(await enqueue(() => recordEvents(input.events)));
      }

      default:
        return { status: 404, body: { success: false, error: { code: ErrorCodes.DB_NOT_FOUND, message: 'Not found' } } };
    }
  } catch (error) {
    console.error(`[server] ${method} ${path} failed:`, toApiError(error).message);
    return errorResult(error);
  }
}

/**
 * Parse JSON body from request
 */
async function parseBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString();
      if (body.length > MAX_BODY_BYTES) {
        reject(new ConfigurationError('Request body too large', undefined, ErrorCodes.INVALID_INPUT));
        req.destroy();
      }
    });
    req.on('end', () => {
      try {
        resolve(body ? JSON.parse(body) : {});
      } catch {
        reject(new ConfigurationError('Invalid JSON', undefined, ErrorCodes.INVALID_INPUT));
      }
    });
    req.on('error', reject);
  });
}

/**
 * Send JSON response
 */
function sendJson(res: http.ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const method = req.method ?? 'GET';
  const path = (req.url ?? '/').split('?')[0] ?? '/';
  console.log(`[server] ${method} ${path}`);

  let body: unknown = {};
  if (method === 'POST') {
    try {
      body = await parseBody(req);
    } catch (error) {
      const result = errorResult(error);
      sendJson(res, result.body, result.status);
      return;
    }
  }

  const result = await dispatch(method, path, body);
  sendJson(res, result.body, result.status);
}

export function createServer(): http.Server {
  return http.createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      console.error('[server] Error:', error);
      if (!res.headersSent) {
        const result = errorResult(error);
        sendJson(res, result.body, result.status);
      }
    });
  });
}

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  await initDatabase(config.dbPath);
  const server = createServer();

  server.listen(config.port, config.host, () => {
    console.log(`[server] worktime engine listening on ${config.host}:${config.port} (db ${config.dbPath})`);
    console.log('[server] Endpoints:');
    console.log('  GET  /health          - Health check');
    console.log('  POST /process         - Process unprocessed events');
    console.log('  POST /reprocess       - Recompute an employee-day or range');
    console.log('  POST /close-sessions  - Close open sessions');
    console.log('  POST /stats           - System, department or employee stats');
    console.log('  POST /events          - Record access events');
  });

  const shutdown = (): void => {
    console.log('[server] Shutting down...');
    server.close(() => {
      closeDatabase().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[server] Close failed:', error);
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('[server] Failed to start:', error);
    process.exitCode = 1;
  });
}
