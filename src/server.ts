// This module wires all HTTP routes, middleware behavior, and lifecycle resources.

import cors from '@fastify/cors';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import { createAdsToolHandlers } from './ads/tools.js';
import { createLazyAdsClient } from './ads/runtime.js';
import { loadConfig, type AppConfig } from './config/config.js';
import { RPC_INTERNAL_ERROR, rpcError } from './mcp/dispatcher.js';
import { registerMcpRoutes } from './mcp/protocol.js';
import type { SseWait } from './mcp/sse.js';
import { AdsToolRegistry } from './mcp/tool-registry.js';
import type { DirectToolHandler, ToolRegistry } from './types/mcp.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerOptions {
  config?: AppConfig;
  // Pass null to run without a registry and exercise the static tool set and direct handlers.
  registry?: ToolRegistry | null;
  directHandlers?: Record<string, DirectToolHandler>;
  sseWait?: SseWait;
}

export interface ServerResources {
  app: FastifyInstance;
  config: AppConfig;
}

// This function builds and configures the full HTTP application.
export function createServer(options: ServerOptions = {}): ServerResources {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true
  });

  // Bodies reach the routes as raw text so malformed JSON becomes a JSON-RPC parse error.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  void app.register(cors, {
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    maxAge: 600
  });

  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        contentLength: request.headers['content-length'] ?? null
      },
      'http_request_start'
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal for the hosting platform.
  app.get('/health', async () => {
    app.log.debug({ event: 'health_check' }, 'health_check');

    return {
      status: 'healthy',
      service: MCP_SERVER_NAME
    };
  });

  app.get('/', async () => {
    return {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      transport: 'http-jsonrpc',
      endpoints: {
        rpc: ['POST /', 'POST /messages'],
        events: 'GET /sse',
        health: 'GET /health'
      }
    };
  });

  // The Ads client is built on the first tool call, so the server starts without credentials.
  const adsHandlers = createAdsToolHandlers({
    getClient: createLazyAdsClient(config.ads, app.log),
    logger: app.log
  });
  const directHandlers = options.directHandlers ?? adsHandlers;
  const registry = options.registry !== undefined ? options.registry : new AdsToolRegistry(adsHandlers);

  registerMcpRoutes(app, {
    registry,
    directHandlers,
    sse: {
      keepaliveMs: config.sseKeepaliveMs,
      wait: options.sseWait
    }
  });

  // This handler maps uncaught route failures into JSON-RPC shaped errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const status = error instanceof AppError ? error.statusCode : error.statusCode ?? 500;

    request.log.error(
      {
        event: 'http_request_failed',
        requestId: request.id,
        code: normalized.code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send(rpcError(null, RPC_INTERNAL_ERROR, normalized.message));
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new AppError(404, 'not_found', `Route not found: ${request.method} ${request.url}`);

    request.log.warn(
      {
        event: 'http_route_not_found',
        requestId: request.id,
        method: request.method,
        path: request.url
      },
      'http_route_not_found'
    );

    reply.status(404).send({
      ok: false,
      error: {
        code: error.code,
        message: error.message
      }
    });
  });

  return {
    app,
    config
  };
}
