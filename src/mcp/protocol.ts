// This module registers the MCP HTTP transports: two JSON-RPC POST endpoints and a degraded SSE stream.

import type { ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { JsonRpcId, JsonRpcResponse } from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isPlainRecord, parseJsonBody } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import {
  RPC_INTERNAL_ERROR,
  RPC_INVALID_REQUEST,
  RPC_PARSE_ERROR,
  handleRpcRequest,
  readRpcRequest,
  rpcError,
  type RpcDispatchDeps
} from './dispatcher.js';
import { sseEventStream, type SseWait } from './sse.js';

export interface McpRouteDeps extends RpcDispatchDeps {
  sse: {
    keepaliveMs: number;
    wait?: SseWait;
  };
}

type RpcTransport = 'root' | 'messages';

// This helper dispatches a JSON array element by element, keeping response order and dropping notification slots.
async function handleBatch(
  items: unknown[],
  deps: RpcDispatchDeps,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse[]> {
  const responses: JsonRpcResponse[] = [];

  for (const item of items) {
    if (!isPlainRecord(item)) {
      logger.warn({ event: 'mcp_post_batch_invalid_item' }, 'mcp_post_batch_invalid_item');
      responses.push(rpcError(null, RPC_INVALID_REQUEST, 'Invalid Request: expected a JSON-RPC request object.'));
      continue;
    }

    const response = await handleRpcRequest(readRpcRequest(item), deps, logger);
    if (response) {
      responses.push(response);
    }
  }

  return responses;
}

// This function translates one POST body into exactly one HTTP answer: 200 with JSON, 204 empty, or 4xx/5xx with a JSON-RPC error.
async function handleRpcPost(
  request: FastifyRequest,
  reply: FastifyReply,
  deps: RpcDispatchDeps,
  transport: RpcTransport
): Promise<void> {
  const requestLogger = request.log.child({ component: 'mcp', transport });
  let recoveredId: JsonRpcId = null;

  try {
    const payload = parseJsonBody(request.body);

    if (Array.isArray(payload)) {
      requestLogger.info({ event: 'mcp_post_batch_received', batchSize: payload.length }, 'mcp_post_batch_received');

      if (payload.length === 0) {
        reply.code(400).send(rpcError(null, RPC_INVALID_REQUEST, 'Invalid Request: empty batch.'));
        return;
      }

      const responses = await handleBatch(payload, deps, requestLogger);
      if (responses.length === 0) {
        reply.code(204).send();
        return;
      }

      reply.send(responses);
      return;
    }

    if (!isPlainRecord(payload)) {
      requestLogger.warn({ event: 'mcp_post_invalid_request_object' }, 'mcp_post_invalid_request_object');
      reply.code(400).send(rpcError(null, RPC_INVALID_REQUEST, 'Invalid Request: expected a JSON-RPC request object.'));
      return;
    }

    const rpcRequest = readRpcRequest(payload);
    recoveredId = rpcRequest.id ?? null;

    const response = await handleRpcRequest(rpcRequest, deps, requestLogger);
    if (!response) {
      reply.code(204).send();
      return;
    }

    reply.send(response);
  } catch (error) {
    if (error instanceof AppError && error.code === 'parse_error') {
      requestLogger.warn({ event: 'mcp_post_parse_error', details: error.details }, 'mcp_post_parse_error');
      reply.code(400).send(rpcError(null, RPC_PARSE_ERROR, 'Parse error'));
      return;
    }

    const appError = normalizeError(error);
    requestLogger.error(
      { event: 'mcp_post_failed', rpcRequestId: recoveredId, error: errorForLog(error) },
      'mcp_post_failed'
    );
    reply.code(500).send(
      rpcError(recoveredId, RPC_INTERNAL_ERROR, appError.message, {
        error_type: error instanceof Error ? error.name : typeof error
      })
    );
  }
}

// This function registers the MCP transport routes.
export function registerMcpRoutes(fastify: FastifyInstance, deps: McpRouteDeps): void {
  const dispatchDeps: RpcDispatchDeps = {
    registry: deps.registry,
    directHandlers: deps.directHandlers
  };

  // Open event streams never finish on their own, so close() ends them before waiting on connections.
  const openStreams = new Map<AbortController, ServerResponse>();
  fastify.addHook('preClose', async () => {
    fastify.log.info({ event: 'sse_streams_closing', count: openStreams.size }, 'sse_streams_closing');
    for (const [controller, raw] of openStreams) {
      // The keep-alive socket outlives the response unless it is released once the last event is flushed.
      raw.once('finish', () => {
        raw.socket?.end();
      });
      controller.abort();
    }
    openStreams.clear();
  });

  fastify.post('/', async (request, reply) => {
    await handleRpcPost(request, reply, dispatchDeps, 'root');
  });

  fastify.post('/messages', async (request, reply) => {
    await handleRpcPost(request, reply, dispatchDeps, 'messages');
  });

  // Full-duplex SSE is not offered; the stream only acknowledges the connection and keeps it open.
  fastify.get('/sse', async (request, reply) => {
    const abortController = new AbortController();
    const logger = request.log.child({ component: 'sse' });
    openStreams.set(abortController, reply.raw);

    reply.raw.on('close', () => {
      openStreams.delete(abortController);
      if (!abortController.signal.aborted) {
        abortController.abort();
        logger.info({ event: 'sse_connection_closed' }, 'sse_connection_closed');
      }
    });

    logger.info({ event: 'sse_connection_opened', keepaliveMs: deps.sse.keepaliveMs }, 'sse_connection_opened');

    reply
      .header('Content-Type', 'text/event-stream')
      .header('Cache-Control', 'no-cache')
      .header('Connection', 'keep-alive')
      .header('X-Accel-Buffering', 'no');

    return reply.send(
      Readable.from(
        sseEventStream({
          signal: abortController.signal,
          keepaliveMs: deps.sse.keepaliveMs,
          wait: deps.sse.wait,
          logger
        })
      )
    );
  });
}
