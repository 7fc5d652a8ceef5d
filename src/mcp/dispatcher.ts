// This module classifies JSON-RPC envelopes by method and produces protocol-correct MCP responses.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type {
  DirectToolHandler,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  McpTool,
  ToolOutcome,
  ToolRegistry
} from '../types/mcp.js';
import { AppError, normalizeError } from '../utils/errors.js';
import { isPlainRecord } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { describeToolError } from './error-remediation.js';
import { normalizeInputSchema } from './schema-normalizer.js';
import { classifyToolOutcome, normalizeToolOutcome, valueOutcome } from './tool-outcome.js';
import { FALLBACK_TOOLS } from './tool-schemas.js';

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INTERNAL_ERROR = -32603;

const NOTIFICATION_PREFIX = 'notifications/';

export interface RpcDispatchDeps {
  registry: ToolRegistry | null;
  directHandlers: Readonly<Record<string, DirectToolHandler>>;
}

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

function readRequestId(payload: Record<string, unknown>): JsonRpcId | undefined {
  if (!('id' in payload)) {
    return undefined;
  }

  const id = payload.id;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

// This helper reads one envelope leniently: a missing method becomes an unknown-method answer, not a parse failure.
export function readRpcRequest(payload: Record<string, unknown>): JsonRpcRequest {
  return {
    jsonrpc: typeof payload.jsonrpc === 'string' ? payload.jsonrpc : undefined,
    id: readRequestId(payload),
    method: typeof payload.method === 'string' ? payload.method : undefined,
    params: isPlainRecord(payload.params) ? payload.params : undefined
  };
}

export function isNotificationMethod(method: string | undefined): boolean {
  return method !== undefined && method.startsWith(NOTIFICATION_PREFIX);
}

// A fresh manifest per call keeps initialize idempotent even if a caller mutates a previous result.
function buildInitializeResult(): Record<string, unknown> {
  return {
    protocolVersion: MCP_PROTOCOL_VERSION,
    capabilities: {
      tools: {
        listChanged: true
      },
      resources: {
        subscribe: false,
        listChanged: false
      },
      prompts: {},
      sampling: {}
    },
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    }
  };
}

function toDescriptor(tool: McpTool): McpTool {
  return {
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: normalizeInputSchema(tool.inputSchema ?? {})
  };
}

function fallbackToolList(): McpTool[] {
  return FALLBACK_TOOLS.map((tool) => toDescriptor(tool));
}

// This helper never fails: registry trouble degrades to the static tool set.
async function resolveToolList(registry: ToolRegistry | null, logger: FastifyBaseLogger): Promise<McpTool[]> {
  if (!registry || !registry.listTools) {
    logger.warn({ event: 'mcp_tools_registry_unavailable' }, 'mcp_tools_registry_unavailable');
    return fallbackToolList();
  }

  try {
    const tools = await registry.listTools();
    if (!Array.isArray(tools) || tools.length === 0) {
      logger.warn({ event: 'mcp_tools_registry_empty' }, 'mcp_tools_registry_empty');
      return fallbackToolList();
    }

    return tools.map((tool) => toDescriptor(tool));
  } catch (error) {
    logger.error({ event: 'mcp_tools_registry_failed', error: errorForLog(error) }, 'mcp_tools_registry_failed');
    return fallbackToolList();
  }
}

// This helper prefers the registry call operation and only falls back to the direct handler table without one.
async function invokeTool(name: string, args: Record<string, unknown>, deps: RpcDispatchDeps): Promise<ToolOutcome> {
  const registry = deps.registry;
  if (registry && registry.callTool) {
    return classifyToolOutcome(await registry.callTool(name, args));
  }

  const handler = Object.hasOwn(deps.directHandlers, name) ? deps.directHandlers[name] : undefined;
  if (!handler) {
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${name}`);
  }

  // Direct handlers return domain data; it is always sent as JSON, strings included.
  const result = await handler(args);
  return valueOutcome(JSON.stringify(result, null, 2) ?? 'null');
}

async function handleToolsCall(
  params: Record<string, unknown>,
  requestId: JsonRpcId,
  deps: RpcDispatchDeps,
  logger: FastifyBaseLogger,
  rpcTraceId: string
): Promise<JsonRpcResponse> {
  const name = params.name;
  const args = isPlainRecord(params.arguments) ? params.arguments : {};

  if (typeof name !== 'string' || name.length === 0) {
    logger.warn(
      {
        event: 'mcp_tool_call_invalid_name',
        rpcTraceId,
        rpcRequestId: requestId,
        providedNameType: typeof name
      },
      'mcp_tool_call_invalid_name'
    );
    return rpcError(requestId, RPC_INTERNAL_ERROR, 'tools/call requires params.name as a non-empty string.', {
      tool: null,
      arguments: args
    });
  }

  const startedAt = Date.now();
  logger.info(
    {
      event: 'mcp_tool_call_requested',
      rpcTraceId,
      rpcRequestId: requestId,
      toolName: name,
      arguments: sanitizeForLog(args)
    },
    'mcp_tool_call_requested'
  );

  try {
    const outcome = await invokeTool(name, args, deps);
    const result = normalizeToolOutcome(outcome);

    logger.info(
      {
        event: 'mcp_tool_call_completed',
        rpcTraceId,
        toolName: name,
        outcomeKind: outcome.kind,
        durationMs: Date.now() - startedAt
      },
      'mcp_tool_call_completed'
    );

    return rpcResult(requestId, result);
  } catch (error) {
    const described = describeToolError(name, error);

    logger.error(
      {
        event: 'mcp_tool_call_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        toolName: name,
        fault: described.fault,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'mcp_tool_call_failed'
    );

    return rpcError(requestId, RPC_INTERNAL_ERROR, described.message, {
      tool: name,
      arguments: args,
      ...(described.fault ? { fault: described.fault } : {})
    });
  }
}

async function dispatchMethod(
  request: JsonRpcRequest,
  requestId: JsonRpcId,
  deps: RpcDispatchDeps,
  logger: FastifyBaseLogger,
  rpcTraceId: string
): Promise<JsonRpcResponse> {
  switch (request.method) {
    case 'initialize':
      return rpcResult(requestId, buildInitializeResult());

    case 'ping':
      return rpcResult(requestId, {});

    case 'tools/list': {
      const tools = await resolveToolList(deps.registry, logger);
      logger.info({ event: 'mcp_tools_listed', rpcTraceId, toolCount: tools.length }, 'mcp_tools_listed');
      return rpcResult(requestId, { tools });
    }

    case 'tools/call':
      return handleToolsCall(request.params ?? {}, requestId, deps, logger, rpcTraceId);

    case 'resources/list':
      return rpcResult(requestId, { resources: [] });

    default:
      return rpcError(requestId, RPC_METHOD_NOT_FOUND, `Method not found: ${request.method ?? '(missing method)'}`);
  }
}

/**
 * Handles one JSON-RPC request and returns its response, or `null` when the protocol forbids
 * answering (notifications). Failures are always converted into error responses.
 */
export async function handleRpcRequest(
  request: JsonRpcRequest,
  deps: RpcDispatchDeps,
  logger: FastifyBaseLogger
): Promise<JsonRpcResponse | null> {
  if (isNotificationMethod(request.method)) {
    logger.info({ event: 'mcp_notification_received', method: request.method }, 'mcp_notification_received');
    return null;
  }

  const requestId = request.id ?? null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();

  logger.info(
    {
      event: 'mcp_rpc_request_received',
      rpcTraceId,
      rpcRequestId: requestId,
      method: request.method ?? null
    },
    'mcp_rpc_request_received'
  );

  let response: JsonRpcResponse;
  try {
    response = await dispatchMethod(request, requestId, deps, logger, rpcTraceId);
  } catch (error) {
    const appError = normalizeError(error);
    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method ?? null,
        code: appError.code,
        error: errorForLog(error)
      },
      'mcp_rpc_request_failed'
    );
    response = rpcError(requestId, RPC_INTERNAL_ERROR, appError.message, {
      error_type: error instanceof Error ? error.name : typeof error,
      error_details: appError.details
    });
  } finally {
    logger.info(
      {
        event: 'mcp_rpc_request_completed',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method ?? null,
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }

  // JSON-RPC 2.0: a request without an id is a notification and gets no response, whatever its method.
  if (request.id === undefined) {
    logger.debug(
      { event: 'mcp_rpc_response_suppressed', rpcTraceId, method: request.method ?? null },
      'mcp_rpc_response_suppressed'
    );
    return null;
  }

  return response;
}
