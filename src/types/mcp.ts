// This file defines JSON-RPC and MCP protocol payload types used by the HTTP transport.

export type JsonRpcId = string | number | null;

export type MaybePromise<T> = T | Promise<T>;

// Envelope fields are optional because malformed requests still receive a protocol answer.
export interface JsonRpcRequest {
  jsonrpc?: string;
  id?: JsonRpcId;
  method?: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | {
      jsonrpc: '2.0';
      id: JsonRpcId;
      result: unknown;
    }
  | {
      jsonrpc: '2.0';
      id: JsonRpcId;
      error: JsonRpcError;
    };

export interface McpTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface TextContentBlock {
  type: 'text';
  text: string;
}

// Non-text blocks (images, resources) are forwarded as produced by the tool.
export type ContentBlock = TextContentBlock | Record<string, unknown>;

export interface ToolCallResult {
  content: ContentBlock[];
}

// Tool hosts return plain values, content block lists, or results that already carry `content`.
export type ToolOutcome =
  | { kind: 'value'; value: unknown }
  | { kind: 'content'; items: readonly unknown[] }
  | { kind: 'wrapped'; result: Record<string, unknown> };

// This contract is what the dispatcher needs from a tool host; both operations may be synchronous.
export interface ToolRegistry {
  listTools?(): MaybePromise<McpTool[]>;
  callTool?(name: string, args: Record<string, unknown>): MaybePromise<unknown>;
}

export type DirectToolHandler = (args: Record<string, unknown>) => MaybePromise<unknown>;
