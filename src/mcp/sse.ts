// This module produces the degraded Server-Sent Events stream that points clients at POST /messages.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { errorForLog } from '../utils/logger.js';

export type SseWait = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SseStreamOptions {
  signal: AbortSignal;
  keepaliveMs: number;
  wait?: SseWait;
  logger?: FastifyBaseLogger;
}

export const SSE_CONNECTION_EVENT = {
  type: 'connection',
  status: 'connected',
  note: 'Use POST /messages for requests'
} as const;

export const SSE_KEEPALIVE_COMMENT = ': keepalive\n\n';

export function formatSseData(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

async function waitForKeepalive(ms: number, signal: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}

/**
 * Yields the connection acknowledgement, then one keep-alive comment per interval until `signal`
 * aborts. Abort ends the stream silently; any other failure ends it with one JSON-RPC error event.
 */
export async function* sseEventStream(options: SseStreamOptions): AsyncGenerator<string, void, undefined> {
  const wait = options.wait ?? waitForKeepalive;

  try {
    yield formatSseData(SSE_CONNECTION_EVENT);

    while (!options.signal.aborted) {
      await wait(options.keepaliveMs, options.signal);
      yield SSE_KEEPALIVE_COMMENT;
    }
  } catch (error) {
    if (options.signal.aborted) {
      return;
    }

    options.logger?.error({ event: 'sse_stream_failed', error: errorForLog(error) }, 'sse_stream_failed');
    yield formatSseData({
      jsonrpc: '2.0',
      error: {
        code: -32603,
        message: error instanceof Error ? error.message : String(error)
      }
    });
  }
}
