// This module hosts the Google Ads tools behind the registry contract the dispatcher consumes.

import type { AdsToolHandlers } from '../ads/tools.js';
import type { AdsToolName } from '../types/ads.js';
import type { McpTool, TextContentBlock, ToolRegistry } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { buildToolDescriptor } from './tool-schemas.js';

const TOOL_NAMES: readonly AdsToolName[] = ['search', 'list_accessible_customers'];

function isAdsToolName(name: string): name is AdsToolName {
  return TOOL_NAMES.some((candidate) => candidate === name);
}

export class AdsToolRegistry implements ToolRegistry {
  private readonly handlers: AdsToolHandlers;

  public constructor(handlers: AdsToolHandlers) {
    this.handlers = handlers;
  }

  public listTools(): McpTool[] {
    return TOOL_NAMES.map((name) => buildToolDescriptor(name));
  }

  // This method runs one tool and renders its payload as a single JSON text block.
  public async callTool(name: string, args: Record<string, unknown>): Promise<TextContentBlock[]> {
    if (!isAdsToolName(name)) {
      throw new AppError(404, 'tool_not_found', `Unknown tool: ${name}`);
    }

    const payload = await this.handlers[name](args);
    return [{ type: 'text', text: JSON.stringify(payload, null, 2) ?? 'null' }];
  }
}
