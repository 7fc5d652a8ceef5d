// This module centralizes server identity values so protocol metadata and health output stay in sync.

export const MCP_SERVER_NAME = 'google-ads-mcp';
export const MCP_SERVER_VERSION = '0.0.1';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
