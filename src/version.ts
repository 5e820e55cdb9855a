// This module centralizes server identity values so protocol metadata and health routes stay in sync.

export const MCP_SERVER_NAME = 'ado-mcp';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
export const JSON_RPC_VERSION = '2.0';
