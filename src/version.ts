// This module centralizes server identity values so handshake metadata and discovery stay in sync.

export const MCP_SERVER_NAME = 'weather-server';
export const MCP_SERVER_VERSION = '1.0.0';
export const MCP_PROTOCOL_VERSION = '2024-11-05';
