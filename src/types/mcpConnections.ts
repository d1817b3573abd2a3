/**
 * Types for MCP server connections
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';

/**
 * Configuration for connecting to an MCP server
 */
export interface MCPServerConfig {
  name: string;
  transport: 'stdio';
  command: string;
  args: string[];
}

export interface MCPToolInfo {
  name: string;
  description?: string;
  inputSchema: unknown;
}

/**
 * Active MCP server connection
 */
export interface MCPConnection {
  config: MCPServerConfig;
  client: Client;
  connected: boolean;
  tools?: MCPToolInfo[];
}

export interface MCPServerHealth {
  name: string;
  connected: boolean;
  toolCount: number;
  error?: string;
}

/**
 * Result of validating MCP server requirements
 */
export interface MCPValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  availableServers: string[];
  missingServers: string[];
  missingTools: Array<{
    server: string;
    tool: string;
  }>;
}
