/**
 * MCP Client Manager
 * Manages connections to external MCP servers (such as a Jira server) and
 * provides a clean interface for calling their tools
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type {
  MCPServerConfig,
  MCPConnection,
  MCPServerHealth,
  MCPToolInfo,
  MCPValidationResult,
} from '../types/mcpConnections.js';
import type { WorkflowRequirements } from '../types/workflow.js';
import { MCPClientError, errorMessage, type TicketFailureKind } from './errors.js';
import { logger } from './logger.js';

/**
 * What ticket clients need from the manager
 */
export interface ToolCaller {
  callTool(serverName: string, toolName: string, args: Record<string, unknown>): Promise<unknown>;
}

const ArgsSchema = z.array(z.string());

// The server refused the request itself; sending it again changes nothing
const REJECTED_REQUEST_CODES = new Set<number>([
  ErrorCode.InvalidRequest,
  ErrorCode.MethodNotFound,
  ErrorCode.InvalidParams,
]);

/**
 * Connection and transport failures are transient. A JSON-RPC rejection of
 * the request is not.
 */
export function classifyClientError(error: MCPClientError): TicketFailureKind {
  const { cause } = error;
  return cause instanceof McpError && REJECTED_REQUEST_CODES.has(cause.code) ? 'permanent' : 'transient';
}

/**
 * Servers are declared as {SERVERNAME}_MCP_TRANSPORT, {SERVERNAME}_MCP_COMMAND
 * and {SERVERNAME}_MCP_ARGS (a JSON array); JIRA_MCP_* becomes server "jira".
 */
export function parseServerConfigs(env: NodeJS.ProcessEnv): Map<string, MCPServerConfig> {
  const configs = new Map<string, MCPServerConfig>();

  for (const key of Object.keys(env)) {
    const match = key.match(/^(.+)_MCP_TRANSPORT$/);
    if (!match) continue;

    const serverName = match[1];
    const transport = env[key];
    const command = env[`${serverName}_MCP_COMMAND`];
    const argsStr = env[`${serverName}_MCP_ARGS`] ?? '[]';

    if (transport !== 'stdio' || !command) {
      logger.warn(`Skipping MCP server ${serverName}: only stdio servers with a command are supported`);
      continue;
    }

    try {
      const args = ArgsSchema.parse(JSON.parse(argsStr));
      const normalizedName = serverName.toLowerCase().replace(/_/g, '-');

      configs.set(normalizedName, {
        name: normalizedName,
        transport: 'stdio',
        command,
        args,
      });

      logger.debug(`Loaded MCP server config: ${normalizedName}`);
    } catch (error) {
      logger.warn(`Failed to parse MCP config for ${serverName}`, { error });
    }
  }

  return configs;
}

/**
 * Environment handed to spawned servers, so they can read their own credentials
 */
function childEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/**
 * Opens the transport to a configured server
 */
export type TransportFactory = (config: MCPServerConfig) => Transport;

const stdioTransport: TransportFactory = config =>
  new StdioClientTransport({
    command: config.command,
    args: config.args,
    env: childEnvironment(),
  });

export class MCPClientManager implements ToolCaller {
  private connections: Map<string, MCPConnection> = new Map();
  /** Connects in progress, shared by every caller that arrives meanwhile */
  private pending: Map<string, Promise<Client>> = new Map();
  private config: Map<string, MCPServerConfig>;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly createTransport: TransportFactory = stdioTransport
  ) {
    this.config = parseServerConfigs(env);
    logger.info(`Loaded ${this.config.size} MCP server configurations`);
  }

  /**
   * Connect to an MCP server, reusing a live connection
   */
  async connect(serverName: string): Promise<Client> {
    const existing = this.connections.get(serverName);
    if (existing?.connected) {
      return existing.client;
    }

    const inFlight = this.pending.get(serverName);
    if (inFlight) {
      return inFlight;
    }

    const config = this.config.get(serverName);
    if (!config) {
      throw new MCPClientError(
        `No configuration found for MCP server: ${serverName}`,
        serverName
      );
    }

    const attempt = this.open(config);
    this.pending.set(serverName, attempt);
    try {
      return await attempt;
    } finally {
      this.pending.delete(serverName);
    }
  }

  private async open(config: MCPServerConfig): Promise<Client> {
    const serverName = config.name;

    try {
      logger.info(`Connecting to MCP server: ${serverName}`);

      const client = new Client(
        {
          name: `alert-ticket-client-${serverName}`,
          version: '1.0.0',
        },
        {
          capabilities: {},
        }
      );

      const connection: MCPConnection = { config, client, connected: false };

      // A server that exits is reconnected on the next call
      client.onclose = () => {
        if (connection.connected) {
          connection.connected = false;
          logger.warn(`MCP server ${serverName} closed the connection`);
        }
      };

      await client.connect(this.createTransport(config));

      connection.connected = true;
      this.connections.set(serverName, connection);
      logger.info(`Successfully connected to MCP server: ${serverName}`);

      return client;
    } catch (error) {
      throw new MCPClientError(
        `Failed to connect to MCP server: ${serverName}`,
        serverName,
        undefined,
        error
      );
    }
  }

  /**
   * List available tools on an MCP server
   */
  async listTools(serverName: string): Promise<MCPToolInfo[]> {
    const client = await this.connect(serverName);

    try {
      const response = await client.listTools();
      const tools: MCPToolInfo[] = response.tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      }));

      // Cache tools on connection
      const connection = this.connections.get(serverName);
      if (connection) {
        connection.tools = tools;
      }

      return tools;
    } catch (error) {
      throw new MCPClientError(
        `Failed to list tools for MCP server: ${serverName}`,
        serverName,
        undefined,
        error
      );
    }
  }

  /**
   * Call a tool on an MCP server. The raw tool result is returned for the
   * caller to validate.
   */
  async callTool(
    serverName: string,
    toolName: string,
    args: Record<string, unknown>
  ): Promise<unknown> {
    const client = await this.connect(serverName);

    try {
      logger.debug(`Calling tool ${toolName} on ${serverName}`, { args });

      const response = await client.callTool({
        name: toolName,
        arguments: args,
      });

      logger.debug(`Tool ${toolName} completed`);
      return response;
    } catch (error) {
      throw new MCPClientError(
        `Failed to call tool ${toolName} on ${serverName}: ${errorMessage(error)}`,
        serverName,
        toolName,
        error
      );
    }
  }

  /**
   * Validate that required MCP servers and tools are available
   */
  async validateRequirements(
    requirements: WorkflowRequirements['mcpServers']
  ): Promise<MCPValidationResult> {
    const result: MCPValidationResult = {
      valid: true,
      errors: [],
      warnings: [],
      availableServers: [],
      missingServers: [],
      missingTools: [],
    };

    for (const requirement of requirements) {
      const { name, tools, optional } = requirement;

      if (!this.config.has(name)) {
        if (optional) {
          result.warnings.push(`Optional MCP server not configured: ${name}`);
        } else {
          result.valid = false;
          result.errors.push(`Required MCP server not configured: ${name}`);
          result.missingServers.push(name);
        }
        continue;
      }

      try {
        const availableTools = await this.listTools(name);
        const availableToolNames = new Set(availableTools.map(t => t.name));

        result.availableServers.push(name);

        for (const tool of tools) {
          if (!availableToolNames.has(tool)) {
            if (optional) {
              result.warnings.push(`Optional tool ${tool} not found on ${name}`);
            } else {
              result.valid = false;
              result.errors.push(`Required tool ${tool} not found on ${name}`);
              result.missingTools.push({ server: name, tool });
            }
          }
        }
      } catch (error) {
        logger.warn(`Could not list tools on ${name}`, { error });
        if (optional) {
          result.warnings.push(`Failed to connect to optional MCP server: ${name}`);
        } else {
          result.valid = false;
          result.errors.push(`Failed to connect to required MCP server: ${name}`);
          result.missingServers.push(name);
        }
      }
    }

    return result;
  }

  /**
   * Connection status of every configured server
   */
  async getHealthStatus(): Promise<MCPServerHealth[]> {
    const health: MCPServerHealth[] = [];

    for (const name of this.config.keys()) {
      try {
        const tools = await this.listTools(name);
        health.push({ name, connected: true, toolCount: tools.length });
      } catch (error) {
        health.push({ name, connected: false, toolCount: 0, error: errorMessage(error) });
      }
    }

    return health;
  }

  /**
   * Disconnect from an MCP server
   */
  async disconnect(serverName: string): Promise<void> {
    const connection = this.connections.get(serverName);
    if (connection?.connected) {
      connection.connected = false;
      try {
        await connection.client.close();
        logger.info(`Disconnected from MCP server: ${serverName}`);
      } catch (error) {
        logger.warn(`Error disconnecting from ${serverName}`, { error });
      }
    }
  }

  /**
   * Disconnect from all MCP servers
   */
  async disconnectAll(): Promise<void> {
    const disconnectPromises = Array.from(this.connections.keys()).map(
      serverName => this.disconnect(serverName)
    );
    await Promise.all(disconnectPromises);
  }

  /**
   * Get list of configured servers
   */
  getConfiguredServers(): string[] {
    return Array.from(this.config.keys());
  }

  /**
   * Check if a server is configured
   */
  hasServer(serverName: string): boolean {
    return this.config.has(serverName);
  }
}
