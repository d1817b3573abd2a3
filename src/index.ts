#!/usr/bin/env node

/**
 * Alert Ticket MCP Server
 * Exposes the alert-to-ticket workflow as an MCP tool over stdio
 */

import './config.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { workflowRegistry, type MCPToolDefinition } from './workflows/registry.js';
import { createAlertToTicketWorkflow } from './workflows/alertToTicket/workflow.js';
import { loadPolicy } from './workflows/alertToTicket/config.js';
import { createServices } from './services/index.js';
import { MCPClientManager } from './utils/mcpClient.js';
import { validateWorkflowRequirements, formatValidationResult } from './utils/requirements.js';
import { formatHealthReport, formatWorkflowResult } from './utils/formatWorkflowResult.js';
import { logger } from './utils/logger.js';
import { RequirementError, errorMessage } from './utils/errors.js';

const HEALTH_CHECK_TOOL = 'health_check';

const mcpClientManager = new MCPClientManager();

const server = new Server(
  {
    name: 'alert-ticket-workflow',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

/**
 * Tools are generated from registered workflows, plus the health check
 */
server.setRequestHandler(ListToolsRequestSchema, async () => {
  const workflowTools = workflowRegistry.toMCPTools();

  const tools: MCPToolDefinition[] = [
    {
      name: HEALTH_CHECK_TOOL,
      description: 'Report the connection status of configured MCP servers and the registered workflows',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    ...workflowTools,
  ];

  logger.debug(`Listing ${tools.length} tools (${workflowTools.length} workflows + 1 system tool)`);
  return { tools };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    if (name === HEALTH_CHECK_TOOL) {
      logger.info('health_check tool called');
      const health = await mcpClientManager.getHealthStatus();

      return {
        content: [
          {
            type: 'text',
            text: formatHealthReport(health, workflowRegistry.count()),
          },
        ],
      };
    }

    const workflow = workflowRegistry.get(name);
    if (!workflow) {
      throw new McpError(
        ErrorCode.MethodNotFound,
        `Unknown tool: ${name}. Available workflows: ${workflowRegistry.getIds().join(', ')}`
      );
    }

    logger.info(`Executing workflow: ${workflow.id}`, { name: workflow.name });

    const validation = await validateWorkflowRequirements(workflow, mcpClientManager);
    if (!validation.valid) {
      throw new RequirementError(
        `Workflow ${workflow.id} requirements not met:\n${formatValidationResult(validation)}`,
        validation.errors,
        workflow.id
      );
    }

    const result = await workflow.execute(args ?? {});

    logger.info('Workflow completed', {
      workflow: workflow.id,
      success: result.success,
    });

    return {
      content: [
        {
          type: 'text',
          text: formatWorkflowResult(workflow, result),
        },
      ],
    };
  } catch (error) {
    if (error instanceof McpError) {
      throw error;
    }

    if (error instanceof ZodError) {
      throw new McpError(
        ErrorCode.InvalidParams,
        `Invalid arguments for ${name}: ${error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }

    if (error instanceof RequirementError) {
      throw new McpError(ErrorCode.InvalidRequest, error.message);
    }

    logger.error('Tool execution failed', { tool: name, error });

    throw new McpError(
      ErrorCode.InternalError,
      `Tool execution failed: ${errorMessage(error)}`
    );
  }
});

async function main() {
  logger.info('Starting alert ticket MCP server');

  const policy = loadPolicy();
  const services = createServices(process.env, policy, mcpClientManager);

  workflowRegistry.register(
    createAlertToTicketWorkflow(
      { extraction: services.extraction, tickets: services.tickets, policy },
      services.requirements
    )
  );

  logger.info(`Configured MCP servers: ${mcpClientManager.getConfiguredServers().join(', ') || 'none'}`);
  logger.info(`Registered workflows: ${workflowRegistry.count()}`);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Alert ticket MCP server running on stdio');
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down`);
  await mcpClientManager.disconnectAll();
  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

main().catch((error) => {
  logger.error('Fatal error in main()', { error });
  process.exit(1);
});
