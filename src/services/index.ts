/**
 * Picks the collaborators for the workflow from the environment
 */

import type { ExtractionService, TicketSystemClient } from '../types/services.js';
import type { WorkflowRequirements } from '../types/workflow.js';
import type { MCPClientManager } from '../utils/mcpClient.js';
import { logger } from '../utils/logger.js';
import { buildRequirements, type WorkflowPolicy } from '../workflows/alertToTicket/config.js';
import { HeuristicExtractionService } from './extraction/heuristicExtraction.js';
import { DEFAULT_OPENAI_MODEL, OpenAIExtractionService } from './extraction/openaiExtraction.js';
import { InMemoryJiraClient } from './jira/inMemoryJiraClient.js';
import { DEFAULT_JIRA_TOOLS, McpJiraClient } from './jira/mcpJiraClient.js';

export interface Services {
  extraction: ExtractionService;
  tickets: TicketSystemClient;
  requirements: WorkflowRequirements;
}

export function createExtractionService(env: NodeJS.ProcessEnv, policy: WorkflowPolicy): ExtractionService {
  if (env.OPENAI_API_KEY) {
    return new OpenAIExtractionService({
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL || DEFAULT_OPENAI_MODEL,
      timeoutMs: policy.serviceTimeoutMs,
    });
  }

  logger.warn('OPENAI_API_KEY not set, using heuristic extraction');
  return new HeuristicExtractionService();
}

export function createServices(
  env: NodeJS.ProcessEnv,
  policy: WorkflowPolicy,
  mcpManager: Pick<MCPClientManager, 'hasServer' | 'callTool'>
): Services {
  const extraction = createExtractionService(env, policy);
  const jiraServer = env.JIRA_MCP_SERVER || 'jira';
  const environment = env.OPENAI_API_KEY ? ['OPENAI_API_KEY'] : [];

  if (!mcpManager.hasServer(jiraServer)) {
    logger.warn(`MCP server '${jiraServer}' not configured, tickets are kept in memory`);
    return {
      extraction,
      tickets: new InMemoryJiraClient({ baseUrl: env.JIRA_BASE_URL || undefined }),
      requirements: buildRequirements({ environment }),
    };
  }

  const createTool = env.JIRA_CREATE_TOOL || DEFAULT_JIRA_TOOLS.createTool;
  const getTool = env.JIRA_GET_TOOL || DEFAULT_JIRA_TOOLS.getTool;
  const tickets = new McpJiraClient(mcpManager, {
    server: jiraServer,
    createTool,
    getTool,
    baseUrl: env.JIRA_BASE_URL || 'https://jira.example.com',
  });

  logger.info(`Using ${extraction.name} extraction and Jira via MCP server '${jiraServer}'`);
  return {
    extraction,
    tickets,
    requirements: buildRequirements({
      jira: { server: jiraServer, tools: [createTool, getTool] },
      environment,
    }),
  };
}
