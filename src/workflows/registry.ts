/**
 * Workflow Registry
 * Workflows registered here are exposed as MCP tools by the server
 */

import type { JSONSchema, WorkflowDefinition } from '../types/workflow.js';
import { logger } from '../utils/logger.js';

export interface MCPToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

export class WorkflowRegistry {
  private workflows: Map<string, WorkflowDefinition> = new Map();

  register(workflow: WorkflowDefinition): void {
    if (this.workflows.has(workflow.id)) {
      logger.warn(`Workflow ${workflow.id} is already registered, overwriting`);
    }

    this.workflows.set(workflow.id, workflow);
    logger.info(`Registered workflow: ${workflow.id} (${workflow.name} v${workflow.version})`);
  }

  get(id: string): WorkflowDefinition | undefined {
    return this.workflows.get(id);
  }

  has(id: string): boolean {
    return this.workflows.has(id);
  }

  list(): WorkflowDefinition[] {
    return Array.from(this.workflows.values());
  }

  getIds(): string[] {
    return Array.from(this.workflows.keys());
  }

  unregister(id: string): boolean {
    const deleted = this.workflows.delete(id);
    if (deleted) {
      logger.info(`Unregistered workflow: ${id}`);
    }
    return deleted;
  }

  count(): number {
    return this.workflows.size;
  }

  /**
   * One tool per workflow, named after the workflow id
   */
  toMCPTools(): MCPToolDefinition[] {
    return this.list().map(workflow => ({
      name: workflow.id,
      description: `${workflow.name} - ${workflow.description}`,
      inputSchema: workflow.inputSchema,
    }));
  }
}

export const workflowRegistry = new WorkflowRegistry();
