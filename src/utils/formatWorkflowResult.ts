/**
 * Text rendering of tool results returned by the MCP server
 */

import type { CompletedWorkflowResult, WorkflowDefinition } from '../types/workflow.js';
import type { MCPServerHealth } from '../types/mcpConnections.js';

/**
 * Format workflow execution result for display
 */
export function formatWorkflowResult(
  workflow: Pick<WorkflowDefinition, 'id' | 'name' | 'version'>,
  result: CompletedWorkflowResult
): string {
  const lines: string[] = [];

  lines.push(`Workflow: ${workflow.name} (${workflow.id})`);
  lines.push(`Version: ${workflow.version}`);
  lines.push('');
  lines.push(result.success ? '✅ Workflow Completed Successfully' : '❌ Workflow Failed');
  lines.push('');
  lines.push(result.summary);

  if (result.completedSteps.length > 0) {
    lines.push('');
    lines.push(`Steps: ${result.completedSteps.join(' → ')}`);
  }

  if (!result.success) {
    if (result.failedStep) {
      lines.push(`✗ Failed at step: ${result.failedStep}`);
    }

    if (result.errors && result.errors.length > 0) {
      lines.push('');
      lines.push('Errors:');
      result.errors.forEach(err => lines.push(`  [${err.step}] ${err.error}`));
    }
  }

  return lines.join('\n');
}

export function formatHealthReport(
  health: MCPServerHealth[],
  workflowCount: number
): string {
  const lines = ['Alert ticket MCP server is running.', '', `Configured MCP servers: ${health.length}`];

  if (health.length > 0) {
    lines.push('');
    lines.push('MCP Server Health:');
    for (const server of health) {
      const status = server.connected ? '✅' : '❌';
      const details = server.connected
        ? `${server.toolCount} tools available`
        : `Error: ${server.error ?? 'unknown'}`;
      lines.push(`  ${status} ${server.name}: ${details}`);
    }
  }

  lines.push('');
  lines.push(`Registered workflows: ${workflowCount}`);
  return lines.join('\n');
}
