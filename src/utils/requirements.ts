/**
 * Workflow requirement validation utilities
 */

import type { WorkflowDefinition, WorkflowRequirements } from '../types/workflow.js';
import type { MCPValidationResult } from '../types/mcpConnections.js';
import { logger } from './logger.js';

/**
 * The part of the MCP client manager that checks servers and tools
 */
export interface RequirementValidator {
  validateRequirements(requirements: WorkflowRequirements['mcpServers']): Promise<MCPValidationResult>;
}

/**
 * Validate all requirements for a workflow
 */
export async function validateWorkflowRequirements(
  workflow: WorkflowDefinition,
  validator: RequirementValidator,
  env: NodeJS.ProcessEnv = process.env
): Promise<MCPValidationResult> {
  logger.info(`Validating requirements for workflow: ${workflow.id}`);

  // Validate MCP server requirements
  const mcpValidation = await validator.validateRequirements(
    workflow.requirements.mcpServers
  );

  // Validate environment variables
  const envErrors: string[] = [];
  for (const envVar of workflow.requirements.environment ?? []) {
    if (!env[envVar]) {
      envErrors.push(`Required environment variable not set: ${envVar}`);
    }
  }

  // Combine results
  const result: MCPValidationResult = {
    valid: mcpValidation.valid && envErrors.length === 0,
    errors: [...mcpValidation.errors, ...envErrors],
    warnings: mcpValidation.warnings,
    availableServers: mcpValidation.availableServers,
    missingServers: mcpValidation.missingServers,
    missingTools: mcpValidation.missingTools,
  };

  if (!result.valid) {
    logger.error(`Workflow ${workflow.id} validation failed`, {
      errors: result.errors,
    });
  } else if (result.warnings.length > 0) {
    logger.warn(`Workflow ${workflow.id} has warnings`, {
      warnings: result.warnings,
    });
  } else {
    logger.info(`Workflow ${workflow.id} validation passed`);
  }

  return result;
}

function pushWarnings(lines: string[], warnings: string[]): void {
  if (warnings.length > 0) {
    lines.push('\nWarnings:');
    warnings.forEach(warning => lines.push(`  ⚠ ${warning}`));
  }
}

/**
 * Format validation result as a human-readable message
 */
export function formatValidationResult(result: MCPValidationResult): string {
  const lines: string[] = [];

  if (result.valid) {
    lines.push('✓ All requirements validated successfully');
  } else {
    lines.push('✗ Validation failed\n');
    lines.push('Errors:');
    result.errors.forEach(error => lines.push(`  ✗ ${error}`));
  }
  pushWarnings(lines, result.warnings);

  if (result.availableServers.length > 0) {
    lines.push(`\nAvailable MCP servers: ${result.availableServers.join(', ')}`);
  }

  if (result.missingServers.length > 0) {
    lines.push(`\nMissing MCP servers: ${result.missingServers.join(', ')}`);
  }

  if (result.missingTools.length > 0) {
    lines.push('\nMissing tools:');
    result.missingTools.forEach(({ server, tool }) =>
      lines.push(`  - ${tool} on ${server}`)
    );
  }

  return lines.join('\n');
}
