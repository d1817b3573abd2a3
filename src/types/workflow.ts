/**
 * Core workflow type definitions
 */

/**
 * JSON Schema type for tool inputs/outputs
 */
export interface JSONSchema {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * Requirements for a workflow to execute
 */
export interface WorkflowRequirements {
  mcpServers: Array<{
    name: string;
    tools: string[];
    optional?: boolean;
  }>;
  environment?: string[];
}

export interface StepError {
  step: string;
  error: string;
}

/**
 * Completed workflow response
 */
export interface CompletedWorkflowResult<T = unknown> {
  status: 'completed';
  success: boolean;
  workflowId: string;
  completedSteps: string[];
  failedStep?: string;
  summary: string;
  data?: T;
  error?: string;
  errors?: StepError[];
}

/**
 * Complete workflow definition.
 * Collaborators are bound when the definition is built, so `execute` only
 * takes the tool arguments.
 */
export interface WorkflowDefinition<T = unknown> {
  id: string;
  name: string;
  description: string;
  version: string;
  requirements: WorkflowRequirements;
  inputSchema: JSONSchema;
  outputSchema?: JSONSchema;
  execute: (args: Record<string, unknown>) => Promise<CompletedWorkflowResult<T>>;
}

/**
 * Base interface for workflow state
 * All workflow states should extend this
 */
export interface BaseWorkflowState {
  currentStep: string;
  completedSteps: string[];
  failedStep?: string;
  errors: StepError[];
}
