/**
 * Custom error types for alert-to-ticket workflows
 */

/**
 * Base error class for all workflow-related errors
 */
export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly workflowId?: string,
    public readonly step?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'WorkflowError';
    Object.setPrototypeOf(this, WorkflowError.prototype);
  }
}

/**
 * Error thrown when workflow requirements are not met
 */
export class RequirementError extends WorkflowError {
  constructor(
    message: string,
    public readonly missingRequirements: string[],
    workflowId?: string
  ) {
    super(message, workflowId);
    this.name = 'RequirementError';
    Object.setPrototypeOf(this, RequirementError.prototype);
  }
}

/**
 * Error thrown when an individual workflow node fails unexpectedly
 */
export class NodeError extends WorkflowError {
  constructor(
    message: string,
    step: string,
    cause?: unknown,
    workflowId?: string
  ) {
    super(message, workflowId, step, { cause });
    this.name = 'NodeError';
    Object.setPrototypeOf(this, NodeError.prototype);
  }
}

export type ExtractionFailureReason = 'malformed' | 'timeout' | 'unavailable';

/**
 * Error raised by an extraction service, or by the boundary check on its output
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly reason: ExtractionFailureReason,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ExtractionError';
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

export type TicketFailureKind = 'transient' | 'permanent';

/**
 * Error raised by a ticket system client.
 * Transient failures (network, 5xx, timeouts) may be retried; permanent ones may not.
 */
export class TicketSystemError extends Error {
  constructor(
    message: string,
    public readonly kind: TicketFailureKind,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'TicketSystemError';
    Object.setPrototypeOf(this, TicketSystemError.prototype);
  }
}

/**
 * Error thrown when an external call does not settle in time
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when environment configuration cannot be parsed
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown when MCP client operations fail
 */
export class MCPClientError extends Error {
  constructor(
    message: string,
    public readonly serverName?: string,
    public readonly toolName?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'MCPClientError';
    Object.setPrototypeOf(this, MCPClientError.prototype);
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
