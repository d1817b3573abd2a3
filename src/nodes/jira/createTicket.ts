/**
 * Create the Jira ticket, classifying failures for the retry loop
 */

import type { TicketSystemClient } from '../../types/services.js';
import type { WorkflowPolicy } from '../../workflows/alertToTicket/config.js';
import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import {
  MCPClientError,
  TicketSystemError,
  TimeoutError,
  errorMessage,
  type TicketFailureKind,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { classifyClientError } from '../../utils/mcpClient.js';
import { withTimeout } from '../../utils/timeout.js';

export interface TicketDependencies {
  tickets: TicketSystemClient;
  policy: WorkflowPolicy;
}

/**
 * Transport trouble and timeouts may pass; a rejected request and anything
 * unrecognised is treated as one the ticket system will keep refusing.
 */
export function classifyCreationFailure(error: unknown): TicketFailureKind {
  if (error instanceof TicketSystemError) return error.kind;
  if (error instanceof MCPClientError) return classifyClientError(error);
  if (error instanceof TimeoutError) return 'transient';
  return 'permanent';
}

export async function createTicketNode(
  state: AlertTicketState,
  deps: TicketDependencies
): Promise<StateUpdate> {
  const { policy, tickets } = deps;

  try {
    logger.info('Creating Jira ticket', {
      runId: state.runId,
      client: tickets.name,
      attempt: state.retryCount + 1,
      projectKey: policy.projectKey,
    });

    const created = await withTimeout(
      tickets.create({
        ...state.ticketInfo,
        projectKey: policy.projectKey,
        issueType: policy.issueType,
      }),
      policy.serviceTimeoutMs,
      'Ticket creation'
    );

    if (!created.id) {
      throw new TicketSystemError('Ticket system answered without a ticket id', 'permanent');
    }

    logger.info('Jira ticket created', {
      runId: state.runId,
      ticketId: created.id,
      retries: state.retryCount,
    });

    return {
      jiraTicketId: created.id,
      jiraTicketUrl: created.url,
      creationFailure: null,
    };
  } catch (error) {
    const kind = classifyCreationFailure(error);
    const reason = errorMessage(error);
    const errors = [...state.errors, { step: 'creating', error: `${kind}: ${reason}` }];

    if (kind === 'transient' && state.retryCount < policy.maxCreateRetries) {
      logger.warn('Ticket creation failed, retrying', {
        runId: state.runId,
        retry: state.retryCount + 1,
        maxRetries: policy.maxCreateRetries,
        error: reason,
      });

      return {
        retryCount: state.retryCount + 1,
        creationFailure: 'transient',
        errors,
      };
    }

    const message =
      kind === 'transient'
        ? `Ticket creation failed after ${policy.maxCreateRetries} retries: ${reason}`
        : `Ticket creation was rejected: ${reason}`;

    logger.error('Ticket creation failed', { runId: state.runId, kind, error: reason });

    return {
      creationFailure: kind,
      errorMessage: message,
      errors,
    };
  }
}
