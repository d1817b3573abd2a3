/**
 * Record where a run stopped before its failure is formatted
 */

import type { WorkflowPolicy } from '../../workflows/alertToTicket/config.js';
import type { StepKind } from '../../workflows/alertToTicket/machine.js';
import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { logger } from '../../utils/logger.js';

function describeFailure(state: AlertTicketState, failedAt: StepKind, policy: WorkflowPolicy): string {
  if (failedAt === 'checkingCompleteness') {
    return (
      `Ticket information still incomplete after ${state.inferenceAttempts} of ` +
      `${policy.maxInferenceAttempts} inference attempts (missing: ${state.missingFields.join(', ')})`
    );
  }
  return `Workflow stopped at ${failedAt}`;
}

export function failRunNode(
  state: AlertTicketState,
  failedAt: StepKind,
  policy: WorkflowPolicy
): StateUpdate {
  const message = state.errorMessage || describeFailure(state, failedAt, policy);

  logger.error('Run failed', { runId: state.runId, failedAt, error: message });

  return {
    failedStep: failedAt,
    errorMessage: message,
  };
}
