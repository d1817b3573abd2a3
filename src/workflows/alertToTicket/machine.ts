/**
 * Alert to Ticket state machine
 *
 * Steps form a tagged union; `transition` is the whole routing table and
 * only reads the state the previous step left behind.
 */

import { backoffDelay } from '../../nodes/jira/backoff.js';
import type { WorkflowPolicy } from './config.js';
import type { AlertTicketState } from './state.js';

export type FormattingOutcome = 'success' | 'failure';

export type WorkflowStep =
  | { kind: 'start' }
  | { kind: 'validating' }
  | { kind: 'rejected' }
  | { kind: 'extracting' }
  | { kind: 'checkingCompleteness' }
  | { kind: 'inferring' }
  | { kind: 'creating' }
  | { kind: 'backoffWaiting'; delayMs: number }
  | { kind: 'verifying' }
  | { kind: 'failed'; failedAt: StepKind }
  | { kind: 'formatting'; outcome: FormattingOutcome }
  | { kind: 'end' };

export type StepKind = WorkflowStep['kind'];

const CREATING: WorkflowStep = { kind: 'creating' };
const CHECKING: WorkflowStep = { kind: 'checkingCompleteness' };
const END: WorkflowStep = { kind: 'end' };

export function transition(
  state: AlertTicketState,
  step: WorkflowStep,
  policy: WorkflowPolicy
): WorkflowStep {
  switch (step.kind) {
    case 'start':
      return { kind: 'validating' };

    case 'validating':
      return state.isValidSource ? { kind: 'extracting' } : { kind: 'rejected' };

    case 'rejected':
      return { kind: 'formatting', outcome: 'failure' };

    case 'extracting':
      return state.errorMessage
        ? { kind: 'failed', failedAt: 'extracting' }
        : CHECKING;

    case 'checkingCompleteness':
      if (state.isComplete) {
        return CREATING;
      }
      if (state.inferenceAttempts < policy.maxInferenceAttempts) {
        return { kind: 'inferring' };
      }
      return policy.incompleteTicketPolicy === 'abort'
        ? { kind: 'failed', failedAt: 'checkingCompleteness' }
        : CREATING;

    case 'inferring':
      return CHECKING;

    case 'creating':
      if (state.jiraTicketId) {
        return { kind: 'verifying' };
      }
      if (state.creationFailure === 'transient' && !state.errorMessage) {
        return { kind: 'backoffWaiting', delayMs: backoffDelay(state.retryCount, policy) };
      }
      return { kind: 'failed', failedAt: 'creating' };

    case 'backoffWaiting':
      return CREATING;

    // Verification problems are reported, never retried
    case 'verifying':
      return { kind: 'formatting', outcome: 'success' };

    case 'failed':
      return { kind: 'formatting', outcome: 'failure' };

    case 'formatting':
    case 'end':
      return END;
  }
}

/**
 * Most transitions a run can take to reach `end`:
 * start, validating, extracting and checking lead into creating (4), each
 * inference cycle and each retry add two, and creating exits through
 * verifying or failed into formatting and end (3).
 */
export function transitionBudget(policy: WorkflowPolicy): number {
  return 7 + 2 * policy.maxInferenceAttempts + 2 * policy.maxCreateRetries;
}
