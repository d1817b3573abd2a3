/**
 * Alert to Ticket Workflow
 * Validates a monitoring alert, extracts and repairs ticket fields, creates the
 * Jira ticket with bounded retries, verifies it and reports the outcome.
 */

import { v4 as uuidv4 } from 'uuid';
import type { CompletedWorkflowResult, WorkflowDefinition, WorkflowRequirements } from '../../types/workflow.js';
import type { ExtractionService, TicketInfo, TicketSystemClient } from '../../types/services.js';
import { NodeError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/timeout.js';
import {
  AlertInputSchema,
  inputSchema,
  outputSchema,
  type AlertInput,
  type WorkflowPolicy,
} from './config.js';
import { createInitialState, type AlertTicketState, type StateUpdate } from './state.js';
import { transition, transitionBudget, type WorkflowStep } from './machine.js';

// Import nodes
import { rejectSourceNode, validateSourceNode } from '../../nodes/alert/validateSource.js';
import { extractTicketInfoNode } from '../../nodes/ticket/extractTicketInfo.js';
import { checkCompletenessNode } from '../../nodes/ticket/checkCompleteness.js';
import { inferMissingInfoNode } from '../../nodes/ticket/inferMissingInfo.js';
import { createTicketNode } from '../../nodes/jira/createTicket.js';
import { verifyTicketNode } from '../../nodes/jira/verifyTicket.js';
import { failRunNode } from '../../nodes/response/failRun.js';
import { formatResponseNode } from '../../nodes/response/formatResponse.js';

export const WORKFLOW_ID = 'alert_to_ticket';

export interface AlertToTicketDependencies {
  extraction: ExtractionService;
  tickets: TicketSystemClient;
  policy: WorkflowPolicy;
  /** Backoff wait; replaced in tests to record delays */
  sleep?: Sleep;
  runIdFactory?: () => string;
}

export interface AlertToTicketRunResult {
  runId: string;
  finalResponse: string;
  jiraTicketId: string;
  jiraTicketUrl: string;
  errorMessage: string;
  state: AlertTicketState;
}

async function executeStep(
  step: WorkflowStep,
  state: AlertTicketState,
  deps: AlertToTicketDependencies
): Promise<StateUpdate> {
  const { policy } = deps;

  switch (step.kind) {
    case 'validating':
      return validateSourceNode(state, policy);
    case 'rejected':
      return rejectSourceNode(state, policy);
    case 'extracting':
      return extractTicketInfoNode(state, deps);
    case 'checkingCompleteness':
      return checkCompletenessNode(state, policy);
    case 'inferring':
      return inferMissingInfoNode(state, deps);
    case 'creating':
      return createTicketNode(state, deps);
    case 'backoffWaiting':
      logger.info('Waiting before retrying ticket creation', {
        runId: state.runId,
        delayMs: step.delayMs,
        retry: state.retryCount,
      });
      await (deps.sleep ?? defaultSleep)(step.delayMs);
      return {};
    case 'verifying':
      return verifyTicketNode(state, deps);
    case 'failed':
      return failRunNode(state, step.failedAt, policy);
    case 'formatting':
      return formatResponseNode(state, step.outcome);
    case 'start':
    case 'end':
      return {};
  }
}

/**
 * Where to go when a step throws instead of reporting its failure in state
 */
function recoverFrom(step: WorkflowStep): WorkflowStep {
  switch (step.kind) {
    case 'formatting':
      return { kind: 'end' };
    case 'failed':
      return { kind: 'formatting', outcome: 'failure' };
    default:
      return { kind: 'failed', failedAt: step.kind };
  }
}

function applyUpdate(state: AlertTicketState, step: WorkflowStep, update: StateUpdate): AlertTicketState {
  return {
    ...state,
    ...update,
    currentStep: step.kind,
    completedSteps: [...state.completedSteps, step.kind],
  };
}

/**
 * Run one alert through the workflow. Never throws: every failure ends up in
 * `errorMessage` and `finalResponse`.
 */
export async function runAlertToTicket(
  input: AlertInput,
  deps: AlertToTicketDependencies
): Promise<AlertToTicketRunResult> {
  const runId = deps.runIdFactory ? deps.runIdFactory() : uuidv4();
  const budget = transitionBudget(deps.policy);

  let state = createInitialState(input, runId);
  let step: WorkflowStep = { kind: 'start' };
  let transitions = 0;
  let budgetExceeded = false;

  logger.info('Starting alert to ticket run', {
    runId,
    channel: input.channel,
    preview: input.rawMessage.slice(0, 100),
  });

  while (step.kind !== 'end') {
    let next: WorkflowStep;

    try {
      const update = await executeStep(step, state, deps);
      if (step.kind !== 'start') {
        state = applyUpdate(state, step, update);
      }
      next = transition(state, step, deps.policy);
    } catch (error) {
      const failure = new NodeError(
        `Unexpected failure in ${step.kind}: ${errorMessage(error)}`,
        step.kind,
        error,
        WORKFLOW_ID
      );
      logger.error('Step threw', { runId, step: step.kind, error: failure });

      state = applyUpdate(state, step, {
        errorMessage: state.errorMessage || failure.message,
        errors: [...state.errors, { step: step.kind, error: errorMessage(error) }],
      });
      if (step.kind === 'formatting' && !state.finalResponse) {
        state = { ...state, finalResponse: `Failed to create ticket: ${state.errorMessage}` };
      }
      next = recoverFrom(step);
    }

    transitions += 1;
    if (transitions > budget && !budgetExceeded && next.kind !== 'formatting' && next.kind !== 'end') {
      budgetExceeded = true;
      const message = `Workflow exceeded its budget of ${budget} transitions`;
      logger.error(message, { runId, step: next.kind });
      state = { ...state, errorMessage: state.errorMessage || message };
      next = { kind: 'failed', failedAt: step.kind };
    }

    logger.debug('Transition', { runId, from: step.kind, to: next.kind });
    step = next;
  }

  logger.info('Run finished', {
    runId,
    ticketId: state.jiraTicketId || undefined,
    failedStep: state.failedStep,
    inferenceAttempts: state.inferenceAttempts,
    retries: state.retryCount,
  });

  return {
    runId,
    finalResponse: state.finalResponse,
    jiraTicketId: state.jiraTicketId,
    jiraTicketUrl: state.jiraTicketUrl,
    errorMessage: state.errorMessage,
    state,
  };
}

export interface AlertToTicketData {
  runId: string;
  ticketId: string;
  ticketUrl: string;
  verified: boolean;
  ticketInfo: TicketInfo;
  inferenceAttempts: number;
  retryCount: number;
}

export function toWorkflowResult(
  result: AlertToTicketRunResult
): CompletedWorkflowResult<AlertToTicketData> {
  const { state } = result;

  return {
    status: 'completed',
    success: state.jiraTicketId !== '',
    workflowId: WORKFLOW_ID,
    completedSteps: state.completedSteps,
    failedStep: state.failedStep,
    summary: result.finalResponse,
    data: {
      runId: result.runId,
      ticketId: result.jiraTicketId,
      ticketUrl: result.jiraTicketUrl,
      verified: state.verified,
      ticketInfo: state.ticketInfo,
      inferenceAttempts: state.inferenceAttempts,
      retryCount: state.retryCount,
    },
    error: result.errorMessage || undefined,
    errors: state.errors,
  };
}

/**
 * Workflow definition, bound to the collaborators chosen at startup
 */
export function createAlertToTicketWorkflow(
  deps: AlertToTicketDependencies,
  requirements: WorkflowRequirements
): WorkflowDefinition<AlertToTicketData> {
  return {
    id: WORKFLOW_ID,
    name: 'Alert to Jira Ticket',
    description:
      'Validates a monitoring alert posted to the monitoring channel, extracts title, description and labels, fills gaps, creates and verifies a Jira ticket, retrying transient failures with exponential backoff',
    version: '1.0.0',
    requirements,
    inputSchema,
    outputSchema,
    execute: async args => {
      const input = AlertInputSchema.parse(args);
      const result = await runAlertToTicket(input, deps);
      return toWorkflowResult(result);
    },
  };
}
