/**
 * Alert to Ticket Workflow State
 * One record per run, owned by the orchestrator and replaced after every step
 */

import type { BaseWorkflowState } from '../../types/workflow.js';
import type { TicketField, TicketInfo } from '../../types/services.js';
import type { TicketFailureKind } from '../../utils/errors.js';
import { EMPTY_TICKET } from '../../schemas/ticket.js';
import type { AlertInput } from './config.js';

export type AlertSource = 'datadog' | 'unknown';

export interface AlertTicketState extends BaseWorkflowState {
  // Input
  readonly runId: string;
  readonly rawMessage: string;
  readonly channel: string;

  // Source validation
  source: AlertSource;
  isValidSource: boolean;

  // Extraction and completeness repair
  ticketInfo: TicketInfo;
  isComplete: boolean;
  missingFields: TicketField[];
  inferenceAttempts: number;

  // Ticket creation and verification
  jiraTicketId: string;
  jiraTicketUrl: string;
  retryCount: number;
  creationFailure: TicketFailureKind | null;
  verified: boolean;

  // Outcome
  errorMessage: string;
  finalResponse: string;
}

/**
 * What a step may hand back; the inputs are fixed for the run
 */
export type StateUpdate = Partial<Omit<AlertTicketState, 'runId' | 'rawMessage' | 'channel'>>;

export function createInitialState(input: AlertInput, runId: string): AlertTicketState {
  return {
    runId,
    rawMessage: input.rawMessage,
    channel: input.channel,
    currentStep: 'start',
    completedSteps: [],
    errors: [],
    source: 'unknown',
    isValidSource: false,
    ticketInfo: { ...EMPTY_TICKET, labels: [] },
    isComplete: false,
    missingFields: [],
    inferenceAttempts: 0,
    jiraTicketId: '',
    jiraTicketUrl: '',
    retryCount: 0,
    creationFailure: null,
    verified: false,
    errorMessage: '',
    finalResponse: '',
  };
}
