/**
 * Render the outcome of a run for the person who posted the alert
 */

import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import type { FormattingOutcome } from '../../workflows/alertToTicket/machine.js';

const UNKNOWN_FAILURE = 'Unknown error occurred during ticket creation.';

function formatSuccess(state: AlertTicketState): string {
  const { ticketInfo } = state;
  const lines = [
    'Jira ticket created successfully!',
    '',
    `Ticket: ${state.jiraTicketId}`,
    `URL: ${state.jiraTicketUrl}`,
    `Title: ${ticketInfo.title || '(none)'}`,
    `Labels: ${ticketInfo.labels.length > 0 ? ticketInfo.labels.join(', ') : '(none)'}`,
  ];

  if (!state.isComplete && state.missingFields.length > 0) {
    lines.push('');
    lines.push(
      `Note: created with incomplete information (missing: ${state.missingFields.join(', ')})`
    );
  }

  if (!state.verified && state.errorMessage) {
    lines.push('');
    lines.push(`Warning: ${state.errorMessage}`);
  }

  return lines.join('\n');
}

function formatRejection(state: AlertTicketState): string {
  return [
    `Message rejected: source '${state.source}' from channel '${state.channel}' is not valid.`,
    state.errorMessage || UNKNOWN_FAILURE,
  ].join('\n');
}

function formatFailure(state: AlertTicketState): string {
  const lines = [`Failed to create ticket: ${state.errorMessage || UNKNOWN_FAILURE}`];

  if (state.failedStep) {
    lines.push(`Stopped at: ${state.failedStep}`);
  }
  if (state.retryCount > 0) {
    lines.push(`Creation retries: ${state.retryCount}`);
  }

  return lines.join('\n');
}

export function formatResponse(state: AlertTicketState, outcome: FormattingOutcome): string {
  if (!state.isValidSource) {
    return formatRejection(state);
  }
  if (outcome === 'success' && state.jiraTicketId) {
    return formatSuccess(state);
  }
  return formatFailure(state);
}

export function formatResponseNode(
  state: AlertTicketState,
  outcome: FormattingOutcome
): StateUpdate {
  return { finalResponse: formatResponse(state, outcome) };
}
