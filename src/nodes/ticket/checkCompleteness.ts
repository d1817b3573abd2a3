/**
 * Decide whether extracted ticket fields meet the minimum for a Jira ticket
 */

import type { TicketField, TicketInfo } from '../../types/services.js';
import type { WorkflowPolicy } from '../../workflows/alertToTicket/config.js';
import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { logger } from '../../utils/logger.js';

/**
 * Labels satisfy the requirement when every group has a member among them.
 * Without groups, any label will do.
 */
export function hasRequiredLabels(
  labels: readonly string[],
  requiredLabelGroups: readonly (readonly string[])[]
): boolean {
  if (requiredLabelGroups.length === 0) {
    return labels.length > 0;
  }
  const present = new Set(labels.map(label => label.toLowerCase()));
  return requiredLabelGroups.every(group => group.some(label => present.has(label.toLowerCase())));
}

export function findMissingFields(
  ticket: TicketInfo,
  requiredLabelGroups: readonly (readonly string[])[]
): TicketField[] {
  const missing: TicketField[] = [];
  if (!ticket.title.trim()) missing.push('title');
  if (!ticket.description.trim()) missing.push('description');
  if (!hasRequiredLabels(ticket.labels, requiredLabelGroups)) missing.push('labels');
  return missing;
}

export function checkCompletenessNode(state: AlertTicketState, policy: WorkflowPolicy): StateUpdate {
  const missingFields = findMissingFields(state.ticketInfo, policy.requiredLabelGroups);
  const isComplete = missingFields.length === 0;

  logger.info('Checked ticket completeness', {
    runId: state.runId,
    isComplete,
    missingFields,
    inferenceAttempts: state.inferenceAttempts,
  });

  return { isComplete, missingFields };
}
