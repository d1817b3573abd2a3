/**
 * Ask the extraction service again, this time only for the fields still missing
 */

import type { TicketField, TicketInfo } from '../../types/services.js';
import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { normalizeLabels } from '../../schemas/ticket.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseAlert } from '../alert/parseAlert.js';
import { requestTicketFields, type ExtractionDependencies } from './extractTicketInfo.js';

/**
 * Take inferred values for missing fields only; labels are merged as a set
 */
export function mergeMissingFields(
  current: TicketInfo,
  inferred: TicketInfo,
  missingFields: readonly TicketField[]
): TicketInfo {
  return {
    title: missingFields.includes('title') && inferred.title ? inferred.title : current.title,
    description:
      missingFields.includes('description') && inferred.description
        ? inferred.description
        : current.description,
    labels: missingFields.includes('labels')
      ? normalizeLabels([...current.labels, ...inferred.labels])
      : current.labels,
  };
}

export async function inferMissingInfoNode(
  state: AlertTicketState,
  deps: ExtractionDependencies
): Promise<StateUpdate> {
  // Counts whether or not the call succeeds; this is what bounds the loop
  const inferenceAttempts = state.inferenceAttempts + 1;

  try {
    logger.info('Inferring missing ticket fields', {
      runId: state.runId,
      attempt: inferenceAttempts,
      missingFields: state.missingFields,
    });

    const inferred = await requestTicketFields(
      {
        rawMessage: state.rawMessage,
        alert: parseAlert(state.rawMessage),
        partial: state.ticketInfo,
        missingFields: state.missingFields,
      },
      deps
    );

    const ticketInfo = mergeMissingFields(state.ticketInfo, inferred, state.missingFields);

    logger.info('Inference finished', {
      runId: state.runId,
      attempt: inferenceAttempts,
      labels: ticketInfo.labels,
    });

    return { ticketInfo, inferenceAttempts };
  } catch (error) {
    // Not fatal: the completeness check runs again on the unchanged fields
    logger.warn('Inference attempt failed', {
      runId: state.runId,
      attempt: inferenceAttempts,
      error,
    });

    return {
      inferenceAttempts,
      errors: [
        ...state.errors,
        {
          step: 'inferring',
          error: errorMessage(error),
        },
      ],
    };
  }
}
