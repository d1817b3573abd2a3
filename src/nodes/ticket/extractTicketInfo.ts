/**
 * Extract structured ticket fields from the raw alert using the extraction service
 */

import type { ExtractionRequest, ExtractionService, TicketInfo } from '../../types/services.js';
import type { WorkflowPolicy } from '../../workflows/alertToTicket/config.js';
import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { parseExtractedTicket } from '../../schemas/ticket.js';
import { ExtractionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import { parseAlert } from '../alert/parseAlert.js';

export interface ExtractionDependencies {
  extraction: ExtractionService;
  policy: WorkflowPolicy;
}

/**
 * Call the service under the policy timeout and validate what comes back
 */
export async function requestTicketFields(
  request: ExtractionRequest,
  deps: ExtractionDependencies
): Promise<TicketInfo> {
  const raw = await withTimeout(
    deps.extraction.extract(request),
    deps.policy.serviceTimeoutMs,
    `Extraction with ${deps.extraction.name}`
  );

  const parsed = parseExtractedTicket(raw);
  if (!parsed.ok) {
    throw new ExtractionError(`Extraction returned an invalid ticket (${parsed.error})`, 'malformed');
  }
  return parsed.ticket;
}

export async function extractTicketInfoNode(
  state: AlertTicketState,
  deps: ExtractionDependencies
): Promise<StateUpdate> {
  try {
    logger.info('Extracting ticket information', {
      runId: state.runId,
      service: deps.extraction.name,
    });

    const ticketInfo = await requestTicketFields(
      { rawMessage: state.rawMessage, alert: parseAlert(state.rawMessage) },
      deps
    );

    logger.info('Ticket information extracted', {
      runId: state.runId,
      title: ticketInfo.title.slice(0, 50),
      labels: ticketInfo.labels,
    });

    return { ticketInfo };
  } catch (error) {
    logger.error('Failed to extract ticket information', { runId: state.runId, error });

    return {
      errorMessage: `Failed to extract ticket information: ${errorMessage(error)}`,
      errors: [
        ...state.errors,
        {
          step: 'extracting',
          error: errorMessage(error),
        },
      ],
    };
  }
}
