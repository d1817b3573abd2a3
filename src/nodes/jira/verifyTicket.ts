/**
 * Confirm the created ticket can be read back
 */

import type { AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/timeout.js';
import type { TicketDependencies } from './createTicket.js';

export async function verifyTicketNode(
  state: AlertTicketState,
  deps: TicketDependencies
): Promise<StateUpdate> {
  const ticketId = state.jiraTicketId;

  try {
    const record = await withTimeout(
      deps.tickets.get(ticketId),
      deps.policy.serviceTimeoutMs,
      'Ticket verification'
    );

    if (record) {
      logger.info('Verified ticket exists', {
        runId: state.runId,
        ticketId,
        status: record.status,
      });
      return { verified: true };
    }

    logger.warn('Created ticket not found on verification', { runId: state.runId, ticketId });

    return {
      verified: false,
      errorMessage: `Ticket ${ticketId} was created but could not be found when verifying it`,
      errors: [...state.errors, { step: 'verifying', error: 'ticket not found' }],
    };
  } catch (error) {
    logger.warn('Ticket verification failed', { runId: state.runId, ticketId, error });

    return {
      verified: false,
      errorMessage: `Ticket ${ticketId} was created but verification failed: ${errorMessage(error)}`,
      errors: [...state.errors, { step: 'verifying', error: errorMessage(error) }],
    };
  }
}
