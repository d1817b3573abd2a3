/**
 * Decide whether an inbound message is a monitoring alert from the expected channel
 */

import type { WorkflowPolicy } from '../../workflows/alertToTicket/config.js';
import type { AlertSource, AlertTicketState, StateUpdate } from '../../workflows/alertToTicket/state.js';
import { logger } from '../../utils/logger.js';

export interface SourceCheck {
  source: AlertSource;
  channelValid: boolean;
  sourceValid: boolean;
  isValid: boolean;
}

export function normalizeChannel(channel: string): string {
  return channel.trim().replace(/^#/, '');
}

export function detectSource(rawMessage: string, markers: readonly string[]): AlertSource {
  const haystack = rawMessage.toLowerCase();
  return markers.some(marker => haystack.includes(marker.toLowerCase())) ? 'datadog' : 'unknown';
}

export function checkSource(
  rawMessage: string,
  channel: string,
  policy: Pick<WorkflowPolicy, 'monitoringChannel' | 'sourceMarkers'>
): SourceCheck {
  const source = detectSource(rawMessage, policy.sourceMarkers);
  const channelValid = normalizeChannel(channel) === normalizeChannel(policy.monitoringChannel);
  const sourceValid = source !== 'unknown';

  return {
    source,
    channelValid,
    sourceValid,
    isValid: channelValid && sourceValid,
  };
}

export function validateSourceNode(state: AlertTicketState, policy: WorkflowPolicy): StateUpdate {
  const check = checkSource(state.rawMessage, state.channel, policy);

  logger.info('Validated message source', {
    runId: state.runId,
    source: check.source,
    channelValid: check.channelValid,
    sourceValid: check.sourceValid,
  });

  return {
    source: check.source,
    isValidSource: check.isValid,
  };
}

/**
 * Record why the message was turned away
 */
export function rejectSourceNode(state: AlertTicketState, policy: WorkflowPolicy): StateUpdate {
  const check = checkSource(state.rawMessage, state.channel, policy);
  const reasons: string[] = [];

  if (!check.channelValid) {
    reasons.push(
      `channel '${state.channel}' is not the monitoring channel '${policy.monitoringChannel}'`
    );
  }
  if (!check.sourceValid) {
    reasons.push('no monitoring alert marker found in the message');
  }

  const message = `Invalid source: ${reasons.join('; ')}`;
  logger.warn('Rejected message', { runId: state.runId, reasons });

  return {
    errorMessage: message,
    failedStep: 'rejected',
  };
}
