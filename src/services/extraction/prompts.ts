/**
 * Prompts for the LLM extraction service
 */

import type { ExtractionRequest, TicketField } from '../../types/services.js';

export const EXTRACTION_SYSTEM_PROMPT = `You turn monitoring alerts into Jira bug tickets.

Rules:
- title: concise (at most 100 characters), names the error type and what failed
- description: the full error message, the relevant stack trace lines and the trigger condition
- labels: always include 'bug' and the affected platform (for example 'mobile'), plus any other relevant labels

Format the description with these sections:
## Error
[error message]

## Stack Trace
[relevant stack trace lines]

## Trigger Condition
[what triggered the alert]

Leave a field empty rather than inventing details the alert does not contain.`;

export const INFERENCE_SYSTEM_PROMPT = `You complete Jira bug tickets created from monitoring alerts.

Only the fields listed as missing need values. Base every value on the raw alert.
- title: descriptive, names the error, at most 100 characters
- description: structured with ## Error, ## Stack Trace and ## Trigger Condition sections
- labels: must include 'bug' and the affected platform (for example 'mobile')

Repeat the existing values unchanged for fields that are not missing.`;

export function buildExtractionPrompt(request: ExtractionRequest): string {
  const { alert } = request;
  return `Extract ticket information from this alert:

Issue ID: ${alert.issueId || '(unknown)'}
Error: ${alert.errorMessage || '(not found)'}
Stack Trace:
${alert.stackTrace || '(none)'}

Condition: ${alert.condition || '(not found)'}

Raw Message:
${request.rawMessage}`;
}

function describeField(field: TicketField): string {
  switch (field) {
    case 'title':
      return 'title (empty)';
    case 'description':
      return 'description (empty)';
    case 'labels':
      return 'labels (required category labels absent)';
  }
}

export function buildInferencePrompt(request: ExtractionRequest): string {
  const partial = request.partial;
  const missing = request.missingFields ?? [];

  return `Complete this ticket.

Missing: ${missing.map(describeField).join(', ') || '(none)'}

Current Title: ${partial?.title ?? ''}
Current Description: ${partial?.description ?? ''}
Current Labels: ${partial?.labels.join(', ') ?? ''}

Raw Alert:
${request.rawMessage}`;
}
