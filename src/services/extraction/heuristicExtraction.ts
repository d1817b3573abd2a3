/**
 * Deterministic extraction without a language model.
 * Used when no OpenAI key is configured, and for offline evaluation.
 */

import type { ExtractionRequest, ExtractionService, ParsedAlert } from '../../types/services.js';
import { TITLE_MAX_LENGTH, type ExtractedTicket } from '../../schemas/ticket.js';
import { describeError, serviceFromCondition } from '../../nodes/alert/parseAlert.js';

export interface HeuristicExtractionOptions {
  /** Always added to the labels */
  defaultLabels?: string[];
}

export function buildTitle(alert: ParsedAlert): string {
  const described = describeError(alert.errorMessage);
  const title = described
    ? `${described.type}: ${described.detail}`
    : alert.errorMessage || (alert.issueId ? `Alert on issue ${alert.issueId}` : '');
  return title.slice(0, TITLE_MAX_LENGTH);
}

export function buildDescription(alert: ParsedAlert): string {
  const sections: Array<[string, string]> = [
    ['Error', alert.errorMessage],
    ['Stack Trace', alert.stackTrace],
    ['Trigger Condition', alert.condition],
    ['Issue', alert.issueId],
  ];

  return sections
    .filter(([, body]) => body)
    .map(([heading, body]) => `## ${heading}\n${body}`)
    .join('\n\n');
}

export function buildLabels(alert: ParsedAlert, defaultLabels: readonly string[]): string[] {
  const service = serviceFromCondition(alert.condition);
  return service ? [...defaultLabels, service] : [...defaultLabels];
}

export class HeuristicExtractionService implements ExtractionService {
  readonly name = 'heuristic';
  private readonly defaultLabels: string[];

  constructor(options: HeuristicExtractionOptions = {}) {
    this.defaultLabels = options.defaultLabels ?? ['bug'];
  }

  async extract(request: ExtractionRequest): Promise<ExtractedTicket> {
    const { alert, partial, missingFields } = request;
    const extracted: ExtractedTicket = {
      title: buildTitle(alert),
      description: buildDescription(alert),
      labels: buildLabels(alert, this.defaultLabels),
    };

    if (!partial) {
      return extracted;
    }

    // Fill-missing mode: keep what the caller already has
    const missing = missingFields ?? [];
    return {
      title: missing.includes('title') ? extracted.title : partial.title,
      description: missing.includes('description') ? extracted.description : partial.description,
      labels: missing.includes('labels') ? [...partial.labels, ...extracted.labels] : partial.labels,
    };
  }
}
