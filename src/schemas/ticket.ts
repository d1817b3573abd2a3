/**
 * Boundary schema for extraction output
 */

import { z } from 'zod';
import type { TicketInfo } from '../types/services.js';

export const ExtractedTicketSchema = z.object({
  title: z
    .string()
    .describe('A concise title for the Jira ticket (max 100 chars) naming the error'),
  description: z
    .string()
    .describe('Full description including the error, relevant stack trace and trigger condition'),
  labels: z
    .array(z.string())
    .describe("Labels for the ticket, e.g. 'bug' and the affected platform such as 'mobile'"),
});

export type ExtractedTicket = z.infer<typeof ExtractedTicketSchema>;

export const TITLE_MAX_LENGTH = 100;

export const EMPTY_TICKET: Readonly<TicketInfo> = Object.freeze({
  title: '',
  description: '',
  labels: [],
});

/**
 * Lower-case, hyphenate inner whitespace, drop blanks and duplicates (first one wins)
 */
export function normalizeLabels(labels: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const label of labels) {
    const normalized = label.trim().toLowerCase().replace(/\s+/g, '-');
    if (normalized) {
      seen.add(normalized);
    }
  }
  return Array.from(seen);
}

export function normalizeTicket(ticket: ExtractedTicket): TicketInfo {
  return {
    title: ticket.title.trim().slice(0, TITLE_MAX_LENGTH),
    description: ticket.description.trim(),
    labels: normalizeLabels(ticket.labels),
  };
}

/**
 * Validate an untrusted extraction answer and normalize it.
 * Returns the zod error message on failure.
 */
export function parseExtractedTicket(
  raw: unknown
): { ok: true; ticket: TicketInfo } | { ok: false; error: string } {
  const parsed = ExtractedTicketSchema.safeParse(raw);
  if (!parsed.success) {
    const error = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error };
  }
  return { ok: true, ticket: normalizeTicket(parsed.data) };
}
