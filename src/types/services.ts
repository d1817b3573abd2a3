/**
 * Capability interfaces for the collaborators the workflow calls out to.
 * The workflow core depends only on these; concrete implementations are
 * picked at composition time.
 */

export type TicketField = 'title' | 'description' | 'labels';

export interface TicketInfo {
  title: string;
  description: string;
  /** Ordered set, normalized by `normalizeLabels` */
  labels: string[];
}

/**
 * Components of a monitoring alert message
 */
export interface ParsedAlert {
  issueId: string;
  errorMessage: string;
  stackTrace: string;
  condition: string;
}

export interface ExtractionRequest {
  rawMessage: string;
  alert: ParsedAlert;
  /** Present in fill-missing mode */
  partial?: TicketInfo;
  missingFields?: TicketField[];
}

export interface ExtractionService {
  readonly name: string;
  /**
   * Extract ticket fields from an alert. The answer is untrusted: callers
   * validate it against `ExtractedTicketSchema`.
   * Throws ExtractionError when the service times out or is unavailable.
   */
  extract(request: ExtractionRequest): Promise<unknown>;
}

export interface TicketDraft extends TicketInfo {
  projectKey: string;
  issueType: string;
}

export interface CreatedTicket {
  id: string;
  url: string;
}

export interface TicketRecord extends CreatedTicket {
  title: string;
  status: string;
}

export interface TicketSystemClient {
  readonly name: string;
  /** Throws TicketSystemError classified as transient or permanent */
  create(draft: TicketDraft): Promise<CreatedTicket>;
  /** Resolves null when the ticket does not exist */
  get(id: string): Promise<TicketRecord | null>;
}
