/**
 * Ticket store kept in process memory.
 * Stands in for Jira when no MCP server is configured, and in tests.
 */

import type {
  CreatedTicket,
  TicketDraft,
  TicketRecord,
  TicketSystemClient,
} from '../../types/services.js';
import { TicketSystemError, type TicketFailureKind } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface InMemoryJiraClientOptions {
  baseUrl?: string;
  /** Consumed one per create call before any ticket is stored */
  failures?: TicketFailureKind[];
  /** Probability (0..1) that a create call fails transiently */
  failureRate?: number;
  random?: () => number;
}

export interface StoredTicket extends TicketRecord {
  draft: TicketDraft;
}

const FIRST_TICKET_NUMBER = 1001;

export class InMemoryJiraClient implements TicketSystemClient {
  readonly name = 'in-memory';
  private readonly tickets: Map<string, StoredTicket> = new Map();
  private readonly failures: TicketFailureKind[];
  private readonly baseUrl: string;
  private readonly failureRate: number;
  private readonly random: () => number;
  private nextNumber = FIRST_TICKET_NUMBER;

  /** Number of create calls received, failed ones included */
  createCalls = 0;

  constructor(options: InMemoryJiraClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://jira.example.com';
    this.failures = [...(options.failures ?? [])];
    this.failureRate = options.failureRate ?? 0;
    this.random = options.random ?? Math.random;
  }

  async create(draft: TicketDraft): Promise<CreatedTicket> {
    this.createCalls++;

    const scripted = this.failures.shift();
    if (scripted === 'transient' || (!scripted && this.random() < this.failureRate)) {
      throw new TicketSystemError('Jira API temporarily unavailable', 'transient', 503);
    }
    if (scripted === 'permanent') {
      throw new TicketSystemError(`Project ${draft.projectKey} rejected the issue`, 'permanent', 400);
    }

    const id = `${draft.projectKey}-${this.nextNumber++}`;
    const ticket: StoredTicket = {
      id,
      url: `${this.baseUrl}/browse/${id}`,
      title: draft.title,
      status: 'To Do',
      draft: { ...draft, labels: [...draft.labels] },
    };
    this.tickets.set(id, ticket);
    logger.debug(`Stored ticket ${id}`);

    return { id: ticket.id, url: ticket.url };
  }

  async get(id: string): Promise<TicketRecord | null> {
    const ticket = this.tickets.get(id);
    if (!ticket) return null;
    return { id: ticket.id, url: ticket.url, title: ticket.title, status: ticket.status };
  }

  list(): StoredTicket[] {
    return Array.from(this.tickets.values());
  }

  /**
   * Drops a stored ticket, e.g. to simulate one deleted between create and verify
   */
  remove(id: string): boolean {
    return this.tickets.delete(id);
  }
}
