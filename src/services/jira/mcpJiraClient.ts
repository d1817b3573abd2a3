/**
 * Ticket client that drives a Jira MCP server's create/get tools
 */

import { z } from 'zod';
import type {
  CreatedTicket,
  TicketDraft,
  TicketRecord,
  TicketSystemClient,
} from '../../types/services.js';
import { classifyClientError, type ToolCaller } from '../../utils/mcpClient.js';
import {
  MCPClientError,
  TicketSystemError,
  errorMessage,
  type TicketFailureKind,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface McpJiraClientOptions {
  server: string;
  createTool: string;
  getTool: string;
  /** Used to build browse URLs when the server answers with a bare key */
  baseUrl: string;
}

export const DEFAULT_JIRA_TOOLS = {
  createTool: 'jira_create_issue',
  getTool: 'jira_get_issue',
} as const;

const ToolResultSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
      })
    )
    .default([]),
  isError: z.boolean().optional(),
});

const IssuePayloadSchema = z
  .object({
    key: z.string().optional(),
    id: z.union([z.string(), z.number()]).optional(),
    self: z.string().optional(),
    url: z.string().optional(),
    fields: z
      .object({
        summary: z.string().optional(),
        status: z.object({ name: z.string() }).partial().optional(),
      })
      .partial()
      .optional(),
    summary: z.string().optional(),
    status: z.union([z.string(), z.object({ name: z.string() }).partial()]).optional(),
  })
  .passthrough();

type IssuePayload = z.infer<typeof IssuePayloadSchema>;

const ISSUE_KEY_PATTERN = /\b[A-Z][A-Z0-9_]+-\d+\b/;

/**
 * 408/429 and 5xx are worth retrying; other 4xx are not
 */
export function classifyStatus(status: number): TicketFailureKind {
  if (status === 408 || status === 429) return 'transient';
  return status >= 500 ? 'transient' : 'permanent';
}

const STATUS_PATTERN = /(?:^|\bstatus(?: code)?:?\s*|\bHTTP\s+)([45]\d\d)\b/i;

/**
 * A status counts only when it leads the text or follows "status"/"HTTP",
 * so issue keys such as MOBILE-503 are not read as one.
 */
export function classifyErrorText(text: string): { kind: TicketFailureKind; status?: number } {
  const statusMatch = text.match(STATUS_PATTERN);
  if (statusMatch) {
    const status = Number(statusMatch[1]);
    return { kind: classifyStatus(status), status };
  }
  if (/timed? ?out|ECONNRESET|ECONNREFUSED|ETIMEDOUT|temporarily|unavailable|rate limit/i.test(text)) {
    return { kind: 'transient' };
  }
  return { kind: 'permanent' };
}

function resultText(result: z.infer<typeof ToolResultSchema>): string {
  return result.content
    .filter(item => item.type === 'text' && item.text)
    .map(item => item.text)
    .join('\n')
    .trim();
}

/**
 * Issue objects are returned either bare or under an "issue" key
 */
function parseIssuePayload(text: string): IssuePayload | null {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const wrapped = z.object({ issue: IssuePayloadSchema }).safeParse(json);
  if (wrapped.success) return wrapped.data.issue;

  const bare = IssuePayloadSchema.safeParse(json);
  return bare.success ? bare.data : null;
}

function statusName(payload: IssuePayload): string {
  const status = payload.status ?? payload.fields?.status;
  if (typeof status === 'string') return status;
  return status?.name ?? 'unknown';
}

export class McpJiraClient implements TicketSystemClient {
  readonly name = 'jira-mcp';

  constructor(
    private readonly tools: ToolCaller,
    private readonly options: McpJiraClientOptions
  ) {}

  browseUrl(key: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/browse/${key}`;
  }

  async create(draft: TicketDraft): Promise<CreatedTicket> {
    const text = await this.call(this.options.createTool, {
      project_key: draft.projectKey,
      summary: draft.title,
      issue_type: draft.issueType,
      description: draft.description,
      additional_fields: { labels: draft.labels },
    });

    const payload = parseIssuePayload(text);
    const key = payload?.key ?? text.match(ISSUE_KEY_PATTERN)?.[0];
    if (!key) {
      throw new TicketSystemError(
        `Jira did not return an issue key: ${text.slice(0, 200) || '(empty response)'}`,
        'permanent'
      );
    }

    logger.info(`Created Jira issue ${key}`);
    return { id: key, url: payload?.url ?? this.browseUrl(key) };
  }

  async get(id: string): Promise<TicketRecord | null> {
    let text: string;
    try {
      text = await this.call(this.options.getTool, { issue_key: id });
    } catch (error) {
      if (error instanceof TicketSystemError && (error.status === 404 || /not found|does not exist/i.test(error.message))) {
        return null;
      }
      throw error;
    }

    const payload = parseIssuePayload(text);
    if (!payload) {
      return ISSUE_KEY_PATTERN.test(text) && text.includes(id)
        ? { id, url: this.browseUrl(id), title: '', status: 'unknown' }
        : null;
    }

    return {
      id: payload.key ?? id,
      url: payload.url ?? this.browseUrl(payload.key ?? id),
      title: payload.summary ?? payload.fields?.summary ?? '',
      status: statusName(payload),
    };
  }

  /**
   * Calls a tool and returns its text; tool errors become TicketSystemError
   */
  private async call(toolName: string, args: Record<string, unknown>): Promise<string> {
    let raw: unknown;
    try {
      raw = await this.tools.callTool(this.options.server, toolName, args);
    } catch (error) {
      if (error instanceof MCPClientError) {
        // A dropped connection is reopened by the manager on the next call
        throw new TicketSystemError(errorMessage(error), classifyClientError(error));
      }
      throw error;
    }

    const parsed = ToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TicketSystemError(`Unexpected result from ${toolName}`, 'permanent');
    }

    const text = resultText(parsed.data);
    if (parsed.data.isError) {
      const { kind, status } = classifyErrorText(text);
      throw new TicketSystemError(`${toolName} failed: ${text || 'no details'}`, kind, status);
    }
    return text;
  }
}
