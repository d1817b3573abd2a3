import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  McpJiraClient,
  classifyErrorText,
  classifyStatus,
} from '../../src/services/jira/mcpJiraClient.js';
import type { ToolCaller } from '../../src/utils/mcpClient.js';
import { MCPClientError, TicketSystemError } from '../../src/utils/errors.js';
import type { TicketDraft } from '../../src/types/services.js';

interface ToolCall {
  server: string;
  tool: string;
  args: Record<string, unknown>;
}

/**
 * Answers every tool call with the next scripted result
 */
class FakeToolCaller implements ToolCaller {
  readonly calls: ToolCall[] = [];

  constructor(private readonly results: Array<unknown | Error>) {}

  async callTool(server: string, tool: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ server, tool, args });
    const next = this.results.shift();
    if (next instanceof Error) throw next;
    return next;
  }
}

function text(value: string, isError = false) {
  return { content: [{ type: 'text', text: value }], isError };
}

const draft: TicketDraft = {
  title: 'Crash in cart',
  description: 'Details',
  labels: ['bug', 'mobile'],
  projectKey: 'MOBILE',
  issueType: 'Bug',
};

function client(caller: ToolCaller): McpJiraClient {
  return new McpJiraClient(caller, {
    server: 'jira',
    createTool: 'jira_create_issue',
    getTool: 'jira_get_issue',
    baseUrl: 'https://jira.test/',
  });
}

describe('McpJiraClient.create', () => {
  it('calls the create tool with the draft', async () => {
    const caller = new FakeToolCaller([text(JSON.stringify({ key: 'MOBILE-42' }))]);

    const created = await client(caller).create(draft);

    assert.deepEqual(created, { id: 'MOBILE-42', url: 'https://jira.test/browse/MOBILE-42' });
    assert.deepEqual(caller.calls, [
      {
        server: 'jira',
        tool: 'jira_create_issue',
        args: {
          project_key: 'MOBILE',
          summary: 'Crash in cart',
          issue_type: 'Bug',
          description: 'Details',
          additional_fields: { labels: ['bug', 'mobile'] },
        },
      },
    ]);
  });

  it('reads an issue wrapped under "issue"', async () => {
    const caller = new FakeToolCaller([
      text(JSON.stringify({ message: 'Issue created', issue: { key: 'MOBILE-7', url: 'https://jira.test/x/7' } })),
    ]);

    assert.deepEqual(await client(caller).create(draft), { id: 'MOBILE-7', url: 'https://jira.test/x/7' });
  });

  it('finds the key in a plain text answer', async () => {
    const caller = new FakeToolCaller([text('Created issue MOBILE-9 in project MOBILE')]);

    assert.equal((await client(caller).create(draft)).id, 'MOBILE-9');
  });

  it('fails permanently without a key', async () => {
    const caller = new FakeToolCaller([{ content: [] }]);

    await assert.rejects(client(caller).create(draft), (error: unknown) => {
      assert.ok(error instanceof TicketSystemError);
      assert.equal(error.kind, 'permanent');
      assert.equal(error.message, 'Jira did not return an issue key: (empty response)');
      return true;
    });
  });

  it('classifies tool errors by status', async () => {
    const caller = new FakeToolCaller([
      text('Jira returned status 503: Service Unavailable', true),
      text('400 Bad Request: labels is invalid', true),
    ]);
    const jira = client(caller);

    await assert.rejects(jira.create(draft), (error: unknown) => {
      assert.ok(error instanceof TicketSystemError);
      assert.equal(error.kind, 'transient');
      assert.equal(error.status, 503);
      assert.equal(error.message, 'jira_create_issue failed: Jira returned status 503: Service Unavailable');
      return true;
    });
    await assert.rejects(jira.create(draft), (error: unknown) => {
      assert.ok(error instanceof TicketSystemError);
      assert.equal(error.kind, 'permanent');
      assert.equal(error.status, 400);
      return true;
    });
  });

  it('retries when the MCP connection fails', async () => {
    const caller = new FakeToolCaller([new MCPClientError('Failed to connect to MCP server: jira', 'jira')]);

    await assert.rejects(client(caller).create(draft), (error: unknown) => {
      assert.ok(error instanceof TicketSystemError);
      assert.equal(error.kind, 'transient');
      return true;
    });
  });

  it('does not retry a request the server rejected', async () => {
    const caller = new FakeToolCaller([
      new MCPClientError(
        'Failed to call tool jira_create_issue on jira: summary is required',
        'jira',
        'jira_create_issue',
        new McpError(ErrorCode.InvalidParams, 'summary is required')
      ),
    ]);

    await assert.rejects(client(caller).create(draft), (error: unknown) => {
      assert.ok(error instanceof TicketSystemError);
      assert.equal(error.kind, 'permanent');
      return true;
    });
  });

  it('rejects a result that is not a tool result', async () => {
    const caller = new FakeToolCaller(['not a tool result']);

    await assert.rejects(client(caller).create(draft), /Unexpected result from jira_create_issue/);
  });
});

describe('McpJiraClient.get', () => {
  it('maps an issue to a ticket record', async () => {
    const caller = new FakeToolCaller([
      text(JSON.stringify({ key: 'MOBILE-42', fields: { summary: 'Crash in cart', status: { name: 'Open' } } })),
    ]);

    assert.deepEqual(await client(caller).get('MOBILE-42'), {
      id: 'MOBILE-42',
      url: 'https://jira.test/browse/MOBILE-42',
      title: 'Crash in cart',
      status: 'Open',
    });
    assert.deepEqual(caller.calls[0].args, { issue_key: 'MOBILE-42' });
  });

  it('returns null for a missing issue', async () => {
    const caller = new FakeToolCaller([text('Issue MOBILE-42 does not exist (404)', true)]);

    assert.equal(await client(caller).get('MOBILE-42'), null);
  });

  it('throws other lookup errors', async () => {
    const caller = new FakeToolCaller([text('502 Bad Gateway', true)]);

    await assert.rejects(client(caller).get('MOBILE-42'), TicketSystemError);
  });
});

describe('status classification', () => {
  it('retries throttling and server errors only', () => {
    assert.equal(classifyStatus(408), 'transient');
    assert.equal(classifyStatus(429), 'transient');
    assert.equal(classifyStatus(500), 'transient');
    assert.equal(classifyStatus(401), 'permanent');
    assert.equal(classifyStatus(404), 'permanent');
  });

  it('reads error text without a status', () => {
    assert.deepEqual(classifyErrorText('connect ECONNREFUSED 127.0.0.1'), { kind: 'transient' });
    assert.deepEqual(classifyErrorText('Field summary is required'), { kind: 'permanent' });
    assert.deepEqual(classifyErrorText('HTTP 429 Too Many Requests'), { kind: 'transient', status: 429 });
    assert.deepEqual(classifyErrorText('Request failed with status code 404'), { kind: 'permanent', status: 404 });
  });

  it('does not mistake issue keys for statuses', () => {
    assert.deepEqual(classifyErrorText('Issue MOBILE-503 is locked for editing'), { kind: 'permanent' });
    assert.deepEqual(classifyErrorText('Cannot link MOBILE-429 to itself'), { kind: 'permanent' });
  });
});
