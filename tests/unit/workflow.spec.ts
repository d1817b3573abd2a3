import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ZodError } from 'zod';
import {
  WORKFLOW_ID,
  createAlertToTicketWorkflow,
  runAlertToTicket,
  type AlertToTicketDependencies,
} from '../../src/workflows/alertToTicket/workflow.js';
import { buildRequirements } from '../../src/workflows/alertToTicket/config.js';
import { HeuristicExtractionService } from '../../src/services/extraction/heuristicExtraction.js';
import { InMemoryJiraClient } from '../../src/services/jira/inMemoryJiraClient.js';
import type { TicketRecord } from '../../src/types/services.js';
import type { TicketFailureKind } from '../../src/utils/errors.js';
import {
  ALERT_MESSAGE,
  ALERT_TITLE,
  ScriptedExtraction,
  recordingSleep,
  testPolicy,
} from '../helpers/fixtures.js';

class ForgetfulJiraClient extends InMemoryJiraClient {
  override async get(): Promise<TicketRecord | null> {
    return null;
  }
}

function deps(overrides: Partial<AlertToTicketDependencies> = {}): AlertToTicketDependencies {
  return {
    extraction: new HeuristicExtractionService(),
    tickets: new InMemoryJiraClient(),
    policy: testPolicy(),
    sleep: recordingSleep().sleep,
    runIdFactory: () => 'run-1',
    ...overrides,
  };
}

const input = { rawMessage: ALERT_MESSAGE, channel: 'mobile-errors' };

describe('runAlertToTicket', () => {
  it('creates and verifies a ticket for a valid alert', async () => {
    const result = await runAlertToTicket(input, deps());

    assert.equal(result.runId, 'run-1');
    assert.equal(result.jiraTicketId, 'MOBILE-1001');
    assert.equal(result.errorMessage, '');
    assert.equal(result.state.verified, true);
    assert.deepEqual(result.state.completedSteps, [
      'validating',
      'extracting',
      'checkingCompleteness',
      'creating',
      'verifying',
      'formatting',
    ]);
    assert.equal(
      result.finalResponse,
      [
        'Jira ticket created successfully!',
        '',
        'Ticket: MOBILE-1001',
        'URL: https://jira.example.com/browse/MOBILE-1001',
        `Title: ${ALERT_TITLE}`,
        'Labels: bug, mobile',
      ].join('\n')
    );
  });

  it('rejects a message from another channel without calling any service', async () => {
    const extraction = new ScriptedExtraction([]);
    const tickets = new InMemoryJiraClient();

    const result = await runAlertToTicket({ ...input, channel: 'general' }, deps({ extraction, tickets }));

    assert.equal(result.jiraTicketId, '');
    assert.equal(extraction.calls.length, 0);
    assert.equal(tickets.createCalls, 0);
    assert.deepEqual(result.state.completedSteps, ['validating', 'rejected', 'formatting']);
    assert.equal(
      result.finalResponse,
      "Message rejected: source 'datadog' from channel 'general' is not valid.\n" +
        "Invalid source: channel 'general' is not the monitoring channel 'mobile-errors'"
    );
  });

  it('fills missing labels by inference before creating', async () => {
    const extraction = new ScriptedExtraction([
      { title: 'Crash in cart', description: 'Details', labels: ['bug'] },
      { title: 'Other', description: 'Other', labels: ['mobile'] },
    ]);
    const tickets = new InMemoryJiraClient();

    const result = await runAlertToTicket(input, deps({ extraction, tickets }));

    assert.equal(result.state.inferenceAttempts, 1);
    assert.deepEqual(extraction.calls[1].missingFields, ['labels']);
    assert.deepEqual(tickets.list()[0].draft.labels, ['bug', 'mobile']);
    assert.equal(tickets.list()[0].draft.title, 'Crash in cart');
    assert.equal(result.jiraTicketId, 'MOBILE-1001');
  });

  it('retries transient failures with growing delays', async () => {
    const { sleep, delays } = recordingSleep();
    const tickets = new InMemoryJiraClient({ failures: ['transient', 'transient'] });

    const result = await runAlertToTicket(input, deps({ tickets, sleep }));

    assert.deepEqual(delays, [2000, 4000]);
    assert.equal(tickets.createCalls, 3);
    assert.equal(result.state.retryCount, 2);
    assert.equal(result.jiraTicketId, 'MOBILE-1001');
    assert.equal(result.finalResponse.split('\n')[0], 'Jira ticket created successfully!');
  });

  it('gives up after the maximum number of retries', async () => {
    const { sleep, delays } = recordingSleep();
    const tickets = new InMemoryJiraClient({ failures: new Array<TicketFailureKind>(6).fill('transient') });

    const result = await runAlertToTicket(input, deps({ tickets, sleep }));

    assert.deepEqual(delays, [2000, 4000, 8000, 16000, 16000]);
    assert.equal(tickets.createCalls, 6);
    assert.equal(result.jiraTicketId, '');
    assert.equal(result.state.failedStep, 'creating');
    assert.equal(result.state.errors.length, 6);
    assert.equal(
      result.finalResponse,
      [
        'Failed to create ticket: Ticket creation failed after 5 retries: Jira API temporarily unavailable',
        'Stopped at: creating',
        'Creation retries: 5',
      ].join('\n')
    );
  });

  it('does not retry a permanent failure', async () => {
    const { sleep, delays } = recordingSleep();
    const tickets = new InMemoryJiraClient({ failures: ['permanent'] });

    const result = await runAlertToTicket(input, deps({ tickets, sleep }));

    assert.deepEqual(delays, []);
    assert.equal(tickets.createCalls, 1);
    assert.equal(
      result.finalResponse,
      'Failed to create ticket: Ticket creation was rejected: Project MOBILE rejected the issue\nStopped at: creating'
    );
  });

  it('stops when extraction fails', async () => {
    const extraction = new ScriptedExtraction([new Error('service down')]);
    const tickets = new InMemoryJiraClient();

    const result = await runAlertToTicket(input, deps({ extraction, tickets }));

    assert.equal(tickets.createCalls, 0);
    assert.equal(
      result.finalResponse,
      'Failed to create ticket: Failed to extract ticket information: service down\nStopped at: extracting'
    );
  });

  it('creates an incomplete ticket after the inference attempts by default', async () => {
    const partial = { title: 'Crash in cart', description: 'Details', labels: ['bug'] };
    const extraction = new ScriptedExtraction([partial, partial, partial]);

    const result = await runAlertToTicket(input, deps({ extraction }));

    assert.equal(result.state.inferenceAttempts, 2);
    assert.equal(result.jiraTicketId, 'MOBILE-1001');
    assert.equal(
      result.finalResponse.split('\n').at(-1),
      'Note: created with incomplete information (missing: labels)'
    );
  });

  it('aborts an incomplete ticket under the abort policy', async () => {
    const partial = { title: 'Crash in cart', description: 'Details', labels: ['bug'] };
    const extraction = new ScriptedExtraction([partial, partial, partial]);
    const tickets = new InMemoryJiraClient();

    const result = await runAlertToTicket(
      input,
      deps({ extraction, tickets, policy: testPolicy({ incompleteTicketPolicy: 'abort' }) })
    );

    assert.equal(tickets.createCalls, 0);
    assert.equal(result.state.failedStep, 'checkingCompleteness');
    assert.equal(
      result.errorMessage,
      'Ticket information still incomplete after 2 of 2 inference attempts (missing: labels)'
    );
  });

  it('reports a ticket that cannot be read back as created with a warning', async () => {
    const result = await runAlertToTicket(input, deps({ tickets: new ForgetfulJiraClient() }));

    assert.equal(result.jiraTicketId, 'MOBILE-1001');
    assert.equal(result.state.verified, false);
    assert.equal(
      result.finalResponse.split('\n').at(-1),
      'Warning: Ticket MOBILE-1001 was created but could not be found when verifying it'
    );
  });

  it('turns a step that throws into a failed run', async () => {
    const tickets = new InMemoryJiraClient({ failures: ['transient'] });
    const sleep = async (): Promise<void> => {
      throw new Error('sleep broke');
    };

    const result = await runAlertToTicket(input, deps({ tickets, sleep }));

    assert.equal(result.state.failedStep, 'backoffWaiting');
    assert.deepEqual(result.state.errors.at(-1), { step: 'backoffWaiting', error: 'sleep broke' });
    assert.equal(
      result.finalResponse,
      [
        'Failed to create ticket: Unexpected failure in backoffWaiting: sleep broke',
        'Stopped at: backoffWaiting',
        'Creation retries: 1',
      ].join('\n')
    );
  });

  it('gives every run its own state', async () => {
    const shared = deps();
    const [first, second] = await Promise.all([
      runAlertToTicket(input, shared),
      runAlertToTicket({ ...input, channel: 'general' }, shared),
    ]);

    assert.equal(first.jiraTicketId, 'MOBILE-1001');
    assert.equal(second.jiraTicketId, '');
    assert.notEqual(first.state, second.state);
  });
});

describe('createAlertToTicketWorkflow', () => {
  it('exposes the run as a workflow definition', async () => {
    const workflow = createAlertToTicketWorkflow(deps(), buildRequirements());
    const result = await workflow.execute({ rawMessage: ALERT_MESSAGE, channel: '#mobile-errors' });

    assert.equal(workflow.id, WORKFLOW_ID);
    assert.equal(result.success, true);
    assert.equal(result.workflowId, 'alert_to_ticket');
    assert.equal(result.data?.ticketId, 'MOBILE-1001');
    assert.equal(result.data?.runId, 'run-1');
    assert.equal(result.error, undefined);
  });

  it('validates the tool arguments', async () => {
    const workflow = createAlertToTicketWorkflow(deps(), buildRequirements());

    await assert.rejects(workflow.execute({ channel: 'mobile-errors' }), ZodError);
  });
});
