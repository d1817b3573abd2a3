import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DEFAULT_POLICY,
  buildRequirements,
  loadPolicy,
  parseLabelGroups,
} from '../../src/workflows/alertToTicket/config.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('loadPolicy', () => {
  it('uses the defaults for an empty environment', () => {
    assert.deepEqual(loadPolicy({}), { ...DEFAULT_POLICY });
  });

  it('reads overrides from the environment', () => {
    const policy = loadPolicy({
      MONITORING_CHANNEL: '#web-alerts',
      SOURCE_MARKERS: 'Triggered:, Recovered:',
      REQUIRED_LABEL_GROUPS: 'bug|defect;web',
      MAX_INFERENCE_ATTEMPTS: '1',
      MAX_CREATE_RETRIES: '3',
      BACKOFF_BASE_MS: '500',
      BACKOFF_CAP_MS: '4000',
      INCOMPLETE_TICKET_POLICY: 'abort',
      JIRA_PROJECT_KEY: 'WEB',
    });

    assert.equal(policy.monitoringChannel, 'web-alerts');
    assert.deepEqual(policy.sourceMarkers, ['Triggered:', 'Recovered:']);
    assert.deepEqual(policy.requiredLabelGroups, [['bug', 'defect'], ['web']]);
    assert.equal(policy.maxInferenceAttempts, 1);
    assert.equal(policy.maxCreateRetries, 3);
    assert.equal(policy.backoffBaseMs, 500);
    assert.equal(policy.backoffCapMs, 4000);
    assert.equal(policy.incompleteTicketPolicy, 'abort');
    assert.equal(policy.projectKey, 'WEB');
    assert.equal(policy.issueType, 'Bug');
  });

  it('returns a frozen policy', () => {
    assert.equal(Object.isFrozen(loadPolicy({})), true);
  });

  it('rejects values that are not numbers', () => {
    assert.throws(() => loadPolicy({ MAX_CREATE_RETRIES: 'many' }), ConfigError);
  });

  it('rejects an unknown incomplete-ticket policy', () => {
    assert.throws(() => loadPolicy({ INCOMPLETE_TICKET_POLICY: 'skip' }), /INCOMPLETE_TICKET_POLICY/);
  });

  it('rejects a cap below the base delay', () => {
    assert.throws(
      () => loadPolicy({ BACKOFF_BASE_MS: '5000', BACKOFF_CAP_MS: '1000' }),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.deepEqual(error.issues, ['BACKOFF_CAP_MS: BACKOFF_CAP_MS must not be lower than BACKOFF_BASE_MS']);
        return true;
      }
    );
  });

  it('rejects an empty marker list', () => {
    assert.throws(() => loadPolicy({ SOURCE_MARKERS: ' , ' }), /SOURCE_MARKERS is empty/);
  });
});

describe('parseLabelGroups', () => {
  it('splits groups and alternatives', () => {
    assert.deepEqual(parseLabelGroups('Bug|Defect; mobile ;'), [['bug', 'defect'], ['mobile']]);
  });

  it('returns no groups for an empty value', () => {
    assert.deepEqual(parseLabelGroups(''), []);
  });
});

describe('buildRequirements', () => {
  it('declares the Jira server when one backs the tickets', () => {
    assert.deepEqual(
      buildRequirements({
        jira: { server: 'jira', tools: ['jira_create_issue', 'jira_get_issue'] },
        environment: ['OPENAI_API_KEY'],
      }),
      {
        mcpServers: [{ name: 'jira', tools: ['jira_create_issue', 'jira_get_issue'], optional: false }],
        environment: ['OPENAI_API_KEY'],
      }
    );
  });

  it('needs nothing for the offline collaborators', () => {
    assert.deepEqual(buildRequirements(), { mcpServers: [], environment: [] });
  });
});
