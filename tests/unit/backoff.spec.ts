import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { backoffDelay, backoffSchedule } from '../../src/nodes/jira/backoff.js';
import { DEFAULT_POLICY } from '../../src/workflows/alertToTicket/config.js';

describe('backoff', () => {
  it('doubles from the base up to the cap', () => {
    assert.deepEqual(backoffSchedule(5, DEFAULT_POLICY), [2000, 4000, 8000, 16000, 16000]);
  });

  it('treats retry 0 like the first retry', () => {
    assert.equal(backoffDelay(0, DEFAULT_POLICY), 2000);
    assert.equal(backoffDelay(1, DEFAULT_POLICY), 2000);
  });

  it('honours custom settings', () => {
    const settings = { backoffBaseMs: 100, backoffCapMs: 250 };

    assert.deepEqual(backoffSchedule(4, settings), [100, 200, 250, 250]);
  });

  it('is empty without retries', () => {
    assert.deepEqual(backoffSchedule(0, DEFAULT_POLICY), []);
  });
});
