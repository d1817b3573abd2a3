/**
 * Shared test data and stand-ins for the workflow's collaborators
 */

import type { ExtractionRequest, ExtractionService } from '../../src/types/services.js';
import { DEFAULT_POLICY, type WorkflowPolicy } from '../../src/workflows/alertToTicket/config.js';
import {
  createInitialState,
  type AlertTicketState,
  type StateUpdate,
} from '../../src/workflows/alertToTicket/state.js';
import type { Sleep } from '../../src/utils/timeout.js';

export const ERROR_LINE =
  "Cannot read properties of null (reading 'total') : TypeError: Cannot read properties of null (reading 'total')";

export const CONDITION_LINE =
  'The count of RUM errors matching service:mobile, grouped by @issue.id, was > 20 during the last 5m.';

export const ALERT_MESSAGE = [
  'Triggered: Error spike in RUM on @issue.id:4d2c-test-0001',
  'Error spike detected for this issue.',
  '',
  ERROR_LINE,
  '  at renderCart @ app://localhost/cart.js:120:9',
  '  at commitRoot @ app://localhost/vendor.js:9911:4',
  '',
  '@slack-Acme-mobile-errors',
  '',
  CONDITION_LINE,
].join('\n');

export const ALERT_TITLE = "TypeError: Cannot read properties of null (reading 'total')";

export function testPolicy(overrides: Partial<WorkflowPolicy> = {}): WorkflowPolicy {
  return {
    ...DEFAULT_POLICY,
    sourceMarkers: [...DEFAULT_POLICY.sourceMarkers],
    requiredLabelGroups: DEFAULT_POLICY.requiredLabelGroups.map(group => [...group]),
    ...overrides,
  };
}

export function makeState(overrides: StateUpdate = {}): AlertTicketState {
  return {
    ...createInitialState({ rawMessage: ALERT_MESSAGE, channel: 'mobile-errors' }, 'run-test'),
    ...overrides,
  };
}

/**
 * Answers extraction requests from a script; an Error entry is thrown
 */
export class ScriptedExtraction implements ExtractionService {
  readonly name = 'scripted';
  readonly calls: ExtractionRequest[] = [];
  private readonly answers: unknown[];

  constructor(answers: unknown[]) {
    this.answers = [...answers];
  }

  async extract(request: ExtractionRequest): Promise<unknown> {
    this.calls.push(request);
    if (this.answers.length === 0) {
      throw new Error('no scripted answer left');
    }
    const answer = this.answers.shift();
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}

export function recordingSleep(): { sleep: Sleep; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

/**
 * A service call that never answers, for exercising timeouts
 */
export function unanswered<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
