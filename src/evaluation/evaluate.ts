/**
 * Batch evaluation of the workflow against a set of labelled alert messages
 */

import { z } from 'zod';
import type { AlertInput } from '../workflows/alertToTicket/config.js';
import type { AlertToTicketRunResult } from '../workflows/alertToTicket/workflow.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const ExpectedOutcomeSchema = z.object({
  isValidSource: z.boolean().optional(),
  ticketCreated: z.boolean().optional(),
  hasTitle: z.boolean().optional(),
  hasDescription: z.boolean().optional(),
  hasLabels: z.boolean().optional(),
  labelsContain: z.array(z.string()).optional(),
  titleMentionsError: z.boolean().optional(),
});

export const EvaluationCaseSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  message: z.string(),
  channel: z.string(),
  expected: ExpectedOutcomeSchema,
});

export const EvaluationSetSchema = z.array(EvaluationCaseSchema);

export type ExpectedOutcome = z.infer<typeof ExpectedOutcomeSchema>;
export type EvaluationCase = z.infer<typeof EvaluationCaseSchema>;
export type CheckName = keyof ExpectedOutcome;

export type CaseRunner = (input: AlertInput) => Promise<AlertToTicketRunResult>;

export interface CheckResult {
  name: CheckName;
  expected: boolean | string[];
  actual: boolean | string[];
  passed: boolean;
}

export interface CaseResult {
  id: string;
  description: string;
  passed: boolean;
  checks: CheckResult[];
  error?: string;
}

export interface CheckStats {
  passed: number;
  failed: number;
}

/** Each metric is a ratio in [0, 1], or null when no case checks it */
export interface EvaluationMetrics {
  validationAccuracy: number | null;
  creationSuccessRate: number | null;
  fieldCompleteness: number | null;
  labelAccuracy: number | null;
  titleQuality: number | null;
}

export interface EvaluationSummary {
  timestamp: string;
  total: number;
  passed: number;
  failed: number;
  passRate: number;
  checkStats: Partial<Record<CheckName, CheckStats>>;
  metrics: EvaluationMetrics;
  results: CaseResult[];
}

const ERROR_TERMS = ['error', 'type', 'undefined', 'null', 'exception', 'fail'];

export function titleMentionsError(title: string): boolean {
  const lower = title.toLowerCase();
  return ERROR_TERMS.some(term => lower.includes(term));
}

function booleanCheck(name: CheckName, expected: boolean | undefined, actual: boolean): CheckResult[] {
  return expected === undefined ? [] : [{ name, expected, actual, passed: expected === actual }];
}

/**
 * Compare one run against the expectations of its case
 */
export function scoreCase(expected: ExpectedOutcome, run: AlertToTicketRunResult): CheckResult[] {
  const { ticketInfo } = run.state;
  const checks: CheckResult[] = [
    ...booleanCheck('isValidSource', expected.isValidSource, run.state.isValidSource),
    ...booleanCheck('ticketCreated', expected.ticketCreated, run.jiraTicketId !== ''),
    ...booleanCheck('hasTitle', expected.hasTitle, ticketInfo.title !== ''),
    ...booleanCheck('hasDescription', expected.hasDescription, ticketInfo.description !== ''),
    ...booleanCheck('hasLabels', expected.hasLabels, ticketInfo.labels.length > 0),
  ];

  if (expected.labelsContain) {
    const actual = ticketInfo.labels.map(label => label.toLowerCase());
    checks.push({
      name: 'labelsContain',
      expected: expected.labelsContain,
      actual: ticketInfo.labels,
      passed: expected.labelsContain.every(label => actual.includes(label.toLowerCase())),
    });
  }

  // An empty title mentions nothing
  if (expected.titleMentionsError !== undefined) {
    const mentions = titleMentionsError(ticketInfo.title);
    checks.push({
      name: 'titleMentionsError',
      expected: expected.titleMentionsError,
      actual: mentions,
      passed: mentions === expected.titleMentionsError,
    });
  }

  return checks;
}

function ratio(stats: CheckStats[]): number | null {
  const passed = stats.reduce((sum, s) => sum + s.passed, 0);
  const total = stats.reduce((sum, s) => sum + s.passed + s.failed, 0);
  return total === 0 ? null : passed / total;
}

export function computeMetrics(checkStats: Partial<Record<CheckName, CheckStats>>): EvaluationMetrics {
  const pick = (...names: CheckName[]): CheckStats[] =>
    names.flatMap(name => {
      const stats = checkStats[name];
      return stats ? [stats] : [];
    });

  return {
    validationAccuracy: ratio(pick('isValidSource')),
    creationSuccessRate: ratio(pick('ticketCreated')),
    fieldCompleteness: ratio(pick('hasTitle', 'hasDescription', 'hasLabels')),
    labelAccuracy: ratio(pick('labelsContain')),
    titleQuality: ratio(pick('titleMentionsError')),
  };
}

export interface EvaluationOptions {
  now?: () => Date;
  onCaseFinished?: (result: CaseResult, index: number, total: number) => void;
}

/**
 * Run every case in order and aggregate the outcome. A runner that throws
 * fails its case without stopping the batch.
 */
export async function runEvaluation(
  cases: EvaluationCase[],
  runner: CaseRunner,
  options: EvaluationOptions = {}
): Promise<EvaluationSummary> {
  const results: CaseResult[] = [];
  const checkStats: Partial<Record<CheckName, CheckStats>> = {};

  for (const [index, testCase] of cases.entries()) {
    let result: CaseResult;

    try {
      const run = await runner({ rawMessage: testCase.message, channel: testCase.channel });
      const checks = scoreCase(testCase.expected, run);
      result = {
        id: testCase.id,
        description: testCase.description,
        passed: checks.every(check => check.passed),
        checks,
      };
    } catch (error) {
      logger.warn(`Evaluation case ${testCase.id} threw`, { error });
      result = {
        id: testCase.id,
        description: testCase.description,
        passed: false,
        checks: [],
        error: errorMessage(error),
      };
    }

    for (const check of result.checks) {
      const stats = checkStats[check.name] ?? { passed: 0, failed: 0 };
      if (check.passed) stats.passed++;
      else stats.failed++;
      checkStats[check.name] = stats;
    }

    results.push(result);
    options.onCaseFinished?.(result, index, cases.length);
  }

  const passed = results.filter(r => r.passed).length;

  return {
    timestamp: (options.now ?? (() => new Date()))().toISOString(),
    total: results.length,
    passed,
    failed: results.length - passed,
    passRate: results.length === 0 ? 0 : passed / results.length,
    checkStats,
    metrics: computeMetrics(checkStats),
    results,
  };
}

function percent(value: number | null): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(1)}%`;
}

export function formatSummary(summary: EvaluationSummary): string {
  const lines = [
    'EVALUATION SUMMARY',
    `Total: ${summary.total} | Passed: ${summary.passed} | Failed: ${summary.failed} | Pass Rate: ${percent(summary.total === 0 ? null : summary.passRate)}`,
    '',
    'Metrics:',
    `  Validation accuracy: ${percent(summary.metrics.validationAccuracy)}`,
    `  Creation success rate: ${percent(summary.metrics.creationSuccessRate)}`,
    `  Required-field completeness: ${percent(summary.metrics.fieldCompleteness)}`,
    `  Label accuracy: ${percent(summary.metrics.labelAccuracy)}`,
    `  Title quality: ${percent(summary.metrics.titleQuality)}`,
  ];

  const failures = summary.results.filter(r => !r.passed);
  if (failures.length > 0) {
    lines.push('');
    lines.push('Failed cases:');
    for (const failure of failures) {
      lines.push(`  - ${failure.id}: ${failure.description}`);
      if (failure.error) {
        lines.push(`      error: ${failure.error}`);
      }
      for (const check of failure.checks.filter(c => !c.passed)) {
        lines.push(`      ${check.name}: expected ${JSON.stringify(check.expected)}, got ${JSON.stringify(check.actual)}`);
      }
    }
  }

  return lines.join('\n');
}
