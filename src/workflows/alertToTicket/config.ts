/**
 * Alert to Ticket Workflow Configuration
 */

import { z } from 'zod';
import type { JSONSchema, WorkflowRequirements } from '../../types/workflow.js';
import { ConfigError } from '../../utils/errors.js';

export type IncompleteTicketPolicy = 'create' | 'abort';

/**
 * Read-only settings fixed for the lifetime of the process
 */
export interface WorkflowPolicy {
  monitoringChannel: string;
  sourceMarkers: string[];
  /** A ticket is complete when it carries one label out of every group */
  requiredLabelGroups: string[][];
  maxInferenceAttempts: number;
  maxCreateRetries: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  serviceTimeoutMs: number;
  incompleteTicketPolicy: IncompleteTicketPolicy;
  projectKey: string;
  issueType: string;
}

export const DEFAULT_SOURCE_MARKERS = ['Triggered:', '@issue.id:', 'RUM errors'];

export const DEFAULT_POLICY: Readonly<WorkflowPolicy> = Object.freeze({
  monitoringChannel: 'mobile-errors',
  sourceMarkers: DEFAULT_SOURCE_MARKERS,
  requiredLabelGroups: [['bug'], ['mobile']],
  maxInferenceAttempts: 2,
  maxCreateRetries: 5,
  backoffBaseMs: 2000,
  backoffCapMs: 16000,
  serviceTimeoutMs: 30000,
  incompleteTicketPolicy: 'create',
  projectKey: 'MOBILE',
  issueType: 'Bug',
});

function splitList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map(item => item.trim())
    .filter(Boolean);
}

/**
 * "bug|defect;mobile" -> [['bug', 'defect'], ['mobile']]
 */
export function parseLabelGroups(value: string): string[][] {
  return splitList(value, ';')
    .map(group => splitList(group, '|').map(label => label.toLowerCase()))
    .filter(group => group.length > 0);
}

const PolicyEnvSchema = z
  .object({
    MONITORING_CHANNEL: z.string().trim().min(1).default(DEFAULT_POLICY.monitoringChannel),
    SOURCE_MARKERS: z.string().optional(),
    REQUIRED_LABEL_GROUPS: z.string().optional(),
    MAX_INFERENCE_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(DEFAULT_POLICY.maxInferenceAttempts),
    MAX_CREATE_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_POLICY.maxCreateRetries),
    BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(DEFAULT_POLICY.backoffBaseMs),
    BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(DEFAULT_POLICY.backoffCapMs),
    SERVICE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_POLICY.serviceTimeoutMs),
    INCOMPLETE_TICKET_POLICY: z.enum(['create', 'abort']).default(DEFAULT_POLICY.incompleteTicketPolicy),
    JIRA_PROJECT_KEY: z.string().trim().min(1).default(DEFAULT_POLICY.projectKey),
    JIRA_ISSUE_TYPE: z.string().trim().min(1).default(DEFAULT_POLICY.issueType),
  })
  .refine(env => env.BACKOFF_CAP_MS >= env.BACKOFF_BASE_MS, {
    message: 'BACKOFF_CAP_MS must not be lower than BACKOFF_BASE_MS',
    path: ['BACKOFF_CAP_MS'],
  });

/**
 * Build the workflow policy from environment variables
 */
export function loadPolicy(env: NodeJS.ProcessEnv = process.env): WorkflowPolicy {
  const parsed = PolicyEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      issue => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid workflow configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  const sourceMarkers = values.SOURCE_MARKERS
    ? splitList(values.SOURCE_MARKERS, ',')
    : [...DEFAULT_POLICY.sourceMarkers];
  const requiredLabelGroups = values.REQUIRED_LABEL_GROUPS
    ? parseLabelGroups(values.REQUIRED_LABEL_GROUPS)
    : DEFAULT_POLICY.requiredLabelGroups.map(group => [...group]);

  if (sourceMarkers.length === 0) {
    throw new ConfigError('Invalid workflow configuration: SOURCE_MARKERS is empty', [
      'SOURCE_MARKERS: empty',
    ]);
  }

  return Object.freeze({
    monitoringChannel: values.MONITORING_CHANNEL.replace(/^#/, ''),
    sourceMarkers,
    requiredLabelGroups,
    maxInferenceAttempts: values.MAX_INFERENCE_ATTEMPTS,
    maxCreateRetries: values.MAX_CREATE_RETRIES,
    backoffBaseMs: values.BACKOFF_BASE_MS,
    backoffCapMs: values.BACKOFF_CAP_MS,
    serviceTimeoutMs: values.SERVICE_TIMEOUT_MS,
    incompleteTicketPolicy: values.INCOMPLETE_TICKET_POLICY,
    projectKey: values.JIRA_PROJECT_KEY,
    issueType: values.JIRA_ISSUE_TYPE,
  });
}

export interface RequirementOptions {
  /** MCP server and tools backing the ticket client, when one is used */
  jira?: { server: string; tools: string[] };
  /** Environment variables the chosen collaborators read */
  environment?: string[];
}

export function buildRequirements(options: RequirementOptions = {}): WorkflowRequirements {
  return {
    mcpServers: options.jira
      ? [{ name: options.jira.server, tools: options.jira.tools, optional: false }]
      : [],
    environment: options.environment ?? [],
  };
}

export const AlertInputSchema = z.object({
  rawMessage: z.string().min(1, 'rawMessage must not be empty'),
  channel: z.string().min(1, 'channel must not be empty'),
});

export type AlertInput = z.infer<typeof AlertInputSchema>;

export const inputSchema: JSONSchema = {
  type: 'object',
  properties: {
    rawMessage: {
      type: 'string',
      description: 'Full text of the alert message as posted in chat',
    },
    channel: {
      type: 'string',
      description: 'Name of the channel the message was posted to (e.g., mobile-errors)',
    },
  },
  required: ['rawMessage', 'channel'],
};

export const outputSchema: JSONSchema = {
  type: 'object',
  properties: {
    runId: {
      type: 'string',
      description: 'Identifier of this run, as found in the server logs',
    },
    ticketId: {
      type: 'string',
      description: 'Key of the created Jira ticket, empty when none was created',
    },
    ticketUrl: {
      type: 'string',
      description: 'Browse URL of the created Jira ticket',
    },
    finalResponse: {
      type: 'string',
      description: 'Human-readable outcome of the run',
    },
    errorMessage: {
      type: 'string',
      description: 'Failure description, empty on success',
    },
  },
  required: ['runId', 'finalResponse'],
};
