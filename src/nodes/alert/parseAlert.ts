/**
 * Split a monitoring alert into the parts a ticket is built from
 */

import type { ParsedAlert } from '../../types/services.js';

const ISSUE_ID = /@issue\.id:\s*([\w.-]+)/;
const STACK_FRAME = /^at\s/;
const CONDITION = /\bwas\s*[<>]=?|during the last/i;
const CHAT_MENTION = /^@slack-/;
const ERROR_TYPE = /\b([A-Z][A-Za-z]*(?:Error|Exception)):\s*(.+)$/;

export const MAX_STACK_FRAMES = 20;

export function parseAlert(message: string): ParsedAlert {
  const lines = message.trim().split(/\r?\n/);
  const issueId = ISSUE_ID.exec(message)?.[1] ?? '';

  let errorMessage = '';
  let condition = '';
  const stackFrames: string[] = [];

  // The first line is the alert title ("Triggered: ...")
  for (const rawLine of lines.slice(1)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (STACK_FRAME.test(line)) {
      stackFrames.push(line);
    } else if (CONDITION.test(line)) {
      condition = line;
    } else if (stackFrames.length === 0 && !CHAT_MENTION.test(line)) {
      // Prefer the line carrying the actual error ("TypeError: ...") over the summary
      if (!errorMessage || line.includes(':')) {
        errorMessage = line;
      }
    }
  }

  return {
    issueId,
    errorMessage,
    stackTrace: stackFrames.slice(0, MAX_STACK_FRAMES).join('\n'),
    condition,
  };
}

/**
 * "x : TypeError: undefined is not an object" -> { type: 'TypeError', detail: 'undefined is not an object' }
 */
export function describeError(errorMessage: string): { type: string; detail: string } | null {
  const match = ERROR_TYPE.exec(errorMessage);
  if (!match) return null;
  // Alerts often repeat the error after " : "
  return { type: match[1], detail: match[2].split(' : ')[0].trim() };
}

/**
 * Service named by a `service:<name>` filter in the trigger condition
 */
export function serviceFromCondition(condition: string): string | null {
  return /\bservice:([\w-]+)/.exec(condition)?.[1] ?? null;
}
