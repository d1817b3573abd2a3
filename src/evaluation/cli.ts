#!/usr/bin/env node

/**
 * Runs the golden set through the workflow and prints a summary.
 *
 *   npm run evaluate -- [--cases path] [--save] [--live]
 *
 * Tickets go to an in-memory store unless --live is given, in which case the
 * configured Jira MCP server is used.
 */

import '../config.js';
import { readFile, writeFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { parseArgs } from 'util';
import { loadPolicy } from '../workflows/alertToTicket/config.js';
import { runAlertToTicket } from '../workflows/alertToTicket/workflow.js';
import { createExtractionService, createServices } from '../services/index.js';
import { InMemoryJiraClient } from '../services/jira/inMemoryJiraClient.js';
import { MCPClientManager } from '../utils/mcpClient.js';
import { logger } from '../utils/logger.js';
import { EvaluationSetSchema, formatSummary, runEvaluation } from './evaluate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, '..', '..', 'fixtures');

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      cases: { type: 'string', default: join(fixturesDir, 'golden-set.json') },
      save: { type: 'boolean', short: 's', default: false },
      live: { type: 'boolean', default: false },
    },
  });

  const casesPath = values.cases ?? join(fixturesDir, 'golden-set.json');
  const cases = EvaluationSetSchema.parse(JSON.parse(await readFile(casesPath, 'utf-8')));
  const policy = loadPolicy();
  const mcpManager = new MCPClientManager();

  const extraction = createExtractionService(process.env, policy);
  const tickets = values.live
    ? createServices(process.env, policy, mcpManager).tickets
    : new InMemoryJiraClient();

  console.log(`Running ${cases.length} cases with ${extraction.name} extraction and ${tickets.name} tickets`);

  try {
    const summary = await runEvaluation(
      cases,
      input => runAlertToTicket(input, { extraction, tickets, policy }),
      {
        onCaseFinished: (result, index, total) => {
          console.log(`[${index + 1}/${total}] ${result.passed ? '✓' : '✗'} ${result.id} - ${result.description}`);
        },
      }
    );

    console.log('');
    console.log(formatSummary(summary));

    if (values.save) {
      const stamp = summary.timestamp.replace(/[:.]/g, '-');
      const outPath = join(fixturesDir, `eval_results_${stamp}.json`);
      await writeFile(outPath, JSON.stringify(summary, null, 2));
      console.log(`\nResults saved to: ${outPath}`);
    }

    process.exitCode = summary.failed > 0 ? 1 : 0;
  } finally {
    await mcpManager.disconnectAll();
  }
}

main().catch((error) => {
  logger.error('Evaluation failed', { error });
  process.exit(1);
});
