/**
 * `gatehouse run "prompt"` — one orchestrated run.
 * Writes the audit log and artifacts to disk and streams gate verdicts.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { EventBus } from '../../core/events.js';
import { configureLogger } from '../../core/logger.js';
import type { GatehouseConfigInput, HitlMode, OverallPolicy, TaskKind } from '../../core/types.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import type { SimulationResult } from '../../orchestrator/types.js';
import { resolverForMode } from '../../hitl/resolvers.js';
import { formatDuration } from '../../utils/timer.js';
import { VERSION } from '../../version.js';
import { parseHitlMode, parseInteger, parsePolicy, parseProbability, parseTaskKinds } from '../options.js';

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run a prompt through the gate pipeline')
    .argument('<prompt>', 'The request to process')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--hitl <mode>', 'HITL mode: seeded, interactive, continue, stop, none', parseHitlMode)
    .option('--seed <n>', 'Seed for the seeded HITL resolver', parseInteger)
    .option('--p-continue <p>', 'Probability the seeded resolver answers CONTINUE', parseProbability)
    .option('--tasks <kinds>', 'Comma-separated task kinds', parseTaskKinds)
    .option('--max-attempts <n>', 'Attempts per task', parseInteger)
    .option('--policy <policy>', 'Overall decision policy: iep, legacy', parsePolicy)
    .option('--audit <path>', 'Audit log (JSONL) path')
    .option('--artifacts <dir>', 'Artifact directory')
    .option('--truncate', 'Clear the audit log before the run')
    .option('--no-truncate', 'Append to the audit log')
    .option('--json', 'Output result as JSON')
    .action(async (prompt: string, options: RunCommandOptions) => {
      await executeRun(prompt, options);
    });

  return cmd;
}

export interface RunCommandOptions {
  dir: string;
  hitl?: HitlMode;
  seed?: number;
  pContinue?: number;
  tasks?: TaskKind[];
  maxAttempts?: number;
  policy?: OverallPolicy;
  audit?: string;
  artifacts?: string;
  truncate?: boolean;
  json?: boolean;
}

export function runOverrides(options: RunCommandOptions): GatehouseConfigInput {
  return {
    orchestrator: {
      tasks: options.tasks,
      maxAttemptsPerTask: options.maxAttempts,
      overallPolicy: options.policy,
      auditPath: options.audit,
      artifactDir: options.artifacts,
      truncateAuditOnStart: options.truncate,
    },
    hitl: {
      mode: options.hitl,
      seed: options.seed,
      pContinue: options.pContinue,
    },
  };
}

export async function executeRun(prompt: string, options: RunCommandOptions): Promise<void> {
  const projectDir = resolve(options.dir);
  const config = new ConfigManager(projectDir).load(runOverrides(options));
  configureLogger(config.logging);
  const events = new EventBus();

  if (!options.json) {
    console.log();
    console.log(`gatehouse v${VERSION}`);
    console.log();

    events.on('gate:verdict', (data) => {
      const sealed = data.verdict.sealed ? ' [sealed]' : '';
      console.log(`  ${data.taskId} #${data.attempt} ${data.gate.padEnd(12)} ${data.verdict.decision} ${data.verdict.reasonCode}${sealed}`);
    });
    events.on('hitl:decided', ({ request, choice }) => {
      console.log(`  ${request.taskId} HITL ${request.layer}/${request.reasonCode} -> ${choice}`);
    });
    events.on('task:complete', ({ result }) => {
      console.log(`  ${result.taskId}: ${result.decision} (${result.reasonCode})`);
    });
  }

  const orchestrator = new Orchestrator({ config, events });
  const resolver = resolverForMode(config.hitl);
  let result: SimulationResult;
  try {
    result = await orchestrator.runToFiles(prompt, {
      resolver,
      auditPath: resolve(projectDir, config.orchestrator.auditPath),
      artifactDir: resolve(projectDir, config.orchestrator.artifactDir),
      truncateAudit: config.orchestrator.truncateAuditOnStart,
    });
  } finally {
    resolver?.close?.();
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log();
  console.log('─'.repeat(60));
  console.log(`Decision: ${result.decision}  (${result.outcome.reasonCode}${result.outcome.sealed ? ', sealed' : ''})`);
  console.log(`Artifacts: ${result.artifactsWrittenTaskIds.length > 0 ? result.artifactsWrittenTaskIds.join(', ') : 'none'}`);
  console.log(`Audit: ${result.rows.length} rows -> ${config.orchestrator.auditPath}`);
  console.log(`Time: ${formatDuration(result.durationMs)}`);
  console.log();
}
