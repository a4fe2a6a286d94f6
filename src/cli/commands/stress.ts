/**
 * `gatehouse stress` — randomized fault and leak injection over many runs.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { StressRunner, writeStressOutputs } from '../../benchmark/stress.js';
import { BenchmarkReporter } from '../../benchmark/reporter.js';
import type { StressConfigInput } from '../../benchmark/types.js';
import { ConfigManager } from '../../core/config.js';
import { configureLogger } from '../../core/logger.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import { loadIntegrityKey } from '../../audit/integrity.js';
import { parseInteger, parseProbability } from '../options.js';

export function createStressCommand(): Command {
  const cmd = new Command('stress');

  cmd
    .description('Stress the gates with random contract breaks and email leaks')
    .option('--runs <n>', 'Number of runs', parseInteger)
    .option('--seed <n>', 'Seed for fault draws and the HITL resolver', parseInteger)
    .option('--prompt <text>', 'Prompt for every run')
    .option('--fault-rate <p>', 'Per-task probability of a broken contract', parseProbability)
    .option('--leak-rate <p>', 'Per-task probability of an email leak', parseProbability)
    .option('--p-continue <p>', 'Probability of CONTINUE', parseProbability)
    .option('--max-attempts <n>', 'Attempts per task', parseInteger)
    .option('--no-runaway-seal', 'Disable the ACC runaway seal')
    .option('--runaway-threshold <n>', 'Failures before the runaway seal fires', parseInteger)
    .option('--arl-dir <dir>', 'Save signed incident audit rows here')
    .option('--max-arl-files <n>', 'Cap on saved incident files (-1 = unlimited)', parseInteger)
    .option('--queue-max <n>', 'HITL queue capacity', parseInteger)
    .option('--keep-runs', 'Keep every run summary in the results')
    .option('--sample-runs <n>', 'Run summaries kept when --keep-runs is off', parseInteger)
    .option('--full-context-n <n>', 'Recent decisions attached to each incident', parseInteger)
    .option('-d, --dir <directory>', 'Project directory (gate settings, integrity key)', '.')
    .option('--results-json <path>', 'Write the full report')
    .option('--queue-json <path>', 'Write the HITL queue as JSON')
    .option('--queue-csv <path>', 'Write the HITL queue as CSV')
    .option('--json', 'Output report as JSON to stdout')
    .action(async (options: StressCommandOptions) => {
      await executeStress(options);
    });

  return cmd;
}

export interface StressCommandOptions {
  runs?: number;
  seed?: number;
  prompt?: string;
  faultRate?: number;
  leakRate?: number;
  pContinue?: number;
  maxAttempts?: number;
  runawaySeal?: boolean;
  runawayThreshold?: number;
  arlDir?: string;
  maxArlFiles?: number;
  queueMax?: number;
  keepRuns?: boolean;
  sampleRuns?: number;
  fullContextN?: number;
  dir: string;
  resultsJson?: string;
  queueJson?: string;
  queueCsv?: string;
  json?: boolean;
}

export function stressConfigFrom(options: StressCommandOptions): StressConfigInput {
  return {
    runs: options.runs,
    seed: options.seed,
    prompt: options.prompt,
    faultRate: options.faultRate,
    leakRate: options.leakRate,
    pContinue: options.pContinue,
    maxAttemptsPerTask: options.maxAttempts,
    enableRunawaySeal: options.runawaySeal,
    runawayThreshold: options.runawayThreshold,
    arlDir: options.arlDir,
    maxArlFiles: options.maxArlFiles,
    queueMax: options.queueMax,
    keepRuns: options.keepRuns,
    sampleRuns: options.sampleRuns,
    fullContextN: options.fullContextN,
  };
}

export async function executeStress(options: StressCommandOptions): Promise<void> {
  const reporter = new BenchmarkReporter();
  const config = new ConfigManager(resolve(options.dir)).load();
  configureLogger(config.logging);
  const key = options.arlDir ? loadIntegrityKey(config.integrity) : undefined;

  const report = await new StressRunner(stressConfigFrom(options), { key }).run(new Orchestrator({ config }));
  const written = writeStressOutputs(report, {
    resultsJson: options.resultsJson,
    queueJson: options.queueJson,
    queueCsv: options.queueCsv,
  });

  if (options.json) {
    console.log(reporter.formatJSON(report));
    return;
  }

  console.log(reporter.formatStress(report));
  for (const path of written) console.log(`  Wrote ${path}`);
  if (written.length > 0) console.log();
}
