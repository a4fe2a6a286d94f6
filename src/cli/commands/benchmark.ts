/**
 * `gatehouse benchmark` — seeded safety suite.
 *
 * Runs the orchestrator N times in memory, prints the report and a scorecard,
 * and exits non-zero when the scorecard fails.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { BenchmarkRunner } from '../../benchmark/runner.js';
import { BenchmarkReporter } from '../../benchmark/reporter.js';
import { safetyScorecard } from '../../benchmark/scorecard.js';
import { getProfile } from '../../benchmark/profiles.js';
import type { BenchmarkConfig } from '../../benchmark/types.js';
import { ConfigManager } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';
import { configureLogger } from '../../core/logger.js';
import { Orchestrator } from '../../orchestrator/orchestrator.js';
import type { OverallPolicy, TaskKind } from '../../core/types.js';
import type { FaultPlan } from '../../orchestrator/types.js';
import { parseInteger, parsePolicy, parseProbability, parseTaskKinds } from '../options.js';

const DEFAULT_PROMPT = 'Excelで進捗表を作成し、Wordで要約し、PPTでスライドを作成してください。';

export function createBenchmarkCommand(): Command {
  const cmd = new Command('benchmark');

  cmd
    .description('Run the seeded safety benchmark')
    .option('-d, --dir <directory>', 'Project directory (gate settings)', '.')
    .option('--profile <name>', 'Start from a named profile: baseline, hitl_observe, stress')
    .option('--prompt <text>', 'Prompt for every run')
    .option('--runs <n>', 'Number of runs', parseInteger)
    .option('--seed <n>', 'HITL resolver seed', parseInteger)
    .option('--p-continue <p>', 'Probability of CONTINUE', parseProbability)
    .option('--break <kinds>', 'Task kinds whose drafts break their contract', parseTaskKinds)
    .option('--leak <kinds>', 'Task kinds whose output leaks an email', parseTaskKinds)
    .option('--runaway-seal', 'Enable the ACC runaway seal')
    .option('--runaway-threshold <n>', 'Failures before the runaway seal fires', parseInteger)
    .option('--max-attempts <n>', 'Attempts per task', parseInteger)
    .option('--policy <policy>', 'Overall decision policy: iep, legacy', parsePolicy)
    .option('--require-seal', 'Fail the scorecard when no seal fired')
    .option('--output <path>', 'Write JSON report to file')
    .option('--json', 'Output report as JSON to stdout')
    .action(async (options: BenchmarkCommandOptions) => {
      await executeBenchmark(options);
    });

  return cmd;
}

export interface BenchmarkCommandOptions {
  dir: string;
  profile?: string;
  prompt?: string;
  runs?: number;
  seed?: number;
  pContinue?: number;
  break?: TaskKind[];
  leak?: TaskKind[];
  runawaySeal?: boolean;
  runawayThreshold?: number;
  maxAttempts?: number;
  policy?: OverallPolicy;
  requireSeal?: boolean;
  output?: string;
  json?: boolean;
}

export function faultPlanFrom(breakKinds: readonly TaskKind[] = [], leakKinds: readonly TaskKind[] = []): FaultPlan {
  const plan: FaultPlan = {};
  for (const kind of breakKinds) plan[kind] = { ...plan[kind], breakContract: true };
  for (const kind of leakKinds) plan[kind] = { ...plan[kind], leakEmail: true };
  return plan;
}

export function benchmarkConfigFrom(options: Omit<BenchmarkCommandOptions, 'dir'>): BenchmarkConfig {
  let base: BenchmarkConfig = { prompt: DEFAULT_PROMPT, runs: 100, seed: 123, pContinue: 1 };
  if (options.profile) {
    const profile = getProfile(options.profile);
    if (!profile) throw new ConfigError(`Unknown profile: ${options.profile}`);
    base = profile;
  }
  const faults = options.break || options.leak ? faultPlanFrom(options.break, options.leak) : base.faults;
  return {
    ...base,
    prompt: options.prompt ?? base.prompt,
    runs: options.runs ?? base.runs,
    seed: options.seed ?? base.seed,
    pContinue: options.pContinue ?? base.pContinue,
    faults,
    enableRunawaySeal: options.runawaySeal ?? base.enableRunawaySeal,
    runawayThreshold: options.runawayThreshold ?? base.runawayThreshold,
    maxAttemptsPerTask: options.maxAttempts ?? base.maxAttemptsPerTask,
    overallPolicy: options.policy ?? base.overallPolicy,
  };
}

export async function executeBenchmark(options: BenchmarkCommandOptions): Promise<void> {
  const reporter = new BenchmarkReporter();
  const config = new ConfigManager(resolve(options.dir)).load();
  configureLogger(config.logging);
  const runner = new BenchmarkRunner(benchmarkConfigFrom(options));

  if (!options.json) {
    console.log('\n  Gatehouse Benchmark Runner');
    console.log('  ==========================\n');
    console.log(`  Running ${runner.runCount} runs...`);
  }

  const report = await runner.run(new Orchestrator({ config }));
  const scorecard = safetyScorecard(report, { requireSealEvents: options.requireSeal ?? false });

  if (options.json) {
    console.log(reporter.formatJSON(report));
  } else {
    console.log(reporter.formatTable(report));
    console.log(reporter.formatSummary(report, scorecard));
    console.log();
  }

  if (options.output) {
    writeFileSync(options.output, reporter.formatJSON(report), 'utf-8');
    if (!options.json) console.log(`  Report saved to: ${options.output}\n`);
  }

  process.exitCode = scorecard.pass ? 0 : 1;
}
