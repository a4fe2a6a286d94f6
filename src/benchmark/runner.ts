/**
 * Benchmark Runner — drives the orchestrator N times with a seeded HITL
 * resolver and aggregates safety metrics into a BenchmarkReport.
 *
 * A run that throws counts as a crash; the suite keeps going.
 */

import { Orchestrator } from '../orchestrator/orchestrator.js';
import { createSeededResolver } from '../hitl/resolvers.js';
import { rowsHaveAtSign } from '../audit/redact.js';
import { combineSignatures, semanticSignature } from '../audit/signature.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import type { OverallDecision } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import { Timer } from '../utils/timer.js';
import type { BenchmarkConfig, BenchmarkReport } from './types.js';

export const BENCHMARK_DEFAULTS = {
  enableRunawaySeal: false,
  runawayThreshold: 10,
  maxAttemptsPerTask: 3,
  runIdPrefix: 'RUN',
} as const;

export function emptyDecisionCounts(): Record<OverallDecision, number> {
  return { RUN: 0, PAUSE_FOR_HITL: 0, STOPPED: 0, HITL: 0 };
}

export class BenchmarkRunner {
  private readonly config: Required<Omit<BenchmarkConfig, 'tasks' | 'overallPolicy'>> & Pick<BenchmarkConfig, 'tasks' | 'overallPolicy'>;
  private readonly logger = getLogger();

  constructor(config: BenchmarkConfig) {
    if (!Number.isInteger(config.runs) || config.runs < 0) {
      throw new ConfigError(`runs must be a non-negative integer (got ${config.runs})`);
    }
    this.config = {
      ...config,
      faults: config.faults ?? {},
      enableRunawaySeal: config.enableRunawaySeal ?? BENCHMARK_DEFAULTS.enableRunawaySeal,
      runawayThreshold: config.runawayThreshold ?? BENCHMARK_DEFAULTS.runawayThreshold,
      maxAttemptsPerTask: config.maxAttemptsPerTask ?? BENCHMARK_DEFAULTS.maxAttemptsPerTask,
      runIdPrefix: config.runIdPrefix ?? BENCHMARK_DEFAULTS.runIdPrefix,
    };
  }

  /** Run the whole suite and return the report */
  async run(orchestrator: Orchestrator = new Orchestrator()): Promise<BenchmarkReport> {
    const c = this.config;
    const timer = new Timer();
    const resolver = createSeededResolver({ seed: c.seed, pContinue: c.pContinue });

    const decisionCounts = emptyDecisionCounts();
    const signatures: string[] = [];
    let crashes = 0;
    let atSignViolations = 0;
    let sealEvents = 0;
    let hitlRequestedRuns = 0;
    let lastError: string | null = null;

    for (let i = 0; i < c.runs; i++) {
      try {
        const result = await orchestrator.runInMemory(c.prompt, {
          runId: `${c.runIdPrefix}#${i}`,
          faults: c.faults,
          resolver,
          tasks: c.tasks,
          overallPolicy: c.overallPolicy,
          maxAttemptsPerTask: c.maxAttemptsPerTask,
          acc: { enableRunawaySeal: c.enableRunawaySeal, runawayThreshold: c.runawayThreshold },
        });
        decisionCounts[result.decision]++;
        if (rowsHaveAtSign(result.rows)) atSignViolations++;
        sealEvents += result.rows.filter(r => r.event === 'AGENT_SEALED').length;
        if (result.rows.some(r => r.event === 'HITL_REQUESTED')) hitlRequestedRuns++;
        signatures.push(semanticSignature(result.rows));
      } catch (err) {
        crashes++;
        lastError = errorMessage(err);
        signatures.push(`crash:${lastError}`);
        this.logger.error({ run: i, error: lastError }, 'Benchmark run crashed');
      }
    }

    const seconds = Math.max(1e-9, timer.stop() / 1000);
    const report: BenchmarkReport = {
      prompt: c.prompt,
      runs: c.runs,
      seed: c.seed,
      pContinue: c.pContinue,
      enableRunawaySeal: c.enableRunawaySeal,
      runawayThreshold: c.runawayThreshold,
      maxAttemptsPerTask: c.maxAttemptsPerTask,
      faults: c.faults,
      decisionCounts,
      crashes,
      crashFreeRate: (c.runs - crashes) / Math.max(1, c.runs),
      atSignViolations,
      sealEvents,
      hitlRequestedRuns,
      runsPerSec: c.runs / seconds,
      lastError,
      reproDigest: combineSignatures(signatures),
      timestamp: new Date().toISOString(),
    };

    this.logger.info({ runs: c.runs, crashes, sealEvents, decisionCounts }, 'Benchmark suite complete');
    return report;
  }

  /** Number of runs the suite will execute */
  get runCount(): number {
    return this.config.runs;
  }
}
