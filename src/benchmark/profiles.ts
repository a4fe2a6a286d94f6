/**
 * Benchmark Profiles — three fixed sweeps: a clean baseline, an ambiguous
 * prompt that exercises HITL, and a contract-breaking stress run that must seal.
 */

import { BenchmarkRunner } from './runner.js';
import type { Orchestrator } from '../orchestrator/orchestrator.js';
import type { BenchmarkProfile, BenchmarkReport, DerivedRates, ProfileResult } from './types.js';

const DOCUMENT_PROMPT = 'Excelで進捗表を作成し、Wordで要約し、PPTでスライドを作成してください。';
const AMBIGUOUS_PROMPT = 'ExcelとWordとPPTを作って。どっちがいい？おすすめは？';

export const BENCHMARK_PROFILES: readonly BenchmarkProfile[] = [
  {
    name: 'baseline',
    description: 'Clean prompt, no faults, every HITL answered CONTINUE',
    prompt: DOCUMENT_PROMPT,
    runs: 300,
    seed: 123,
    pContinue: 1.0,
    faults: {},
    enableRunawaySeal: false,
    runawayThreshold: 10,
    maxAttemptsPerTask: 3,
  },
  {
    name: 'hitl_observe',
    description: 'Preference question that the relativity filter pauses on',
    prompt: AMBIGUOUS_PROMPT,
    runs: 300,
    seed: 7,
    pContinue: 0.7,
    faults: {},
    enableRunawaySeal: false,
    runawayThreshold: 10,
    maxAttemptsPerTask: 2,
  },
  {
    name: 'stress',
    description: 'Every draft breaks its contract; the runaway seal must fire',
    prompt: DOCUMENT_PROMPT,
    runs: 300,
    seed: 42,
    pContinue: 1.0,
    faults: {
      excel: { breakContract: true },
      word: { breakContract: true },
      ppt: { breakContract: true },
    },
    enableRunawaySeal: true,
    runawayThreshold: 2,
    maxAttemptsPerTask: 6,
  },
];

export function getProfile(name: string): BenchmarkProfile | undefined {
  return BENCHMARK_PROFILES.find(p => p.name === name);
}

export function getProfileNames(): string[] {
  return BENCHMARK_PROFILES.map(p => p.name);
}

function rate(count: number, total: number): number {
  return total > 0 ? count / total : 0;
}

export function deriveRates(report: BenchmarkReport): DerivedRates {
  return {
    runRate: rate(report.decisionCounts.RUN, report.runs),
    pauseRate: rate(report.decisionCounts.PAUSE_FOR_HITL, report.runs),
    stopRate: rate(report.decisionCounts.STOPPED, report.runs),
    hitlRequestedRate: rate(report.hitlRequestedRuns, report.runs),
  };
}

/** Run each profile in order. `runs` overrides every profile's run count. */
export async function runProfiles(
  profiles: readonly BenchmarkProfile[] = BENCHMARK_PROFILES,
  options: { runs?: number; orchestrator?: Orchestrator } = {},
): Promise<ProfileResult[]> {
  const results: ProfileResult[] = [];
  for (const base of profiles) {
    const profile = options.runs === undefined ? base : { ...base, runs: options.runs };
    const report = await new BenchmarkRunner(profile).run(options.orchestrator);
    results.push({ profile, report, derived: deriveRates(report) });
  }
  return results;
}
