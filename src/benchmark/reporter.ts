/**
 * Benchmark Reporter — Formats suite, profile and stress results for display
 * and export.
 *
 * ASCII tables for terminals, JSON for files, and one-line summaries for CI.
 */

import type { SimulationResult } from '../orchestrator/types.js';
import type { BenchmarkReport, ProfileResult, Scorecard, StressReport } from './types.js';

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export class BenchmarkReporter {
  /** Format a suite report as an ASCII table for terminal display */
  formatTable(report: BenchmarkReport): string {
    const lines: string[] = [];
    const sep = '─'.repeat(60);

    lines.push(`\n  Gatehouse Benchmark Report`);
    lines.push(`  Runs: ${report.runs}  |  Seed: ${report.seed}  |  p(CONTINUE): ${report.pContinue}`);
    lines.push(`  ${report.timestamp}`);
    lines.push(`  ${sep}`);
    lines.push(`  ${'Decision'.padEnd(20)} ${'Runs'.padEnd(8)} ${'Share'.padEnd(8)}`);
    lines.push(`  ${sep}`);

    for (const [decision, count] of Object.entries(report.decisionCounts)) {
      if (decision === 'HITL' && count === 0) continue;
      const share = report.runs > 0 ? count / report.runs : 0;
      lines.push(`  ${decision.padEnd(20)} ${String(count).padEnd(8)} ${pct(share).padEnd(8)}`);
    }

    lines.push(`  ${sep}`);
    lines.push(`  Crash-free: ${pct(report.crashFreeRate)}  |  '@' violations: ${report.atSignViolations}  |  Seal events: ${report.sealEvents}`);
    lines.push(`  HITL requested in ${report.hitlRequestedRuns} runs  |  ${report.runsPerSec.toFixed(1)} runs/s`);
    lines.push(`  Repro digest: ${report.reproDigest}`);
    if (report.lastError) lines.push(`  Last error: ${report.lastError}`);

    lines.push('');
    return lines.join('\n');
  }

  /** Format any report as JSON string for file export */
  formatJSON(report: BenchmarkReport | StressReport | ProfileResult[]): string {
    return JSON.stringify(report, null, 2);
  }

  /** Format a brief summary (for CI output) */
  formatSummary(report: BenchmarkReport, scorecard?: Scorecard): string {
    const d = report.decisionCounts;
    const lines = [
      `Gatehouse Benchmark: ${report.runs} runs (RUN=${d.RUN} PAUSE_FOR_HITL=${d.PAUSE_FOR_HITL} STOPPED=${d.STOPPED})`,
      `Crashes: ${report.crashes} | '@' violations: ${report.atSignViolations} | Seal events: ${report.sealEvents}`,
    ];
    if (scorecard) {
      lines.push(`Scorecard: ${scorecard.pass ? 'PASS' : `FAIL (${scorecard.failReasons.join(', ')})`}`);
    }
    return lines.join('\n');
  }

  /** Format a single run as a one-liner */
  formatResult(result: SimulationResult): string {
    const tasks = result.tasks.map(t => `${t.kind}=${t.decision}`).join(' ');
    const sealed = result.outcome.sealed ? ' [sealed]' : '';
    return `[${result.decision}] ${result.runId} — ${result.outcome.reasonCode}${sealed} (${tasks})`;
  }

  formatProfiles(results: readonly ProfileResult[]): string {
    const lines: string[] = [];
    const sep = '─'.repeat(72);
    lines.push(`\n  Gatehouse Profiles`);
    lines.push(`  ${sep}`);
    lines.push(`  ${'Profile'.padEnd(14)} ${'Runs'.padEnd(6)} ${'RUN'.padEnd(8)} ${'PAUSE'.padEnd(8)} ${'STOP'.padEnd(8)} ${'HITL req'.padEnd(9)} ${'Seals'.padEnd(6)}`);
    lines.push(`  ${sep}`);
    for (const { profile, report, derived } of results) {
      lines.push(
        `  ${profile.name.padEnd(14)} ${String(report.runs).padEnd(6)} ${pct(derived.runRate).padEnd(8)} ${pct(derived.pauseRate).padEnd(8)} ${pct(derived.stopRate).padEnd(8)} ${pct(derived.hitlRequestedRate).padEnd(9)} ${String(report.sealEvents).padEnd(6)}`,
      );
    }
    lines.push(`  ${sep}`);
    lines.push('');
    return lines.join('\n');
  }

  formatStress(report: StressReport): string {
    const lines: string[] = [];
    const d = report.byDecision;
    lines.push(`\n  Gatehouse Stress Report`);
    lines.push(`  Runs: ${report.runs}  |  Seed: ${report.config.seed}  |  Fault rate: ${report.config.faultRate}  |  Leak rate: ${report.config.leakRate}`);
    lines.push(`  RUN=${d.RUN}  PAUSE_FOR_HITL=${d.PAUSE_FOR_HITL}  STOPPED=${d.STOPPED}  sealed=${report.sealedRuns}`);
    lines.push(`  Incidents: ${report.incidents}  |  Top reason: ${report.topReasonCode ?? '-'}`);
    lines.push(`  Queue: ${report.queueSize} kept, ${report.queueDropped} dropped`);
    if (report.config.arlDir) {
      lines.push(`  Audit files: ${report.arlSaved} saved, ${report.arlSkipped} skipped (${report.config.arlDir})`);
    }
    lines.push(`  '@' violations: ${report.atSignViolations}  |  ${report.runsPerSec.toFixed(1)} runs/s`);
    lines.push('');
    return lines.join('\n');
  }
}
