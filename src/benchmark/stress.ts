/**
 * Stress Runner — many seeded runs with random contract breaks and email
 * leaks. Every non-RUN outcome becomes an incident: its audit rows are
 * HMAC-signed and optionally saved, and it joins a bounded HITL queue.
 */

import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { Orchestrator } from '../orchestrator/orchestrator.js';
import { createSeededResolver } from '../hitl/resolvers.js';
import { HitlQueue } from '../hitl/queue.js';
import { rowsHaveAtSign } from '../audit/redact.js';
import { DEMO_KEY, signRow } from '../audit/integrity.js';
import type { ArlRow } from '../audit/schema.js';
import { ConfigError } from '../core/errors.js';
import { TASK_KINDS, type Decision } from '../core/types.js';
import { getLogger } from '../core/logger.js';
import type { FaultPlan } from '../orchestrator/types.js';
import { chance, mulberry32, type Rng } from '../utils/random.js';
import { Timer } from '../utils/timer.js';
import {
  StressConfigSchema,
  type StressConfig,
  type StressConfigInput,
  type StressIncident,
  type StressReport,
  type StressRunSummary,
} from './types.js';

export const ARL_FILE_SUFFIX = '.arl.jsonl';

export interface StressRunnerOptions {
  /** HMAC key for incident rows. Defaults to the demo key. */
  key?: Buffer | string;
}

export function incidentFileName(incidentId: string, runIndex: number): string {
  return `${incidentId}__${runIndex}${ARL_FILE_SUFFIX}`;
}

/** Highest count first, ties by name. */
export function topKey(counts: Record<string, number>): string | null {
  const entries = Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  return entries.length > 0 ? entries[0][0] : null;
}

/** Draw per-task faults for one run. Order of draws is fixed: kind by kind, break then leak. */
export function drawFaults(rng: Rng, faultRate: number, leakRate: number): FaultPlan {
  const plan: FaultPlan = {};
  for (const kind of TASK_KINDS) {
    const breakContract = chance(rng, faultRate);
    const leakEmail = chance(rng, leakRate);
    if (breakContract || leakEmail) plan[kind] = { breakContract, leakEmail };
  }
  return plan;
}

function countExistingArl(dir: string): number {
  if (!existsSync(dir)) return 0;
  return readdirSync(dir).filter(f => f.endsWith(ARL_FILE_SUFFIX)).length;
}

export class StressRunner {
  private readonly config: StressConfig;
  private readonly key: Buffer | string;
  private readonly logger = getLogger();

  constructor(config: StressConfigInput = {}, options: StressRunnerOptions = {}) {
    const parsed = StressConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      throw new ConfigError(`Invalid stress config: ${issues.join('; ')}`);
    }
    this.config = parsed.data;
    this.key = options.key ?? DEMO_KEY;
  }

  async run(orchestrator: Orchestrator = new Orchestrator()): Promise<StressReport> {
    const c = this.config;
    const timer = new Timer();
    const rng = mulberry32(c.seed);
    const resolver = createSeededResolver({ seed: c.seed, pContinue: c.pContinue });
    const queue = new HitlQueue(c.queueMax);

    const byDecision: Record<Decision, number> = { RUN: 0, PAUSE_FOR_HITL: 0, STOPPED: 0 };
    const byReasonCode: Record<string, number> = {};
    const summaries: StressRunSummary[] = [];
    const recent: Decision[] = [];
    const incidents: StressIncident[] = [];

    let sealedRuns = 0;
    let atSignViolations = 0;
    let arlSaved = 0;
    let arlSkipped = 0;
    let existingArl = 0;

    if (c.arlDir) {
      mkdirSync(c.arlDir, { recursive: true });
      existingArl = countExistingArl(c.arlDir);
    }

    for (let i = 1; i <= c.runs; i++) {
      const faults = drawFaults(rng, c.faultRate, c.leakRate);
      const result = await orchestrator.runInMemory(c.prompt, {
        runId: `STRESS#${i}`,
        faults,
        resolver,
        overallPolicy: 'iep',
        maxAttemptsPerTask: c.maxAttemptsPerTask,
        acc: { enableRunawaySeal: c.enableRunawaySeal, runawayThreshold: c.runawayThreshold },
      });

      const { decision, reasonCode, sealed } = result.outcome;
      byDecision[decision]++;
      if (sealed) sealedRuns++;
      if (rowsHaveAtSign(result.rows)) atSignViolations++;

      recent.push(decision);
      if (recent.length > c.fullContextN) recent.shift();

      const summary: StressRunSummary = {
        runIndex: i,
        runId: result.runId,
        decision,
        reasonCode,
        sealed,
        incidentId: null,
        arlPath: null,
      };

      if (decision !== 'RUN') {
        byReasonCode[reasonCode] = (byReasonCode[reasonCode] ?? 0) + 1;
        const incidentId = `INC#${incidents.length + 1}`;
        summary.incidentId = incidentId;

        if (c.arlDir) {
          if (c.maxArlFiles === -1 || existingArl + arlSaved < c.maxArlFiles) {
            summary.arlPath = this.saveIncident(c.arlDir, incidentFileName(incidentId, i), result.rows);
            arlSaved++;
          } else {
            arlSkipped++;
          }
        }

        const lastRow = result.rows[result.rows.length - 1];
        const incident: StressIncident = {
          incidentId,
          runId: result.runId,
          ts: lastRow ? lastRow.ts : new Date().toISOString(),
          reasonCode,
          decision,
          sealed,
          arlPath: summary.arlPath ?? undefined,
          recentContext: c.fullContextN > 0 ? [...recent] : [],
        };
        incidents.push(incident);
        queue.push(incident);
      }

      summaries.push(summary);
    }

    const seconds = Math.max(1e-9, timer.stop() / 1000);
    const queued = new Set(queue.items().map(item => item.incidentId));

    const report: StressReport = {
      config: { ...c, arlDir: c.arlDir ?? null },
      runs: c.runs,
      byDecision,
      byReasonCode,
      topReasonCode: topKey(byReasonCode),
      sealedRuns,
      incidents: incidents.length,
      arlSaved,
      arlSkipped,
      queueSize: queue.size,
      queueDropped: queue.dropped,
      atSignViolations,
      runsPerSec: c.runs / seconds,
      runsKept: c.keepRuns ? summaries : summaries.slice(0, c.sampleRuns),
      queue: incidents.filter(inc => queued.has(inc.incidentId)),
    };

    this.logger.info(
      { runs: c.runs, incidents: incidents.length, sealedRuns, arlSaved, arlSkipped, queueDropped: queue.dropped },
      'Stress run complete',
    );
    return report;
  }

  private saveIncident(dir: string, fileName: string, rows: readonly ArlRow[]): string {
    const path = join(dir, fileName);
    const lines = rows.map(row => JSON.stringify(signRow(this.key, row)));
    writeFileSync(path, lines.join('\n') + '\n', 'utf-8');
    return path;
  }
}

export interface StressOutputPaths {
  resultsJson?: string;
  queueJson?: string;
  queueCsv?: string;
}

function writeFileWithDir(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}

/** Write whichever of the report, queue JSON and queue CSV have a path. Returns the written paths. */
export function writeStressOutputs(report: StressReport, paths: StressOutputPaths): string[] {
  const written: string[] = [];
  if (paths.resultsJson) {
    writeFileWithDir(paths.resultsJson, JSON.stringify(report, null, 2) + '\n');
    written.push(paths.resultsJson);
  }
  if (paths.queueJson) {
    writeFileWithDir(paths.queueJson, JSON.stringify(report.queue, null, 2) + '\n');
    written.push(paths.queueJson);
  }
  if (paths.queueCsv) {
    const queue = new HitlQueue(Math.max(1, report.queue.length));
    for (const item of report.queue) queue.push(item);
    writeFileWithDir(paths.queueCsv, queue.toCsv());
    written.push(paths.queueCsv);
  }
  return written;
}
