import { nanoid } from 'nanoid';
import { GatehouseConfigSchema, type Decision, type GatehouseConfig, type Layer, type OverallDecision, type OverallPolicy, type TaskKind } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AuditTrail, JsonlAuditLog, MemoryAuditLog } from '../audit/audit-log.js';
import { safePreview } from '../audit/redact.js';
import { buildRow, type RowContext } from '../audit/schema.js';
import { GatePipeline, createDefaultGates, type EscalationResult } from '../gates/pipeline.js';
import type { GateInput } from '../gates/types.js';
import { decisionRank, pauseVerdict, runVerdict, stopVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import type { HitlResolver } from '../hitl/types.js';
import { Timer } from '../utils/timer.js';
import { TemplateDraftAgent, type DraftAgent } from './agent.js';
import { FileArtifactWriter, MemoryArtifactSink, type ArtifactSink } from './artifacts.js';
import type { RunOptions, SimulationResult, TaskFaults, TaskResult } from './types.js';

export interface OrchestratorOptions {
  config?: GatehouseConfig;
  agent?: DraftAgent;
  events?: EventBus;
}

export interface FileRunOptions extends RunOptions {
  auditPath?: string;
  artifactDir?: string;
}

interface RunState {
  runId: string;
  prompt: string;
  references: readonly string[];
  maxAttempts: number;
  faults: RunOptions['faults'];
  resolver?: HitlResolver;
  pipeline: GatePipeline;
  audit: AuditTrail;
  artifacts: ArtifactSink;
  failuresTotal: number;
  hitlRounds: number;
}

export function taskIdFor(kind: TaskKind): string {
  return `task_${kind}`;
}

/**
 * Fold task decisions into the run decision.
 *
 * `iep`: any STOPPED → STOPPED, else any pause → PAUSE_FOR_HITL, else RUN.
 * `legacy`: RUN only when every task ran, otherwise `HITL`.
 */
export function overallDecision(policy: OverallPolicy, tasks: readonly Pick<TaskResult, 'decision'>[]): OverallDecision {
  if (policy === 'legacy') {
    return tasks.every(t => t.decision === 'RUN') ? 'RUN' : 'HITL';
  }
  return tasks.reduce<Decision>(
    (worst, t) => (decisionRank(t.decision) > decisionRank(worst) ? t.decision : worst),
    'RUN',
  );
}

function taskVerdict(task: TaskResult): Verdict {
  switch (task.decision) {
    case 'RUN':
      return runVerdict(task.reasonCode);
    case 'PAUSE_FOR_HITL':
      return pauseVerdict(task.reasonCode);
    case 'STOPPED':
      return { ...stopVerdict(task.reasonCode, task.finalDecider), sealed: task.sealed };
  }
}

/** The verdict that best explains a run: a seal, else the first stop, else the first pause. */
export function runOutcome(tasks: readonly TaskResult[]): Verdict {
  const sealed = tasks.find(t => t.sealed);
  if (sealed) return taskVerdict(sealed);
  let worst: TaskResult | undefined;
  for (const t of tasks) {
    if (decisionRank(t.decision) > decisionRank(worst?.decision ?? 'RUN')) worst = t;
  }
  return worst ? taskVerdict(worst) : runVerdict(ReasonCode.OK);
}

export class Orchestrator {
  private readonly config: GatehouseConfig;
  private readonly agent: DraftAgent;
  private readonly events?: EventBus;
  private readonly logger = getLogger();

  constructor(options: OrchestratorOptions = {}) {
    this.config = options.config ?? GatehouseConfigSchema.parse({});
    this.agent = options.agent ?? new TemplateDraftAgent();
    this.events = options.events;
  }

  /** Run with an in-memory audit log and artifact store unless sinks are given. */
  async run(prompt: string, options: RunOptions = {}): Promise<SimulationResult> {
    const timer = new Timer();
    const cfg = this.config.orchestrator;
    const runId = options.runId ?? `run_${nanoid(10)}`;
    const kinds = options.tasks ?? cfg.tasks;
    const maxAttempts = options.maxAttemptsPerTask ?? cfg.maxAttemptsPerTask;
    const policy = options.overallPolicy ?? cfg.overallPolicy;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigError(`maxAttemptsPerTask must be an integer >= 1 (got ${maxAttempts})`);
    }
    if (new Set(kinds).size !== kinds.length) {
      throw new ConfigError(`Task list has duplicates: ${kinds.join(', ')}`);
    }

    const sink = options.audit ?? new MemoryAuditLog();
    sink.startRun({ truncate: options.truncateAudit ?? false });
    const audit = new AuditTrail(sink, this.events);
    const gates = createDefaultGates({
      relativity: { ...this.config.gates.relativity, ...options.relativity },
      acc: { ...this.config.gates.acc, ...options.acc },
    });

    const state: RunState = {
      runId,
      prompt,
      references: options.references ?? [],
      maxAttempts,
      faults: options.faults,
      resolver: options.resolver,
      pipeline: new GatePipeline(gates, audit, this.events),
      audit,
      artifacts: options.artifacts ?? new MemoryArtifactSink(),
      failuresTotal: 0,
      hitlRounds: 0,
    };

    this.logger.info({ runId, tasks: kinds, maxAttempts }, 'Run started');
    audit.record(buildRow('RUN_START', 'orchestrator', runVerdict(ReasonCode.PASS), { runId }, {
      evidence: { tasks: [...kinds], prompt_preview: safePreview(prompt, 120) },
    }));
    this.events?.emit('run:start', { runId, prompt, tasks: [...kinds] });

    const results: TaskResult[] = [];
    let sealedBy: TaskResult | undefined;

    for (const kind of kinds) {
      const taskId = taskIdFor(kind);
      let result: TaskResult;
      if (sealedBy) {
        const verdict = stopVerdict(ReasonCode.SKIPPED_AFTER_SEAL);
        audit.record(buildRow('TASK_SKIPPED', 'orchestrator', verdict, { runId, taskId, kind }, {
          evidence: { sealed_by: sealedBy.blockedLayer, sealed_task: sealedBy.taskId },
        }));
        result = {
          taskId,
          kind,
          decision: 'STOPPED',
          sealed: false,
          finalDecider: 'SYSTEM',
          blockedLayer: 'orchestrator',
          reasonCode: ReasonCode.SKIPPED_AFTER_SEAL,
          attempts: 0,
          artifactPath: null,
        };
      } else {
        result = await this.runTask(state, kind, taskId);
        if (result.sealed) sealedBy = result;
      }
      results.push(result);
      this.events?.emit('task:complete', { runId, result });
    }

    const decision = overallDecision(policy, results);
    const outcome = runOutcome(results);
    const doneVerdict = outcome.sealed ? stopVerdict(outcome.reasonCode) : outcome;
    audit.record(buildRow('RUN_DONE', 'orchestrator', doneVerdict, { runId }, {
      evidence: { overall: decision, policy, sealed_by: sealedBy?.blockedLayer ?? null },
    }));

    const durationMs = timer.stop();
    this.logger.info({ runId, decision, reasonCode: outcome.reasonCode, durationMs }, 'Run complete');
    this.events?.emit('run:complete', { runId, decision, durationMs });

    return {
      runId,
      decision,
      outcome,
      tasks: results,
      artifactsWrittenTaskIds: results.filter(r => r.artifactPath !== null).map(r => r.taskId),
      rows: audit.snapshot(),
      durationMs,
    };
  }

  /** In-memory audit log and artifacts. */
  runInMemory(prompt: string, options: Omit<RunOptions, 'audit' | 'artifacts'> = {}): Promise<SimulationResult> {
    return this.run(prompt, { ...options, audit: new MemoryAuditLog(), artifacts: new MemoryArtifactSink() });
  }

  /** JSONL audit log and `.txt` artifacts on disk. */
  runToFiles(prompt: string, options: FileRunOptions = {}): Promise<SimulationResult> {
    const cfg = this.config.orchestrator;
    const { auditPath, artifactDir, ...rest } = options;
    return this.run(prompt, {
      ...rest,
      audit: new JsonlAuditLog(auditPath ?? cfg.auditPath),
      artifacts: new FileArtifactWriter(artifactDir ?? cfg.artifactDir),
      truncateAudit: options.truncateAudit ?? cfg.truncateAuditOnStart,
    });
  }

  private async runTask(state: RunState, kind: TaskKind, taskId: string): Promise<TaskResult> {
    const { runId, pipeline, audit } = state;
    const faults: TaskFaults = state.faults?.[kind] ?? {};
    const ctx = (attempt?: number): RowContext => ({ runId, taskId, kind, attempt });
    const input = (attempt: number, extra: Partial<GateInput> = {}): GateInput => ({
      runId,
      taskId,
      kind,
      prompt: state.prompt,
      attempt,
      references: state.references,
      failuresTotal: state.failuresTotal,
      hitlRounds: state.hitlRounds,
      ...extra,
    });

    const finish = (
      decision: TaskResult['decision'],
      layer: Layer | null,
      verdict: Pick<Verdict, 'reasonCode' | 'sealed' | 'finalDecider'>,
      attempts: number,
    ): TaskResult => {
      const result: TaskResult = {
        taskId,
        kind,
        decision,
        sealed: verdict.sealed,
        finalDecider: verdict.finalDecider,
        blockedLayer: layer,
        reasonCode: verdict.reasonCode,
        attempts,
        artifactPath: null,
      };
      const skipped = decision === 'PAUSE_FOR_HITL'
        ? pauseVerdict(verdict.reasonCode)
        : stopVerdict(verdict.reasonCode, verdict.finalDecider);
      audit.record(buildRow('ARTIFACT_SKIPPED', 'dispatch', skipped, ctx(attempts || undefined), {
        evidence: layer ? { blocked_layer: layer } : undefined,
      }));
      this.logger.info({ runId, taskId, decision, layer, reasonCode: verdict.reasonCode }, 'Task blocked');
      return result;
    };

    /** Resolve a HITL answer into a task ending, or null to keep going. */
    const afterHitl = (layer: Layer, choice: EscalationResult, attempts: number): TaskResult | null => {
      if (choice === 'CONTINUE') return null;
      if (choice === 'STOP') {
        return finish('STOPPED', layer, { reasonCode: ReasonCode.HITL_STOP, sealed: false, finalDecider: 'USER' }, attempts);
      }
      return finish('PAUSE_FOR_HITL', layer, { reasonCode: ReasonCode.HITL_PENDING, sealed: false, finalDecider: 'SYSTEM' }, attempts);
    };

    const escalate = (layer: Layer, verdict: Verdict, gateInput: GateInput): Promise<EscalationResult> => {
      state.hitlRounds++;
      return pipeline.escalate(layer, verdict, gateInput, state.resolver);
    };

    audit.record(buildRow('TASK_ASSIGNED', 'orchestrator', runVerdict(ReasonCode.PASS), ctx()));

    // Meaning: once per task
    const meaning = (await pipeline.pass('meaning', input(0))).verdict;
    if (meaning.decision === 'STOPPED') return finish('STOPPED', 'meaning', meaning, 0);
    if (meaning.decision === 'PAUSE_FOR_HITL') {
      const ended = afterHitl('meaning', await escalate('meaning', meaning, input(0)), 0);
      if (ended) return ended;
    }

    for (let attempt = 1; ; attempt++) {
      audit.record(buildRow('ATTEMPT', 'orchestrator', runVerdict(ReasonCode.PASS), ctx(attempt), {
        evidence: { max_attempts: state.maxAttempts },
      }));

      const output = this.agent.generate(state.prompt, kind, attempt, faults);
      audit.record(buildRow('AGENT_OUTPUT', 'agent', runVerdict(ReasonCode.OK), ctx(attempt), {
        preview: safePreview(output.safeText),
      }));
      const draftInput = (): GateInput => input(attempt, { draft: output.draft, rawText: output.rawText });

      const consistency = (await pipeline.pass('consistency', draftInput())).verdict;
      if (consistency.decision === 'STOPPED') return finish('STOPPED', 'consistency', consistency, attempt);

      if (consistency.decision === 'PAUSE_FOR_HITL') {
        state.failuresTotal++;
        const acc = (await pipeline.pass('acc', draftInput())).verdict;
        if (acc.decision === 'STOPPED') return finish('STOPPED', 'acc', acc, attempt);

        if (attempt >= state.maxAttempts) {
          const exhausted = stopVerdict(ReasonCode.RETRY_EXHAUSTED);
          audit.record(buildRow('RETRY_EXHAUSTED', 'orchestrator', exhausted, ctx(attempt), {
            evidence: { last_reason: consistency.reasonCode },
          }));
          return finish('STOPPED', 'consistency', exhausted, attempt);
        }

        const choice = await escalate('consistency', consistency, draftInput());
        const ended = afterHitl('consistency', choice, attempt);
        if (ended) return ended;

        audit.record(buildRow('REGEN_REQUESTED', 'orchestrator', runVerdict(ReasonCode.REGEN_FOR_CONSISTENCY), ctx(attempt), {
          evidence: { next_attempt: attempt + 1, last_reason: consistency.reasonCode },
        }));
        continue;
      }

      const rfl = (await pipeline.pass('rfl', draftInput())).verdict;
      if (rfl.decision === 'STOPPED') return finish('STOPPED', 'rfl', rfl, attempt);
      if (rfl.decision === 'PAUSE_FOR_HITL') {
        const ended = afterHitl('rfl', await escalate('rfl', rfl, draftInput()), attempt);
        if (ended) return ended;
      }

      const ethics = (await pipeline.pass('ethics', draftInput())).verdict;
      if (ethics.decision !== 'RUN') return finish('STOPPED', 'ethics', ethics, attempt);

      const acc = (await pipeline.pass('acc', draftInput())).verdict;
      if (acc.decision !== 'RUN') return finish('STOPPED', 'acc', acc, attempt);

      // Dispatch: only redacted text leaves memory
      const artifactPath = state.artifacts.write(taskId, kind, output.safeText);
      audit.record(buildRow('ARTIFACT_WRITTEN', 'dispatch', runVerdict(ReasonCode.ARTIFACT_WRITTEN), ctx(attempt), {
        artifact_path: artifactPath,
      }));
      audit.record(buildRow('TASK_DONE', 'orchestrator', runVerdict(ReasonCode.OK), ctx(attempt)));

      return {
        taskId,
        kind,
        decision: 'RUN',
        sealed: false,
        finalDecider: 'SYSTEM',
        blockedLayer: null,
        reasonCode: ReasonCode.OK,
        attempts: attempt,
        artifactPath,
      };
    }
  }
}
