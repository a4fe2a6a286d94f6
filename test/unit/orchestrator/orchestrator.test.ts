import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { Orchestrator, overallDecision, runOutcome, taskIdFor } from '../../../src/orchestrator/orchestrator.js';
import { assertRunInvariants, runInvariantViolations } from '../../../src/orchestrator/invariants.js';
import type { SimulationResult, TaskResult } from '../../../src/orchestrator/types.js';
import { createConstantResolver, createScriptedResolver } from '../../../src/hitl/resolvers.js';
import { readJsonl } from '../../../src/audit/audit-log.js';
import { EventBus } from '../../../src/core/events.js';
import { ConfigError, InvariantError } from '../../../src/core/errors.js';

const DOC_PROMPT = 'Excelで進捗表を作成し、Wordで要約し、PPTでスライドを作成してください。';
const AMBIGUOUS_PROMPT = 'ExcelとWordとPPTを作って。どっちがいい？おすすめは？';

const continueAll = createConstantResolver('CONTINUE');

function task(overrides: Partial<TaskResult>): TaskResult {
  return {
    taskId: 'task_excel',
    kind: 'excel',
    decision: 'RUN',
    sealed: false,
    finalDecider: 'SYSTEM',
    blockedLayer: null,
    reasonCode: 'OK',
    attempts: 1,
    artifactPath: 'mem://task_excel.xlsx.txt',
    ...overrides,
  };
}

function events(result: SimulationResult, taskId?: string): string[] {
  return result.rows.filter(r => taskId === undefined || r.task_id === taskId).map(r => r.event);
}

describe('Orchestrator', () => {
  const orchestrator = new Orchestrator();

  describe('clean run', () => {
    it('runs every task through all gates and writes artifacts', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, { runId: 'r-clean', resolver: continueAll });

      expect(result.decision).toBe('RUN');
      expect(result.outcome.reasonCode).toBe('OK');
      expect(result.tasks.map(t => t.decision)).toEqual(['RUN', 'RUN', 'RUN']);
      expect(result.artifactsWrittenTaskIds).toEqual(['task_excel', 'task_word', 'task_ppt']);
      expect(result.rows).toHaveLength(32);
      expect(events(result, 'task_excel')).toEqual([
        'TASK_ASSIGNED',
        'GATE_MEANING',
        'ATTEMPT',
        'AGENT_OUTPUT',
        'GATE_CONSISTENCY',
        'GATE_RFL',
        'GATE_ETHICS',
        'GATE_ACC',
        'ARTIFACT_WRITTEN',
        'TASK_DONE',
      ]);
      expect(result.rows[0]?.event).toBe('RUN_START');
      expect(result.rows[31]).toMatchObject({ event: 'RUN_DONE', decision: 'RUN', evidence: { overall: 'RUN', policy: 'iep' } });
      expect(runInvariantViolations(result)).toEqual([]);
    });

    it('stamps strictly increasing timestamps', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, { resolver: continueAll });
      const ts = result.rows.map(r => r.ts);
      for (let i = 1; i < ts.length; i++) {
        expect((ts[i] ?? '') > (ts[i - 1] ?? '')).toBe(true);
      }
    });

    it('generates a run id when none is given', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, { resolver: continueAll });
      expect(result.runId).toMatch(/^run_[a-z0-9]{10}$/);
    });
  });

  describe('ethics seal', () => {
    it('seals on a leaked email, skips later tasks and writes nothing for them', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, {
        runId: 'r-leak',
        resolver: continueAll,
        faults: { word: { leakEmail: true } },
      });

      expect(result.decision).toBe('STOPPED');
      expect(result.outcome).toMatchObject({ reasonCode: 'SEALED_BY_ETHICS', sealed: true });
      expect(result.tasks.map(t => [t.decision, t.reasonCode, t.sealed])).toEqual([
        ['RUN', 'OK', false],
        ['STOPPED', 'SEALED_BY_ETHICS', true],
        ['STOPPED', 'SKIPPED_AFTER_SEAL', false],
      ]);
      expect(result.tasks[1]?.blockedLayer).toBe('ethics');
      expect(result.artifactsWrittenTaskIds).toEqual(['task_excel']);
      expect(events(result, 'task_word').slice(-3)).toEqual(['GATE_ETHICS', 'AGENT_SEALED', 'ARTIFACT_SKIPPED']);
      expect(events(result, 'task_ppt')).toEqual(['TASK_SKIPPED']);
      expect(JSON.stringify(result.rows)).not.toContain('@');
      const sealRow = result.rows.find(r => r.event === 'GATE_ETHICS' && r.task_id === 'task_word');
      expect(sealRow?.evidence).toEqual({ pii_type: 'email' });

      const done = result.rows[result.rows.length - 1];
      expect(done).toMatchObject({ event: 'RUN_DONE', layer: 'orchestrator', sealed: false, reason_code: 'SEALED_BY_ETHICS' });
      expect(done?.evidence).toEqual({ overall: 'STOPPED', policy: 'iep', sealed_by: 'ethics' });
      assertRunInvariants(result);
    });
  });

  describe('consistency failures', () => {
    it('retries after a CONTINUE and recovers', async () => {
      const resolver = createScriptedResolver(['CONTINUE']);
      const result = await orchestrator.runInMemory(DOC_PROMPT, {
        runId: 'r-retry',
        resolver,
        faults: { excel: { breakContractAttempts: 1 } },
      });

      expect(result.decision).toBe('RUN');
      expect(result.tasks[0]).toMatchObject({ decision: 'RUN', attempts: 2 });
      expect(resolver.calls).toHaveLength(1);
      expect(resolver.calls[0]).toMatchObject({ taskId: 'task_excel', layer: 'consistency', reasonCode: 'CONTRACT_EXCEL_COLUMNS_INVALID', attempt: 1 });
      expect(events(result, 'task_excel')).toEqual([
        'TASK_ASSIGNED',
        'GATE_MEANING',
        'ATTEMPT',
        'AGENT_OUTPUT',
        'GATE_CONSISTENCY',
        'GATE_ACC',
        'HITL_REQUESTED',
        'HITL_DECIDED',
        'REGEN_REQUESTED',
        'ATTEMPT',
        'AGENT_OUTPUT',
        'GATE_CONSISTENCY',
        'GATE_RFL',
        'GATE_ETHICS',
        'GATE_ACC',
        'ARTIFACT_WRITTEN',
        'TASK_DONE',
      ]);
    });

    it('stops with RETRY_EXHAUSTED when attempts run out', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, {
        resolver: continueAll,
        maxAttemptsPerTask: 2,
        acc: { enableRunawaySeal: false },
        faults: { excel: { breakContract: true } },
      });

      expect(result.decision).toBe('STOPPED');
      expect(result.tasks[0]).toMatchObject({
        decision: 'STOPPED',
        reasonCode: 'RETRY_EXHAUSTED',
        sealed: false,
        blockedLayer: 'consistency',
        attempts: 2,
      });
      expect(result.tasks.slice(1).map(t => t.decision)).toEqual(['RUN', 'RUN']);
      expect(result.outcome.reasonCode).toBe('RETRY_EXHAUSTED');
    });

    it('seals with the runaway seal once failures reach the threshold', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, {
        resolver: continueAll,
        maxAttemptsPerTask: 6,
        acc: { enableRunawaySeal: true, runawayThreshold: 2 },
        faults: { excel: { breakContract: true }, word: { breakContract: true }, ppt: { breakContract: true } },
      });

      expect(result.decision).toBe('STOPPED');
      expect(result.tasks[0]).toMatchObject({ reasonCode: 'SEALED_BY_ACC', sealed: true, blockedLayer: 'acc', attempts: 2 });
      expect(result.tasks.slice(1).map(t => t.reasonCode)).toEqual(['SKIPPED_AFTER_SEAL', 'SKIPPED_AFTER_SEAL']);
      expect(result.rows.filter(r => r.event === 'AGENT_SEALED')).toHaveLength(1);
      expect(result.artifactsWrittenTaskIds).toEqual([]);
    });

    it('stops the task when the human says STOP', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, {
        resolver: createScriptedResolver(['STOP'], 'CONTINUE'),
        faults: { excel: { breakContract: true } },
      });
      expect(result.tasks[0]).toMatchObject({ decision: 'STOPPED', reasonCode: 'HITL_STOP', finalDecider: 'USER' });
      expect(result.tasks.slice(1).map(t => t.decision)).toEqual(['RUN', 'RUN']);
    });
  });

  describe('relativity pauses', () => {
    it('leaves tasks paused when nobody answers', async () => {
      const result = await orchestrator.runInMemory(AMBIGUOUS_PROMPT, { runId: 'r-pending' });

      expect(result.decision).toBe('PAUSE_FOR_HITL');
      expect(result.tasks.map(t => [t.decision, t.reasonCode, t.blockedLayer])).toEqual([
        ['PAUSE_FOR_HITL', 'HITL_PENDING', 'rfl'],
        ['PAUSE_FOR_HITL', 'HITL_PENDING', 'rfl'],
        ['PAUSE_FOR_HITL', 'HITL_PENDING', 'rfl'],
      ]);
      expect(result.artifactsWrittenTaskIds).toEqual([]);
      expect(result.rows.filter(r => r.event === 'HITL_DECIDED')).toHaveLength(0);
      expect(result.rows.filter(r => r.event === 'ARTIFACT_SKIPPED').every(r => r.decision === 'PAUSE_FOR_HITL')).toBe(true);
    });

    it('reports HITL under the legacy policy', async () => {
      const result = await orchestrator.runInMemory(AMBIGUOUS_PROMPT, { overallPolicy: 'legacy' });
      expect(result.decision).toBe('HITL');
      expect(result.outcome.decision).toBe('PAUSE_FOR_HITL');
    });

    it('runs tasks the human allows and stops the rest', async () => {
      const result = await orchestrator.runInMemory(AMBIGUOUS_PROMPT, {
        resolver: createScriptedResolver(['CONTINUE', 'STOP', 'CONTINUE']),
      });
      expect(result.tasks.map(t => t.decision)).toEqual(['RUN', 'STOPPED', 'RUN']);
      expect(result.decision).toBe('STOPPED');
      expect(result.artifactsWrittenTaskIds).toEqual(['task_excel', 'task_ppt']);
    });

    it('seals when HITL rounds exceed the budget', async () => {
      const result = await orchestrator.runInMemory(AMBIGUOUS_PROMPT, {
        resolver: continueAll,
        acc: { maxHitlRounds: 1 },
      });
      expect(result.tasks.map(t => t.reasonCode)).toEqual(['OK', 'ACC_LOOP_BUDGET_EXCEEDED', 'SKIPPED_AFTER_SEAL']);
      expect(result.outcome.sealed).toBe(true);
    });
  });

  describe('meaning', () => {
    it('pauses tasks the prompt does not ask for', async () => {
      const result = await orchestrator.runInMemory('Make an Excel table', { runId: 'r-meaning' });
      expect(result.tasks.map(t => [t.decision, t.blockedLayer])).toEqual([
        ['RUN', null],
        ['PAUSE_FOR_HITL', 'meaning'],
        ['PAUSE_FOR_HITL', 'meaning'],
      ]);
      expect(result.tasks[1]?.attempts).toBe(0);
    });

    it('runs only the requested task list', async () => {
      const result = await orchestrator.runInMemory(DOC_PROMPT, { tasks: ['ppt'], resolver: continueAll });
      expect(result.tasks.map(t => t.taskId)).toEqual(['task_ppt']);
    });
  });

  describe('validation', () => {
    it('rejects a zero attempt budget', async () => {
      await expect(orchestrator.runInMemory(DOC_PROMPT, { maxAttemptsPerTask: 0 })).rejects.toThrow(ConfigError);
    });

    it('rejects duplicate tasks', async () => {
      await expect(orchestrator.runInMemory(DOC_PROMPT, { tasks: ['excel', 'excel'] })).rejects.toThrow(
        'Task list has duplicates: excel, excel',
      );
    });
  });

  describe('events', () => {
    it('announces run start, each task and completion', async () => {
      const bus = new EventBus();
      const start = vi.fn();
      const taskDone = vi.fn();
      const complete = vi.fn();
      bus.on('run:start', start);
      bus.on('task:complete', taskDone);
      bus.on('run:complete', complete);

      await new Orchestrator({ events: bus }).runInMemory(DOC_PROMPT, { runId: 'r-ev', resolver: continueAll });
      expect(start).toHaveBeenCalledWith({ runId: 'r-ev', prompt: DOC_PROMPT, tasks: ['excel', 'word', 'ppt'] });
      expect(taskDone).toHaveBeenCalledTimes(3);
      expect(complete.mock.calls[0]?.[0]).toMatchObject({ runId: 'r-ev', decision: 'RUN' });
    });
  });
});

describe('Orchestrator.runToFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-run-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the audit log and redacted artifacts', async () => {
    const auditPath = join(dir, 'audit.jsonl');
    const artifactDir = join(dir, 'artifacts');
    const result = await new Orchestrator().runToFiles(DOC_PROMPT, {
      auditPath,
      artifactDir,
      resolver: continueAll,
      faults: { ppt: { leakEmail: true } },
    });

    expect(readJsonl(auditPath)).toEqual(result.rows);
    expect(readFileSync(join(artifactDir, 'task_excel.xlsx.txt'), 'utf-8')).toBe(
      'Excel Table:\n- Columns: Item | Owner | Status\n- Rows: 2\n',
    );
    expect(existsSync(join(artifactDir, 'task_ppt.pptx.txt'))).toBe(false);
  });

  it('truncates the audit log by default and appends when asked not to', async () => {
    const auditPath = join(dir, 'audit.jsonl');
    const options = { auditPath, artifactDir: join(dir, 'a'), resolver: continueAll };
    const first = await new Orchestrator().runToFiles(DOC_PROMPT, options);
    const second = await new Orchestrator().runToFiles(DOC_PROMPT, options);
    expect(readJsonl(auditPath)).toHaveLength(second.rows.length);

    await new Orchestrator().runToFiles(DOC_PROMPT, { ...options, truncateAudit: false });
    expect(readJsonl(auditPath)).toHaveLength(first.rows.length * 2);
  });
});

describe('decision folding', () => {
  it('overallDecision under iep and legacy', () => {
    const paused = [{ decision: 'RUN' as const }, { decision: 'PAUSE_FOR_HITL' as const }];
    const stopped = [...paused, { decision: 'STOPPED' as const }];
    expect(overallDecision('iep', [])).toBe('RUN');
    expect(overallDecision('iep', paused)).toBe('PAUSE_FOR_HITL');
    expect(overallDecision('iep', stopped)).toBe('STOPPED');
    expect(overallDecision('legacy', stopped)).toBe('HITL');
    expect(overallDecision('legacy', [{ decision: 'RUN' }])).toBe('RUN');
  });

  it('runOutcome prefers a seal, then a stop, then a pause', () => {
    const pause = task({ decision: 'PAUSE_FOR_HITL', reasonCode: 'HITL_PENDING', artifactPath: null });
    const stop = task({ decision: 'STOPPED', reasonCode: 'HITL_STOP', finalDecider: 'USER', artifactPath: null });
    const seal = task({ decision: 'STOPPED', reasonCode: 'SEALED_BY_ETHICS', sealed: true, artifactPath: null });
    expect(runOutcome([pause, stop, seal])).toMatchObject({ reasonCode: 'SEALED_BY_ETHICS', sealed: true });
    expect(runOutcome([pause, stop])).toMatchObject({ reasonCode: 'HITL_STOP', finalDecider: 'USER' });
    expect(runOutcome([task({}), pause])).toMatchObject({ decision: 'PAUSE_FOR_HITL', overrideable: true });
    expect(runOutcome([task({})])).toMatchObject({ decision: 'RUN', reasonCode: 'OK' });
  });

  it('runOutcome keeps the first task of the most severe decision', () => {
    const retry = task({ taskId: 'task_excel', decision: 'STOPPED', reasonCode: 'RETRY_EXHAUSTED', artifactPath: null });
    const user = task({ taskId: 'task_word', decision: 'STOPPED', reasonCode: 'HITL_STOP', finalDecider: 'USER', artifactPath: null });
    const pause = task({ taskId: 'task_ppt', decision: 'PAUSE_FOR_HITL', reasonCode: 'HITL_PENDING', artifactPath: null });
    expect(runOutcome([pause, retry, user])).toMatchObject({ reasonCode: 'RETRY_EXHAUSTED', finalDecider: 'SYSTEM' });
    expect(overallDecision('iep', [pause, retry, user])).toBe('STOPPED');
    expect(overallDecision('iep', [pause, task({})])).toBe('PAUSE_FOR_HITL');
  });

  it('taskIdFor prefixes the kind', () => {
    expect(taskIdFor('word')).toBe('task_word');
  });
});

describe('run invariants', () => {
  it('flags an artifact on a blocked task', () => {
    const result: SimulationResult = {
      runId: 'r1',
      decision: 'STOPPED',
      outcome: { decision: 'STOPPED', reasonCode: 'HITL_STOP', sealed: false, overrideable: false, finalDecider: 'USER' },
      tasks: [task({ decision: 'STOPPED' })],
      artifactsWrittenTaskIds: ['task_excel'],
      rows: [],
      durationMs: 1,
    };
    expect(runInvariantViolations(result)).toEqual(['task_excel: artifact written for STOPPED task']);
    expect(() => assertRunInvariants(result)).toThrow(InvariantError);
  });
});
