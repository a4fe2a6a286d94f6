import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { StressRunner, drawFaults, incidentFileName, topKey, writeStressOutputs } from '../../../src/benchmark/stress.js';
import { BenchmarkReporter } from '../../../src/benchmark/reporter.js';
import { readJsonl } from '../../../src/audit/audit-log.js';
import { DEMO_KEY, verifyRows } from '../../../src/audit/integrity.js';
import { ConfigError } from '../../../src/core/errors.js';
import { mulberry32 } from '../../../src/utils/random.js';

describe('stress helpers', () => {
  it('names incident files', () => {
    expect(incidentFileName('INC#3', 17)).toBe('INC#3__17.arl.jsonl');
  });

  it('picks the top key, ties by name', () => {
    expect(topKey({ B: 2, A: 2, C: 1 })).toBe('A');
    expect(topKey({})).toBeNull();
  });

  it('draws no faults at rate 0 and every fault at rate 1', () => {
    expect(drawFaults(mulberry32(1), 0, 0)).toEqual({});
    expect(drawFaults(mulberry32(1), 1, 1)).toEqual({
      excel: { breakContract: true, leakEmail: true },
      word: { breakContract: true, leakEmail: true },
      ppt: { breakContract: true, leakEmail: true },
    });
  });
});

describe('StressRunner', () => {
  it('records no incidents when nothing goes wrong', async () => {
    const report = await new StressRunner({ runs: 4, faultRate: 0, leakRate: 0 }).run();
    expect(report.byDecision).toEqual({ RUN: 4, PAUSE_FOR_HITL: 0, STOPPED: 0 });
    expect(report.incidents).toBe(0);
    expect(report.topReasonCode).toBeNull();
    expect(report.queue).toEqual([]);
    expect(report.runsKept.map(r => r.runId)).toEqual(['STRESS#1', 'STRESS#2', 'STRESS#3', 'STRESS#4']);
    expect(report.config.arlDir).toBeNull();
  });

  it('queues incidents and drops the oldest when full', async () => {
    const report = await new StressRunner({ runs: 3, faultRate: 0, leakRate: 1, queueMax: 2, fullContextN: 2 }).run();

    expect(report.byDecision.STOPPED).toBe(3);
    expect(report.sealedRuns).toBe(3);
    expect(report.byReasonCode).toEqual({ SEALED_BY_ETHICS: 3 });
    expect(report.topReasonCode).toBe('SEALED_BY_ETHICS');
    expect(report.atSignViolations).toBe(0);
    expect(report.incidents).toBe(3);
    expect(report.queueSize).toBe(2);
    expect(report.queueDropped).toBe(1);
    expect(report.queue.map(i => i.incidentId)).toEqual(['INC#2', 'INC#3']);
    expect(report.queue[1]).toMatchObject({
      runId: 'STRESS#3',
      decision: 'STOPPED',
      reasonCode: 'SEALED_BY_ETHICS',
      sealed: true,
      recentContext: ['STOPPED', 'STOPPED'],
    });
  });

  it('keeps a sample of runs unless asked to keep all', async () => {
    const sampled = await new StressRunner({ runs: 3, faultRate: 0, leakRate: 0, sampleRuns: 1 }).run();
    expect(sampled.runsKept).toHaveLength(1);
    const kept = await new StressRunner({ runs: 3, faultRate: 0, leakRate: 0, sampleRuns: 1, keepRuns: true }).run();
    expect(kept.runsKept).toHaveLength(3);
  });

  it('rejects invalid configuration', () => {
    expect(() => new StressRunner({ runs: -1 })).toThrow(ConfigError);
    expect(() => new StressRunner({ faultRate: 2 })).toThrow(/^Invalid stress config: faultRate:/);
  });

  it('is reproducible for a seed', async () => {
    const cfg = { runs: 20, seed: 9, faultRate: 0.3, leakRate: 0.1 };
    const a = await new StressRunner(cfg).run();
    const b = await new StressRunner(cfg).run();
    expect(a.byDecision).toEqual(b.byDecision);
    expect(a.byReasonCode).toEqual(b.byReasonCode);
  });
});

describe('StressRunner incident files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-stress-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves signed rows up to the file cap', async () => {
    const arlDir = join(dir, 'arl');
    const report = await new StressRunner({ runs: 3, faultRate: 0, leakRate: 1, arlDir, maxArlFiles: 2 }).run();

    expect(report.arlSaved).toBe(2);
    expect(report.arlSkipped).toBe(1);
    expect(readdirSync(arlDir).sort()).toEqual(['INC#1__1.arl.jsonl', 'INC#2__2.arl.jsonl']);
    expect(report.runsKept.map(r => r.arlPath)).toEqual([
      join(arlDir, 'INC#1__1.arl.jsonl'),
      join(arlDir, 'INC#2__2.arl.jsonl'),
      null,
    ]);

    const rows = readJsonl(join(arlDir, 'INC#1__1.arl.jsonl'));
    expect(rows).toHaveLength(13);
    expect(verifyRows(DEMO_KEY, rows)).toEqual([]);
    expect(verifyRows('test-secret', rows)).toHaveLength(13);
  });

  it('counts files already in the directory against the cap', async () => {
    writeFileSync(join(dir, 'old.arl.jsonl'), '');
    const report = await new StressRunner({ runs: 3, faultRate: 0, leakRate: 1, arlDir: dir, maxArlFiles: 2 }).run();
    expect(report.arlSaved).toBe(1);
    expect(report.arlSkipped).toBe(2);
  });

  it('signs with the given key', async () => {
    await new StressRunner({ runs: 1, faultRate: 0, leakRate: 1, arlDir: dir }, { key: 'test-secret' }).run();
    const rows = readJsonl(join(dir, 'INC#1__1.arl.jsonl'));
    expect(verifyRows('test-secret', rows)).toEqual([]);
  });

  it('writes the report and queue files', async () => {
    const report = await new StressRunner({ runs: 2, faultRate: 0, leakRate: 1 }).run();
    const paths = {
      resultsJson: join(dir, 'out', 'results.json'),
      queueJson: join(dir, 'out', 'queue.json'),
      queueCsv: join(dir, 'csv', 'queue.csv'),
    };
    expect(writeStressOutputs(report, paths)).toEqual([paths.resultsJson, paths.queueJson, paths.queueCsv]);

    expect(JSON.parse(readFileSync(paths.resultsJson, 'utf-8'))).toMatchObject({ runs: 2, incidents: 2 });
    expect(JSON.parse(readFileSync(paths.queueJson, 'utf-8'))).toHaveLength(2);

    const csv = readFileSync(paths.queueCsv, 'utf-8').trimEnd().split('\n');
    expect(csv[0]).toBe('incident_id,run_id,ts,reason_code,decision,sealed,arl_path');
    expect(csv).toHaveLength(3);
    expect(csv[1]?.startsWith('INC#1,STRESS#1,')).toBe(true);
    expect(csv[1]?.endsWith(',SEALED_BY_ETHICS,STOPPED,true,')).toBe(true);
  });

  it('writes nothing without paths', async () => {
    const report = await new StressRunner({ runs: 1, faultRate: 0, leakRate: 0 }).run();
    expect(writeStressOutputs(report, {})).toEqual([]);
  });
});

describe('BenchmarkReporter.formatStress', () => {
  it('summarizes a stress report', async () => {
    const report = await new StressRunner({ runs: 2, faultRate: 0, leakRate: 1, queueMax: 1 }).run();
    const lines = new BenchmarkReporter().formatStress(report).split('\n');
    expect(lines).toContain('  Runs: 2  |  Seed: 42  |  Fault rate: 0  |  Leak rate: 1');
    expect(lines).toContain('  RUN=0  PAUSE_FOR_HITL=0  STOPPED=2  sealed=2');
    expect(lines).toContain('  Incidents: 2  |  Top reason: SEALED_BY_ETHICS');
    expect(lines).toContain('  Queue: 1 kept, 1 dropped');
  });
});
