import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { InvalidArgumentError } from 'commander';
import { parseHitlMode, parseInteger, parsePolicy, parseProbability, parseTaskKinds } from '../../../src/cli/options.js';
import { benchmarkConfigFrom, executeBenchmark, faultPlanFrom } from '../../../src/cli/commands/benchmark.js';
import { selectProfiles } from '../../../src/cli/commands/profiles.js';
import { executeStress, stressConfigFrom } from '../../../src/cli/commands/stress.js';
import { executeRun, runOverrides } from '../../../src/cli/commands/run.js';
import { executeMediate } from '../../../src/cli/commands/mediate.js';
import { formatStats } from '../../../src/cli/commands/audit.js';
import { createCLI } from '../../../src/cli/index.js';
import { summarizeRows } from '../../../src/audit/stats.js';
import { readJsonl } from '../../../src/audit/audit-log.js';
import { ConfigError } from '../../../src/core/errors.js';
import { createLogger, getLogger, setLogger } from '../../../src/core/logger.js';

describe('option parsers', () => {
  it('parses integers', () => {
    expect(parseInteger('12')).toBe(12);
    expect(parseInteger('-1')).toBe(-1);
    expect(() => parseInteger('1.5')).toThrow(InvalidArgumentError);
  });

  it('parses probabilities', () => {
    expect(parseProbability('0.25')).toBe(0.25);
    expect(() => parseProbability('1.5')).toThrow('Expected a number in [0, 1]: 1.5');
    expect(() => parseProbability('abc')).toThrow(InvalidArgumentError);
  });

  it('parses HITL modes and policies', () => {
    expect(parseHitlMode('none')).toBe('none');
    expect(() => parseHitlMode('maybe')).toThrow(InvalidArgumentError);
    expect(parsePolicy('legacy')).toBe('legacy');
    expect(() => parsePolicy('strict')).toThrow('Unknown policy "strict" (expected iep, legacy)');
  });

  it('parses task kind lists', () => {
    expect(parseTaskKinds('excel, ppt')).toEqual(['excel', 'ppt']);
    expect(() => parseTaskKinds('excel,pdf')).toThrow('Unknown task kind "pdf" (expected excel, word, ppt)');
  });
});

describe('benchmark options', () => {
  it('builds a fault plan', () => {
    expect(faultPlanFrom(['excel', 'word'], ['word'])).toEqual({
      excel: { breakContract: true },
      word: { breakContract: true, leakEmail: true },
    });
    expect(faultPlanFrom()).toEqual({});
  });

  it('uses defaults without a profile', () => {
    expect(benchmarkConfigFrom({})).toMatchObject({ runs: 100, seed: 123, pContinue: 1, faults: undefined });
  });

  it('layers flags over a profile', () => {
    const config = benchmarkConfigFrom({ profile: 'stress', runs: 5, leak: ['ppt'] });
    expect(config).toMatchObject({
      runs: 5,
      seed: 42,
      runawayThreshold: 2,
      maxAttemptsPerTask: 6,
      faults: { ppt: { leakEmail: true } },
    });
  });

  it('keeps profile faults when no fault flags are given', () => {
    expect(benchmarkConfigFrom({ profile: 'stress' }).faults).toEqual({
      excel: { breakContract: true },
      word: { breakContract: true },
      ppt: { breakContract: true },
    });
  });

  it('rejects an unknown profile', () => {
    expect(() => benchmarkConfigFrom({ profile: 'nope' })).toThrow(ConfigError);
  });

  it('selects profiles by name', () => {
    expect(selectProfiles().map(p => p.name)).toEqual(['baseline', 'hitl_observe', 'stress']);
    expect(selectProfiles('stress, baseline').map(p => p.name)).toEqual(['stress', 'baseline']);
    expect(() => selectProfiles('baseline,unknown')).toThrow('Unknown profile: unknown');
  });
});

describe('stress options', () => {
  it('maps flags onto the stress config', () => {
    expect(stressConfigFrom({ dir: '.', runs: 10, maxAttempts: 2, runawaySeal: false, arlDir: 'arl' })).toMatchObject({
      runs: 10,
      maxAttemptsPerTask: 2,
      enableRunawaySeal: false,
      arlDir: 'arl',
    });
  });
});

describe('run command', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-cli-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('maps flags onto config overrides', () => {
    expect(runOverrides({ dir: '.', hitl: 'stop', maxAttempts: 4, truncate: false })).toMatchObject({
      orchestrator: { maxAttemptsPerTask: 4, truncateAuditOnStart: false },
      hitl: { mode: 'stop' },
    });
  });

  it('runs a prompt and writes the audit log', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await executeRun('Excelで進捗表を作成してください。', { dir, hitl: 'continue', tasks: ['excel'], json: true });

    expect(log).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(output).toMatchObject({ decision: 'RUN', artifactsWrittenTaskIds: ['task_excel'] });

    const rows = readJsonl(join(dir, 'out', 'audit.jsonl'));
    expect(rows[rows.length - 1]?.event).toBe('RUN_DONE');
    expect(existsSync(join(dir, 'out', 'artifacts', 'task_excel.xlsx.txt'))).toBe(true);
  });

  it('rebuilds the logger from the loaded config', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const before = createLogger('gatehouse', { level: 'silent' });
    setLogger(before);

    await executeRun('Excelで進捗表を作成してください。', { dir, hitl: 'continue', tasks: ['excel'], json: true });

    expect(getLogger()).not.toBe(before);
    expect(getLogger().level).toBe('silent');
  });
});

describe('project config in suite commands', () => {
  let dir: string;
  const exitCode = process.exitCode;

  // Every task pauses at RFL; the second HITL round exceeds the budget.
  const PROJECT_YAML = ['gates:', '  relativity:', '    triggers: [excel]', '  acc:', '    maxHitlRounds: 1', ''].join('\n');

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-suite-'));
    writeFileSync(join(dir, '.gatehouse.yaml'), PROJECT_YAML, 'utf-8');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = exitCode;
    rmSync(dir, { recursive: true, force: true });
  });

  it('benchmark runs the gates with the project settings', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await executeBenchmark({ dir, runs: 1, json: true });

    const report: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(report).toMatchObject({
      decisionCounts: { RUN: 0, PAUSE_FOR_HITL: 0, STOPPED: 1, HITL: 0 },
      sealEvents: 1,
      hitlRequestedRuns: 1,
    });
  });

  it('stress runs the gates with the project settings', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    await executeStress({ dir, runs: 1, faultRate: 0, leakRate: 0, pContinue: 1, json: true });

    const report: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(report).toMatchObject({
      byDecision: { RUN: 0, PAUSE_FOR_HITL: 0, STOPPED: 1 },
      byReasonCode: { ACC_LOOP_BUDGET_EXCEEDED: 1 },
      sealedRuns: 1,
    });
  });
});

describe('mediate command', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gatehouse-mediate-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('finalizes a contract and appends the audit rows', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const results = await executeMediate({ dir, runs: 1, hitl: 'continue', audit: 'out/mediation.jsonl', json: true });

    expect(results.map(r => [r.state, r.trust.score])).toEqual([['CONTRACT_EFFECTIVE', 0.93]]);
    const rows = readJsonl(join(dir, 'out', 'mediation.jsonl'));
    expect(rows.map(r => r.event).slice(-2)).toEqual(['CONTRACT_EFFECTIVE', 'MEDIATION_DONE']);
  });

  it('carries trust across runs', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const results = await executeMediate({ dir, runs: 2, hitl: 'continue', json: true });

    expect(results.map(r => r.trust.score)).toEqual([0.93, 0.96]);
  });
});

describe('createCLI', () => {
  it('registers every command', () => {
    expect(createCLI().commands.map(c => c.name())).toEqual(['run', 'init', 'benchmark', 'profiles', 'stress', 'audit', 'mediate']);
  });
});

describe('formatStats', () => {
  it('formats an empty log', () => {
    const text = formatStats(summarizeRows([]));
    expect(text.split('\n')[0]).toBe('  Rows: 0  |  Runs: 0  |  Seal rate: 0.00%');
  });
});
