import { describe, it, expect } from 'vitest';
import {
  assertLegalVerdict,
  canSeal,
  decisionRank,
  pauseVerdict,
  runVerdict,
  sealVerdict,
  stopVerdict,
  userVerdict,
  verdictViolations,
} from '../../../src/policy/lattice.js';
import { ReasonCode, isRflReasonCode } from '../../../src/policy/reason-codes.js';
import { SealViolationError } from '../../../src/core/errors.js';

describe('decision lattice', () => {
  describe('constructors', () => {
    it('builds RUN as final and not overrideable', () => {
      expect(runVerdict('OK')).toEqual({
        decision: 'RUN',
        reasonCode: 'OK',
        sealed: false,
        overrideable: false,
        finalDecider: 'SYSTEM',
        evidence: undefined,
      });
    });

    it('builds PAUSE as overrideable and system-decided', () => {
      const v = pauseVerdict(ReasonCode.REL_BOUNDARY_UNSTABLE, { token: 'どっち' });
      expect(v.decision).toBe('PAUSE_FOR_HITL');
      expect(v.overrideable).toBe(true);
      expect(v.finalDecider).toBe('SYSTEM');
      expect(v.evidence).toEqual({ token: 'どっち' });
    });

    it('builds a user stop', () => {
      const v = stopVerdict(ReasonCode.HITL_STOP, 'USER');
      expect(v).toMatchObject({ decision: 'STOPPED', sealed: false, finalDecider: 'USER' });
    });

    it('lets only ethics and acc seal', () => {
      expect(sealVerdict('ethics', ReasonCode.SEALED_BY_ETHICS).sealed).toBe(true);
      expect(sealVerdict('acc', ReasonCode.SEALED_BY_ACC).overrideable).toBe(false);
      expect(() => sealVerdict('rfl', 'X')).toThrow(SealViolationError);
      expect(() => sealVerdict('consistency', 'X')).toThrow('Layer "consistency" is not allowed to seal (X)');
      expect(canSeal('meaning')).toBe(false);
      expect(canSeal('acc')).toBe(true);
    });

    it('keeps mediation layers from sealing', () => {
      for (const layer of ['evidence', 'trust', 'draft_lint', 'hitl_auth', 'contract_effect', 'definition'] as const) {
        expect(() => sealVerdict(layer, ReasonCode.EVIDENCE_FABRICATION)).toThrow(SealViolationError);
      }
    });

    it('maps HITL answers to user verdicts', () => {
      expect(userVerdict('CONTINUE')).toMatchObject({ decision: 'RUN', reasonCode: 'HITL_CONTINUE', finalDecider: 'USER' });
      expect(userVerdict('STOP')).toMatchObject({ decision: 'STOPPED', reasonCode: 'HITL_STOP', finalDecider: 'USER', sealed: false });
    });
  });

  describe('verdictViolations', () => {
    it('accepts every constructor output at its own layer', () => {
      expect(verdictViolations('orchestrator', runVerdict('OK'))).toEqual([]);
      expect(verdictViolations('rfl', pauseVerdict('REL_OK'))).toEqual([]);
      expect(verdictViolations('ethics', sealVerdict('ethics', 'SEALED_BY_ETHICS'))).toEqual([]);
      expect(verdictViolations('hitl_finalize', userVerdict('STOP'))).toEqual([]);
    });

    it('rejects a sealed verdict from a non-sealing layer', () => {
      const sealed = sealVerdict('acc', 'SEALED_BY_ACC');
      expect(verdictViolations('rfl', sealed)).toEqual(['layer "rfl" cannot seal']);
    });

    it('rejects a sealed verdict that is not a final system stop', () => {
      const problems = verdictViolations('ethics', {
        decision: 'RUN',
        sealed: true,
        overrideable: true,
        finalDecider: 'USER',
      });
      expect(problems).toEqual([
        'sealed verdict must be STOPPED (got RUN)',
        'sealed verdict cannot be overrideable',
        'sealed verdict must be decided by SYSTEM',
        'RUN cannot be overrideable',
      ]);
    });

    it('rejects a pause a user decided', () => {
      const problems = verdictViolations('hitl_finalize', {
        decision: 'PAUSE_FOR_HITL',
        sealed: false,
        overrideable: true,
        finalDecider: 'USER',
      });
      expect(problems).toEqual(['PAUSE_FOR_HITL must be decided by SYSTEM', 'USER cannot leave a task paused']);
    });

    it('rejects a pause that is not overrideable', () => {
      expect(verdictViolations('rfl', { ...pauseVerdict('X'), overrideable: false })).toEqual([
        'PAUSE_FOR_HITL must be overrideable',
      ]);
    });
  });

  it('assertLegalVerdict throws with the first problem', () => {
    expect(() => assertLegalVerdict('rfl', { ...stopVerdict('X'), sealed: true })).toThrow(
      'Illegal verdict at rfl (X): layer "rfl" cannot seal',
    );
    expect(() => assertLegalVerdict('acc', sealVerdict('acc', 'SEALED_BY_ACC'))).not.toThrow();
  });

  it('ranks decisions by severity', () => {
    expect(decisionRank('RUN')).toBeLessThan(decisionRank('PAUSE_FOR_HITL'));
    expect(decisionRank('PAUSE_FOR_HITL')).toBeLessThan(decisionRank('STOPPED'));
  });

  it('recognizes relativity reason codes', () => {
    expect(isRflReasonCode('REL_REF_MISSING')).toBe(true);
    expect(isRflReasonCode('REL_OK')).toBe(false);
    expect(isRflReasonCode('SEALED_BY_ACC')).toBe(false);
  });
});
