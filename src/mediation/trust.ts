import { BaseGate } from '../gates/base-gate.js';
import { pauseVerdict, runVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import { DEFAULT_TRUST_POLICY, type Grant, type TrustPolicy, type TrustState } from './types.js';

/** Where trust and standing grants live between runs. */
export interface TrustStore {
  load(): TrustState;
  save(state: TrustState): void;
  grants(): Grant[];
  addGrant(grant: Grant): void;
}

export class MemoryTrustStore implements TrustStore {
  private state: TrustState;
  private readonly granted: Grant[] = [];

  constructor(initial: Partial<TrustState> = {}, policy: TrustPolicy = DEFAULT_TRUST_POLICY) {
    this.state = {
      score: initial.score ?? policy.initialScore,
      approvalStreak: initial.approvalStreak ?? 0,
      cooldownUntil: initial.cooldownUntil ?? null,
    };
  }

  load(): TrustState {
    return { ...this.state };
  }

  save(state: TrustState): void {
    this.state = { ...state };
  }

  grants(): Grant[] {
    return [...this.granted];
  }

  addGrant(grant: Grant): void {
    this.granted.push({ ...grant });
  }
}

function round6(x: number): number {
  return Math.round(x * 1e6) / 1e6;
}

function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

export function isCooldownActive(state: TrustState, now: Date): boolean {
  return state.cooldownUntil !== null && now.getTime() < Date.parse(state.cooldownUntil);
}

export function findValidGrant(grants: readonly Grant[], scenario: string, locationId: string, now: Date): Grant | undefined {
  return grants.find(
    g => g.scenario === scenario && g.locationId === locationId && now.getTime() <= Date.parse(g.expiresAt),
  );
}

export interface TrustChange {
  outcome: string;
  delta: number;
  resetStreak?: boolean;
  startCooldown?: boolean;
}

export interface TrustUpdate {
  state: TrustState;
  applied: number;
  capRemaining: number;
  evidence: Record<string, unknown>;
}

/**
 * Apply one score change. Positive deltas draw on the per-run cap and extend
 * the approval streak; the score stays within [0, 1].
 */
export function applyTrustChange(
  state: TrustState,
  change: TrustChange,
  capRemaining: number,
  now: Date,
  policy: TrustPolicy = DEFAULT_TRUST_POLICY,
): TrustUpdate {
  let applied = change.delta;
  let cap = capRemaining;
  if (change.delta > 0) {
    applied = Math.min(change.delta, Math.max(0, cap));
    cap = round6(Math.max(0, cap - applied));
  }

  const next: TrustState = {
    score: round6(clamp01(state.score + applied)),
    approvalStreak: change.resetStreak ? 0 : state.approvalStreak + (applied > 0 ? 1 : 0),
    cooldownUntil: change.startCooldown
      ? new Date(now.getTime() + policy.cooldownSeconds * 1000).toISOString()
      : state.cooldownUntil,
  };

  return {
    state: next,
    applied: round6(applied),
    capRemaining: cap,
    evidence: {
      outcome: change.outcome,
      trust_before: state.score,
      trust_after: next.score,
      delta_requested: change.delta,
      delta_applied: round6(applied),
      approval_streak: next.approvalStreak,
      cooldown_until: next.cooldownUntil,
      cap_remaining: cap,
    },
  };
}

export interface TrustInput {
  runId: string;
  trust: TrustState;
  grants: readonly Grant[];
  scenario: string;
  locationId: string;
  now: Date;
}

/**
 * Decides whether a human must authorize. Auto-authorization needs a valid
 * grant for the scenario and location, a high enough score, an approval
 * streak and no active cooldown. Anything else pauses for HITL.
 */
export class TrustGate extends BaseGate<TrustInput, 'trust'> {
  readonly name = 'trust' as const;
  readonly description = 'Skips human authorization for trusted, granted scenarios';

  constructor(private readonly policy: TrustPolicy = DEFAULT_TRUST_POLICY) {
    super();
  }

  protected evaluate(input: TrustInput): Verdict {
    const { trust } = input;

    if (isCooldownActive(trust, input.now)) {
      return pauseVerdict(ReasonCode.TRUST_COOLDOWN_ACTIVE, {
        trust_score: trust.score,
        cooldown_until: trust.cooldownUntil,
      });
    }

    const grant = findValidGrant(input.grants, input.scenario, input.locationId, input.now);
    if (!grant) {
      return pauseVerdict(ReasonCode.TRUST_NO_GRANT, {
        scenario: input.scenario,
        location_id: input.locationId,
        trust_score: trust.score,
      });
    }

    if (trust.score >= this.policy.autoAuthScore && trust.approvalStreak >= this.policy.autoAuthStreak) {
      return runVerdict(ReasonCode.TRUST_AUTO_AUTH, {
        trust_score: trust.score,
        need: this.policy.autoAuthScore,
        approval_streak: trust.approvalStreak,
        grant_id: grant.grantId,
      });
    }

    return pauseVerdict(ReasonCode.TRUST_SCORE_LOW, {
      trust_score: trust.score,
      need: this.policy.autoAuthScore,
      approval_streak: trust.approvalStreak,
      grant_id: grant.grantId,
    });
  }
}
