import { nanoid } from 'nanoid';
import type { Decision, HitlChoice, Layer } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { AuditTrail, MemoryAuditLog, type AuditSink } from '../audit/audit-log.js';
import { buildRow, type ArlRow, type RowFields } from '../audit/schema.js';
import { pauseVerdict, runVerdict, sealVerdict, stopVerdict, userVerdict, type Verdict } from '../policy/lattice.js';
import { ReasonCode } from '../policy/reason-codes.js';
import type { HitlRequest, HitlResolver } from '../hitl/types.js';
import { Timer } from '../utils/timer.js';
import {
  DEFAULT_LOCATION,
  DEFAULT_SCENARIO,
  buildAuthRequest,
  buildEvidenceBundle,
  finalizeContract,
  generateContractDraft,
  isAuthRequestExpired,
} from './contract.js';
import { DraftLintGate } from './draft-lint.js';
import { EvidenceGate } from './evidence-gate.js';
import { MemoryTrustStore, TrustGate, applyTrustChange, type TrustChange, type TrustStore } from './trust.js';
import {
  DEFAULT_TRUST_POLICY,
  type Contract,
  type ContractDraft,
  type MediationState,
  type TrustPolicy,
  type TrustState,
} from './types.js';

export interface MediatorOptions {
  store?: TrustStore;
  policy?: TrustPolicy;
  events?: EventBus;
  now?: () => Date;
  /** Lifetime of an authorization request. */
  authTtlSeconds?: number;
}

export interface MediationRunOptions {
  runId?: string;
  /** Placeholder authorization id (`EMG-` followed by 6 to 20 uppercase letters or digits). */
  authId?: string;
  scenario?: string;
  locationId?: string;
  /** Evidence as supplied. Unset builds the simulated bundle; `null` means none was supplied. */
  evidence?: unknown;
  fabricateEvidence?: boolean;
  /** Replaces the generated draft text. */
  draftText?: string;
  /** Answers the authorization and finalization requests. Unset leaves them pending. */
  resolver?: HitlResolver;
  audit?: AuditSink;
}

export interface MediationResult {
  runId: string;
  state: MediationState;
  decision: Decision;
  sealed: boolean;
  reasonCode: string;
  trust: TrustState;
  draft: ContractDraft | null;
  contract: Contract | null;
  rows: ArlRow[];
  durationMs: number;
}

interface Ending {
  state: MediationState;
  verdict: Verdict;
}

/**
 * Contract mediation: evidence → authorization (by trust or by a human) →
 * draft → lint → ADMIN finalization. Only ethics and ACC seal; the other
 * steps pause or stop and leave the sealing to them.
 */
export class ContractMediator {
  private readonly store: TrustStore;
  private readonly policy: TrustPolicy;
  private readonly events?: EventBus;
  private readonly now: () => Date;
  private readonly authTtlSeconds: number;
  private readonly logger = getLogger();

  private readonly evidenceGate = new EvidenceGate();
  private readonly trustGate: TrustGate;
  private readonly lintGate = new DraftLintGate();

  constructor(options: MediatorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_TRUST_POLICY;
    this.store = options.store ?? new MemoryTrustStore({}, this.policy);
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
    this.authTtlSeconds = options.authTtlSeconds ?? 120;
    this.trustGate = new TrustGate(this.policy);
  }

  async run(options: MediationRunOptions = {}): Promise<MediationResult> {
    const timer = new Timer();
    const runId = options.runId ?? `med_${nanoid(10)}`;
    const scenario = options.scenario ?? DEFAULT_SCENARIO;
    const locationId = options.locationId ?? DEFAULT_LOCATION;
    const sink = options.audit ?? new MemoryAuditLog();
    sink.startRun();
    const audit = new AuditTrail(sink, this.events);
    const ctx = { runId };

    let trust = this.store.load();
    let cap = this.policy.positiveCapPerRun;
    let draft: ContractDraft | null = null;
    let contract: Contract | null = null;

    const record = (event: string, layer: Layer, verdict: Verdict, fields: RowFields = {}, taskId?: string): void => {
      audit.record(buildRow(event, layer, verdict, taskId === undefined ? ctx : { ...ctx, taskId }, fields));
    };

    const adjustTrust = (change: TrustChange): void => {
      const update = applyTrustChange(trust, change, cap, this.now(), this.policy);
      trust = update.state;
      cap = update.capRemaining;
      record('TRUST_UPDATE', 'trust_update', runVerdict(ReasonCode.TRUST_UPDATE), { evidence: update.evidence });
    };

    const seal = (layer: 'ethics' | 'acc', reasonCode: string, evidence?: Record<string, unknown>): Ending => {
      const verdict = sealVerdict(layer, reasonCode, evidence);
      record('MEDIATION_SEALED', layer, verdict);
      this.logger.warn({ runId, layer, reasonCode }, 'Mediation sealed');
      return { state: 'STOPPED', verdict };
    };

    const ask = async (taskId: string, layer: Layer, reasonCode: string): Promise<HitlChoice | 'PENDING'> => {
      const request: HitlRequest = { runId, taskId, layer, reasonCode, attempt: 1 };
      record('HITL_REQUESTED', 'hitl_request', pauseVerdict(reasonCode), { evidence: { source_layer: layer } }, taskId);
      this.events?.emit('hitl:requested', request);
      if (!options.resolver) return 'PENDING';
      let choice: HitlChoice;
      try {
        choice = await options.resolver(request);
      } catch (err) {
        this.logger.error({ runId, taskId, error: errorMessage(err) }, 'HITL resolver failed, stopping mediation');
        choice = 'STOP';
      }
      this.events?.emit('hitl:decided', { request, choice });
      return choice;
    };

    const flow = async (): Promise<Ending> => {
      // Evidence
      const bundle = options.evidence === undefined
        ? buildEvidenceBundle({ scenario, locationId, fabricated: options.fabricateEvidence, retrievedAt: this.now() })
        : options.evidence;
      const evidence = (await this.evidenceGate.run({ runId, bundle })).verdict;
      record('GATE_EVIDENCE', 'evidence', evidence);

      if (evidence.reasonCode === ReasonCode.EVIDENCE_FABRICATION) {
        const ending = seal('ethics', ReasonCode.EVIDENCE_FABRICATION, evidence.evidence);
        adjustTrust({ outcome: 'EVIDENCE_FABRICATION', delta: this.policy.deltas.invalidEvent, resetStreak: true, startCooldown: true });
        return ending;
      }
      if (evidence.reasonCode === ReasonCode.EVIDENCE_SCHEMA_INVALID) {
        const ending = seal('acc', ReasonCode.EVIDENCE_SCHEMA_INVALID, evidence.evidence);
        adjustTrust({ outcome: 'EVIDENCE_SCHEMA_INVALID', delta: this.policy.deltas.invalidEvent, resetStreak: true, startCooldown: true });
        return ending;
      }
      if (evidence.decision !== 'RUN') {
        return { state: 'PAUSE_FOR_HITL_EVIDENCE', verdict: evidence };
      }

      // Authorization
      const request = buildAuthRequest({
        authRequestId: `AUTHREQ#${runId}`,
        authId: options.authId ?? 'EMG-7K3P9Q',
        scenario,
        locationId,
        now: this.now(),
        ttlSeconds: this.authTtlSeconds,
      });
      record('AUTH_REQUIRED', 'acc', pauseVerdict(ReasonCode.AUTH_REQUIRED, { auth_request_id: request.authRequestId }));

      const trustVerdict = (await this.trustGate.run({
        runId,
        trust,
        grants: this.store.grants(),
        scenario,
        locationId,
        now: this.now(),
      })).verdict;
      record('GATE_TRUST', 'trust', trustVerdict);

      if (trustVerdict.decision === 'RUN') {
        record('AUTH_SKIPPED', 'hitl_auth', runVerdict(ReasonCode.AUTH_SKIPPED, {
          mode: 'auto',
          grant_id: trustVerdict.evidence?.grant_id ?? null,
        }), {}, 'auth');
      } else {
        const choice = await ask('auth', 'hitl_auth', trustVerdict.reasonCode);
        if (choice === 'PENDING') return { state: 'PAUSE_FOR_HITL_AUTH', verdict: pauseVerdict(ReasonCode.HITL_PENDING) };

        if (choice === 'CONTINUE' && isAuthRequestExpired(request, this.now())) {
          const ending = seal('acc', ReasonCode.AUTH_EXPIRED, { auth_request_id: request.authRequestId, expires_at: request.expiresAt });
          adjustTrust({ outcome: 'AUTH_EXPIRED', delta: this.policy.deltas.invalidEvent, resetStreak: true, startCooldown: true });
          return ending;
        }

        const decided: Verdict = {
          ...userVerdict(choice),
          reasonCode: choice === 'CONTINUE' ? ReasonCode.AUTH_APPROVE : ReasonCode.AUTH_REJECT,
        };
        record('HITL_DECIDED', 'hitl_auth', decided, { choice, evidence: { auth_request_id: request.authRequestId } }, 'auth');
        if (choice === 'STOP') {
          adjustTrust({ outcome: 'AUTH_REJECT', delta: this.policy.deltas.authReject, resetStreak: true });
          return { state: 'STOPPED', verdict: decided };
        }
        adjustTrust({ outcome: 'AUTH_APPROVE', delta: this.policy.deltas.authApprove });
      }

      // Draft and lint
      const generated = generateContractDraft(runId, request, this.now());
      const current = options.draftText === undefined ? generated : { ...generated, content: options.draftText };
      draft = current;
      record('DRAFT_GENERATED', 'agent', runVerdict(ReasonCode.DRAFT_GENERATED, { draft_id: current.draftId }));

      const lint = (await this.lintGate.run({ runId, draftId: current.draftId, content: current.content })).verdict;
      record('GATE_DRAFT_LINT', 'draft_lint', lint);
      if (lint.decision !== 'RUN') {
        const layer = lint.reasonCode === ReasonCode.DRAFT_OUT_OF_SCOPE ? 'acc' : 'ethics';
        const ending = seal(layer, lint.reasonCode, { draft_id: current.draftId });
        adjustTrust({ outcome: 'DRAFT_LINT_FAIL', delta: this.policy.deltas.lintFail, resetStreak: true, startCooldown: true });
        return ending;
      }

      // ADMIN finalization
      record('FINALIZE_REQUIRED', 'acc', pauseVerdict(ReasonCode.FINALIZE_REQUIRED, { draft_id: current.draftId }));
      const choice = await ask('finalize', 'hitl_finalize', ReasonCode.FINALIZE_REQUIRED);
      if (choice === 'PENDING') return { state: 'PAUSE_FOR_HITL_FINALIZE', verdict: pauseVerdict(ReasonCode.HITL_PENDING) };

      const finalized: Verdict = {
        ...userVerdict(choice),
        reasonCode: choice === 'CONTINUE' ? ReasonCode.FINALIZE_APPROVE : ReasonCode.FINALIZE_STOP,
      };
      record('HITL_DECIDED', 'hitl_finalize', finalized, { choice, evidence: { draft_id: current.draftId, role: 'ADMIN' } }, 'finalize');
      if (choice === 'STOP') return { state: 'STOPPED', verdict: finalized };
      adjustTrust({ outcome: 'FINALIZE_APPROVE', delta: this.policy.deltas.finalizeApprove });

      const signed = finalizeContract(runId, current, 'ADMIN', this.now());
      contract = signed;
      const effective = runVerdict(ReasonCode.CONTRACT_EFFECTIVE, { contract_id: signed.contractId, draft_id: current.draftId });
      record('CONTRACT_EFFECTIVE', 'contract_effect', effective);
      return { state: 'CONTRACT_EFFECTIVE', verdict: effective };
    };

    const { state, verdict } = await flow();
    this.store.save(trust);

    const done = verdict.sealed ? stopVerdict(verdict.reasonCode) : verdict;
    record('MEDIATION_DONE', 'orchestrator', done, { evidence: { state, trust_after: trust.score } });

    const durationMs = timer.stop();
    this.logger.info({ runId, state, reasonCode: verdict.reasonCode, durationMs }, 'Mediation complete');

    return {
      runId,
      state,
      decision: verdict.decision,
      sealed: verdict.sealed,
      reasonCode: verdict.reasonCode,
      trust,
      draft,
      contract,
      rows: audit.snapshot(),
      durationMs,
    };
  }
}
