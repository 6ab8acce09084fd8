/**
 * Healing Orchestrator
 *
 * One cycle per workload:
 *   read state → sample features → assess risk → decide → act → commit
 *
 * Escalations follow a claim/commit protocol against the versioned state
 * store. The claim records the tier about to run (`pending`) under the token
 * read at the start of the cycle, so a racing cycle loses before it touches
 * the Deployment. The commit advances `attempt` under the claim's token; if
 * someone else wrote in between (an operator reset, another healer), their
 * write stands and ours is dropped.
 *
 * Actuator failures release the claim, alert, and leave `attempt` where it
 * was, so the same tier runs again next cycle. A claim that is never released
 * expires after the pending lease; a cycle that finds an expired claim and
 * does not escalate clears it.
 */

import type {
  ActionReport,
  EscalationTier,
  HealingState,
  HealingStateUpdate,
  RemediationAction,
  RiskAssessment,
  WorkloadRef,
} from '../types.js';
import { workloadKey } from '../types.js';
import { ActuatorError, PermissionError, StateConflictError, TransientIOError, describeError } from '../errors.js';
import type { FeatureSource } from '../services/metrics-reader.js';
import type { RiskPredictor } from '../risk/predictor.js';
import type { HealingStateStore } from '../state/store.js';
import type { Actuator } from '../actuator/kubernetes.js';
import type { EventLog } from '../services/events.js';
import {
  escalationNotice,
  exhaustedNotice,
  failedStepNotice,
  permissionNotice,
  recoveryNotice,
  rollbackNotice,
  type Notify,
} from '../services/notify.js';
import { sleep as defaultSleep, withRetry } from '../services/retry.js';
import { TIERS, assertTransition, decide, phaseOf, type HoldReason } from './state-machine.js';
import { log, logError, logWarn } from '../logger.js';

export interface OrchestratorDeps {
  features: FeatureSource;
  predictor: RiskPredictor;
  store: HealingStateStore;
  actuator: Actuator;
  notify: Notify;
  events: EventLog;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface OrchestratorOptions {
  /** Replica count applied with tiers 1 and 2; undefined leaves replicas alone */
  healReplicas?: number;
  recheckCooldownMs: number;
  escalationCooldownMs: number;
  pendingLeaseMs: number;
  storeRetryDelayMs: number;
}

/** What the single re-check after an escalation found */
export type RecheckResult = 'recovered' | 'still-high' | 'conflict' | 'skipped';

export type CycleOutcome =
  | { kind: 'steady'; risk: RiskAssessment }
  | { kind: 'recovered'; fromAttempt: number; risk: RiskAssessment }
  | {
      kind: 'escalated';
      tier: EscalationTier;
      action: RemediationAction;
      report: ActionReport;
      risk: RiskAssessment;
      recheck: RecheckResult;
    }
  | { kind: 'held'; reason: HoldReason | 'in-flight'; attempt: number }
  | { kind: 'conflict'; stage: 'claim' | 'commit' | 'recover' }
  | { kind: 'aborted'; reason: 'transient' | 'actuator' | 'permission'; message: string };

const RESET: HealingStateUpdate = { attempt: 0, lastAction: 'NONE', pending: null };

export class HealingOrchestrator {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one healing cycle. Expected failures (I/O, actuator, permission,
   * version conflicts) come back as an outcome; anything else is a bug and
   * propagates.
   */
  async runCycle(ref: WorkloadRef): Promise<CycleOutcome> {
    try {
      return await this.cycle(ref);
    } catch (err) {
      if (err instanceof PermissionError) return this.permissionDenied(ref, err);
      if (err instanceof TransientIOError) {
        logWarn(`[Healer] ${workloadKey(ref)}: cycle skipped: ${err.message}`);
        await this.deps.events.publish({
          eventType: 'CYCLE_SKIPPED',
          severity: 'WARNING',
          workload: ref,
          message: err.message,
        });
        return { kind: 'aborted', reason: 'transient', message: err.message };
      }
      throw err;
    }
  }

  /** Current state, read-only */
  async inspect(ref: WorkloadRef): Promise<HealingState> {
    return this.readState(ref);
  }

  /**
   * Operator reset: back to HEALTHY, dropping any claim. Throws
   * StateConflictError if the state changes between read and write.
   */
  async resetEpisode(ref: WorkloadRef): Promise<HealingState> {
    const state = await this.readState(ref);
    if (state.attempt === 0 && !state.pending) {
      log(`[Healer] ${workloadKey(ref)} already HEALTHY, nothing to reset`);
      return state;
    }

    assertTransition(state, RESET);
    const reset = await this.deps.store.write(ref, RESET, state.versionToken);
    log(`[Healer] ${workloadKey(ref)} reset from ${phaseOf(state.attempt)} by operator`);
    await this.deps.events.publish({
      eventType: 'RECOVERED',
      workload: ref,
      message: `Manual reset from attempt ${state.attempt}`,
      details: { manual: true, fromAttempt: state.attempt },
    });
    return reset;
  }

  // ==========================================================================
  // Cycle
  // ==========================================================================

  private async cycle(ref: WorkloadRef): Promise<CycleOutcome> {
    const key = workloadKey(ref);
    const state = await this.readState(ref);

    if (state.pending) {
      const age = this.now().getTime() - state.pending.since.getTime();
      if (age < this.options.pendingLeaseMs) {
        log(`[Healer] ${key}: tier ${state.pending.tier} in flight since ${state.pending.since.toISOString()}, holding`);
        await this.skipped(ref, `tier ${state.pending.tier} already in flight`);
        return { kind: 'held', reason: 'in-flight', attempt: state.attempt };
      }
      logWarn(`[Healer] ${key}: claim for tier ${state.pending.tier} expired (${Math.round(age / 1000)}s old), proceeding`);
    }

    const risk = await this.assess(ref);
    const decision = decide(state, risk.riskLabel, {
      now: this.now(),
      escalationCooldownMs: this.options.escalationCooldownMs,
    });

    switch (decision.kind) {
      case 'steady':
        log(`[Healer] ${key} is healthy ✓`);
        if (state.pending) await this.clearClaim(ref, state);
        return { kind: 'steady', risk };

      case 'recover':
        return this.recover(ref, state, risk);

      case 'hold':
        if (state.pending) await this.clearClaim(ref, state);
        if (decision.reason === 'exhausted') {
          logError(`[Healer] ${key}: risk still HIGH after rollback; manual intervention required`);
          await this.deps.notify(exhaustedNotice(ref, risk));
        } else {
          log(`[Healer] ${key}: ${decision.phase} cooling down, next tier held`);
        }
        await this.skipped(ref, `held (${decision.reason}) in ${decision.phase}`);
        return { kind: 'held', reason: decision.reason, attempt: state.attempt };

      case 'escalate':
        return this.escalate(ref, state, decision.tier, decision.action, risk);
    }
  }

  private async escalate(
    ref: WorkloadRef,
    state: HealingState,
    tier: EscalationTier,
    action: RemediationAction,
    risk: RiskAssessment,
  ): Promise<CycleOutcome> {
    const key = workloadKey(ref);

    const claim = await this.tryWrite(
      ref,
      { attempt: state.attempt, lastAction: state.lastAction, pending: { tier, since: this.now() } },
      state.versionToken,
      'claim',
    );
    if (!claim) return { kind: 'conflict', stage: 'claim' };

    log(`[Healer] ${key}: escalating to tier ${tier} (${action}), risk ${risk.probability.toFixed(3)}`);

    let report: ActionReport;
    try {
      report = await this.act(ref, tier);
    } catch (err) {
      await this.release(ref, state, claim);
      if (!(err instanceof ActuatorError)) throw err;

      logError(`[Healer] ${key}: tier ${tier} (${action}) failed: ${err.message}`);
      await this.deps.notify(failedStepNotice(ref, tier, action, err.message));
      await this.deps.events.publish({
        eventType: 'ESCALATION_FAILED',
        severity: 'CRITICAL',
        workload: ref,
        tier,
        action,
        risk,
        success: false,
        message: err.message,
      });
      return { kind: 'aborted', reason: 'actuator', message: err.message };
    }

    const next: HealingStateUpdate = { attempt: tier, lastAction: TIERS[tier].marks, pending: null };
    assertTransition(state, next);
    const committed = await this.tryWrite(ref, next, claim.versionToken, 'commit');
    if (!committed) return { kind: 'conflict', stage: 'commit' };

    log(`[Healer] ${key}: ${phaseOf(committed.attempt)} (${committed.lastAction})`);
    if (tier === 3) {
      await this.deps.notify(rollbackNotice(ref, report.detail, risk));
    } else {
      await this.deps.notify(escalationNotice(ref, tier, action, risk));
    }
    await this.deps.events.publish({
      eventType: tier === 3 ? 'ROLLED_BACK' : 'ESCALATED',
      severity: tier === 3 ? 'CRITICAL' : 'WARNING',
      workload: ref,
      tier,
      action,
      risk,
      success: true,
      message: report.detail,
      details: report.revision !== undefined ? { revision: report.revision } : undefined,
    });

    const recheck = await this.recheck(ref, committed);
    return { kind: 'escalated', tier, action, report, risk, recheck };
  }

  /** Tier actions; tiers 1 and 2 also restore the healing replica count */
  private async act(ref: WorkloadRef, tier: EscalationTier): Promise<ActionReport> {
    const { actuator } = this.deps;
    const { healReplicas } = this.options;

    if (tier === 3) return actuator.rollback(ref);

    const report = tier === 1 ? await actuator.restart(ref) : await actuator.clearCache(ref);
    if (healReplicas !== undefined) await actuator.scale(ref, healReplicas);
    return report;
  }

  /**
   * One delayed look after an escalation. LOW recovers right away; HIGH is
   * left for the next cycle to escalate.
   */
  private async recheck(ref: WorkloadRef, committed: HealingState): Promise<RecheckResult> {
    const key = workloadKey(ref);
    await this.sleep(this.options.recheckCooldownMs);

    let risk: RiskAssessment;
    try {
      risk = await this.assess(ref);
    } catch (err) {
      if (!(err instanceof TransientIOError)) throw err;
      logWarn(`[Healer] ${key}: re-check skipped: ${err.message}`);
      return 'skipped';
    }

    if (risk.riskLabel === 'HIGH') {
      log(`[Healer] ${key}: still HIGH after re-check (${risk.probability.toFixed(3)}); next cycle decides`);
      return 'still-high';
    }

    const outcome = await this.recover(ref, committed, risk);
    return outcome.kind === 'recovered' ? 'recovered' : 'conflict';
  }

  /** Reset to HEALTHY, then exactly one recovery notice */
  private async recover(ref: WorkloadRef, state: HealingState, risk: RiskAssessment): Promise<CycleOutcome> {
    assertTransition(state, RESET);
    const written = await this.tryWrite(ref, RESET, state.versionToken, 'recover');
    if (!written) return { kind: 'conflict', stage: 'recover' };

    log(`[Healer] ${workloadKey(ref)}: recovered from ${phaseOf(state.attempt)}`);
    await this.deps.notify(recoveryNotice(ref, state.attempt, risk));
    await this.deps.events.publish({
      eventType: 'RECOVERED',
      workload: ref,
      risk,
      success: true,
      message: `Recovered from attempt ${state.attempt}`,
      details: { fromAttempt: state.attempt },
    });
    return { kind: 'recovered', fromAttempt: state.attempt, risk };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private readState(ref: WorkloadRef): Promise<HealingState> {
    return withRetry(() => this.deps.store.read(ref), {
      retries: 1,
      delayMs: this.options.storeRetryDelayMs,
      label: '[StateStore]',
    });
  }

  private async assess(ref: WorkloadRef): Promise<RiskAssessment> {
    const features = await this.deps.features.snapshot(ref);
    const risk = await this.deps.predictor.assess(features);
    log(
      `[Healer] ${workloadKey(ref)}: risk ${risk.probability.toFixed(3)} → ${risk.riskLabel}` +
        (risk.degraded ? ' (fallback)' : ''),
    );
    return risk;
  }

  /** Conditional write; null when another writer got there first */
  private async tryWrite(
    ref: WorkloadRef,
    update: HealingStateUpdate,
    token: string,
    stage: 'claim' | 'commit' | 'recover',
  ): Promise<HealingState | null> {
    try {
      return await this.deps.store.write(ref, update, token);
    } catch (err) {
      if (!(err instanceof StateConflictError)) throw err;
      logWarn(`[Healer] ${workloadKey(ref)}: ${stage} lost to a concurrent write, leaving it in place (${err.message})`);
      await this.skipped(ref, `${stage} conflict`);
      return null;
    }
  }

  /** Drop our claim after a failed action; the lease covers a failed release */
  private async release(ref: WorkloadRef, state: HealingState, claim: HealingState): Promise<void> {
    try {
      await this.deps.store.write(
        ref,
        { attempt: state.attempt, lastAction: state.lastAction, pending: null },
        claim.versionToken,
      );
    } catch (err) {
      logWarn(`[Healer] ${workloadKey(ref)}: could not release claim, it expires with the lease: ${describeError(err)}`);
    }
  }

  /** Drop an expired claim that no escalation will overwrite this cycle */
  private async clearClaim(ref: WorkloadRef, state: HealingState): Promise<void> {
    try {
      await this.deps.store.write(
        ref,
        { attempt: state.attempt, lastAction: state.lastAction, pending: null },
        state.versionToken,
      );
      log(`[Healer] ${workloadKey(ref)}: cleared expired claim for tier ${state.pending?.tier}`);
    } catch (err) {
      if (!(err instanceof StateConflictError)) throw err;
      logWarn(`[Healer] ${workloadKey(ref)}: expired claim changed before it could be cleared, leaving it (${err.message})`);
    }
  }

  private async permissionDenied(ref: WorkloadRef, err: PermissionError): Promise<CycleOutcome> {
    logError(`[Healer] ${workloadKey(ref)}: permission denied: ${err.message}`);
    await this.deps.notify(permissionNotice(ref, err.message));
    await this.deps.events.publish({
      eventType: 'PERMISSION_DENIED',
      severity: 'CRITICAL',
      workload: ref,
      success: false,
      message: err.message,
    });
    return { kind: 'aborted', reason: 'permission', message: err.message };
  }

  private async skipped(ref: WorkloadRef, message: string): Promise<void> {
    await this.deps.events.publish({ eventType: 'CYCLE_SKIPPED', workload: ref, message });
  }
}
