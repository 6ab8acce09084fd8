/**
 * Escalation ladder
 *
 *   HEALTHY ──HIGH──▶ ESCALATING_1 ──HIGH──▶ ESCALATING_2 ──HIGH──▶ ROLLED_BACK
 *      ▲   (restart)       │     (clear cache)    │       (rollback)     │
 *      └───────────LOW─────┴──────────────────────┴──────────────────────┘
 *
 * `decide` is the single transition function. It never skips a tier and the
 * only way down is the reset to HEALTHY.
 */

import type { EscalationTier, HealingState, LastAction, RemediationAction, RiskLabel } from '../types.js';

export type HealingPhase = 'HEALTHY' | 'ESCALATING_1' | 'ESCALATING_2' | 'ROLLED_BACK';

export const MAX_ATTEMPTS = 3;

export interface TierSpec {
  action: RemediationAction;
  marks: LastAction;
}

export const TIERS: Record<EscalationTier, TierSpec> = {
  1: { action: 'restart', marks: 'RESTARTED' },
  2: { action: 'clear-cache', marks: 'CACHE_CLEARED' },
  3: { action: 'rollback', marks: 'ROLLED_BACK' },
};

const PHASES: readonly HealingPhase[] = ['HEALTHY', 'ESCALATING_1', 'ESCALATING_2', 'ROLLED_BACK'];
const MARKERS: readonly LastAction[] = ['NONE', 'RESTARTED', 'CACHE_CLEARED', 'ROLLED_BACK'];

export function phaseOf(attempt: number): HealingPhase {
  return PHASES[clampAttempt(attempt)];
}

export function lastActionFor(attempt: number): LastAction {
  return MARKERS[clampAttempt(attempt)];
}

function clampAttempt(attempt: number): number {
  return Math.min(Math.max(Math.trunc(attempt), 0), MAX_ATTEMPTS);
}

/** Attempt counter as stored; garbage reads as 0, anything above the ladder as 3 */
export function normalizeAttempt(raw: string | undefined): number {
  if (raw === undefined || !/^-?\d+$/.test(raw.trim())) return 0;
  return clampAttempt(parseInt(raw, 10));
}

export function isTier(value: number): value is EscalationTier {
  return value === 1 || value === 2 || value === 3;
}

export type HoldReason = 'exhausted' | 'cooldown';

export type Decision =
  | { kind: 'steady' }
  | { kind: 'recover'; from: HealingPhase }
  | { kind: 'escalate'; tier: EscalationTier; action: RemediationAction; marks: LastAction }
  | { kind: 'hold'; reason: HoldReason; phase: HealingPhase };

export interface DecideOptions {
  now: Date;
  /** Minimum age of the last write before a tier above 1 may run */
  escalationCooldownMs: number;
}

export function decide(
  state: Pick<HealingState, 'attempt' | 'lastUpdated'>,
  risk: RiskLabel,
  { now, escalationCooldownMs }: DecideOptions,
): Decision {
  const attempt = clampAttempt(state.attempt);
  const phase = phaseOf(attempt);

  if (risk === 'LOW') {
    return attempt === 0 ? { kind: 'steady' } : { kind: 'recover', from: phase };
  }

  const tier = attempt + 1;
  if (!isTier(tier)) return { kind: 'hold', reason: 'exhausted', phase };

  if (attempt > 0 && state.lastUpdated) {
    const age = now.getTime() - state.lastUpdated.getTime();
    if (age < escalationCooldownMs) return { kind: 'hold', reason: 'cooldown', phase };
  }

  return { kind: 'escalate', tier, ...TIERS[tier] };
}

/**
 * Guard for every committed write: the next attempt is either the following
 * tier with its marker, or a reset to 0 / NONE.
 */
export function assertTransition(
  prev: Pick<HealingState, 'attempt'>,
  next: Pick<HealingState, 'attempt' | 'lastAction'>,
): void {
  const isReset = next.attempt === 0 && next.lastAction === 'NONE';
  const isStep =
    next.attempt === prev.attempt + 1 &&
    isTier(next.attempt) &&
    next.lastAction === TIERS[next.attempt].marks;

  if (!isReset && !isStep) {
    throw new Error(
      `Illegal healing transition ${prev.attempt} → ${next.attempt}/${next.lastAction}`,
    );
  }
}
