/**
 * Notification service: posts healing notices to a chat webhook.
 */

import type { Config } from '../config.js';
import type { EscalationTier, RemediationAction, RiskAssessment, WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { describeError } from '../errors.js';
import { log } from '../logger.js';

const WEBHOOK_TIMEOUT_MS = 5000;

export type Notify = (message: string) => Promise<void>;

export async function notify(config: Pick<Config, 'webhookUrl'>, message: string): Promise<void> {
  log(`[NOTIFY] ${message}`);

  if (!config.webhookUrl) return;

  try {
    const res = await fetch(config.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message }),
      signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
    });
    if (!res.ok) log(`[NOTIFY] Webhook answered HTTP ${res.status}`);
  } catch (err) {
    log(`[NOTIFY] Failed to send webhook: ${describeError(err)}`);
  }
}

// ============================================================================
// Notices
// ============================================================================

function scoreOf(risk: RiskAssessment): string {
  const score = `risk ${risk.probability.toFixed(3)}`;
  return risk.degraded ? `${score}, fallback score` : score;
}

export function escalationNotice(
  ref: WorkloadRef,
  tier: EscalationTier,
  action: RemediationAction,
  risk: RiskAssessment,
): string {
  return `${workloadKey(ref)}: escalation tier ${tier} (${action}) completed, ${scoreOf(risk)}`;
}

export function rollbackNotice(ref: WorkloadRef, detail: string, risk: RiskAssessment): string {
  return `${workloadKey(ref)}: ${detail} after repeated high risk (${scoreOf(risk)}); escalation ladder exhausted`;
}

export function recoveryNotice(ref: WorkloadRef, fromAttempt: number, risk: RiskAssessment): string {
  return `${workloadKey(ref)}: recovered after ${fromAttempt} healing step(s), ${scoreOf(risk)}`;
}

export function exhaustedNotice(ref: WorkloadRef, risk: RiskAssessment): string {
  return `${workloadKey(ref)}: auto-healing failed, risk still HIGH after rollback (${scoreOf(risk)}). Manual intervention needed`;
}

export function failedStepNotice(
  ref: WorkloadRef,
  tier: EscalationTier,
  action: RemediationAction,
  message: string,
): string {
  return `${workloadKey(ref)}: auto-healing failed at tier ${tier} (${action}): ${message}. Manual intervention needed`;
}

export function permissionNotice(ref: WorkloadRef, message: string): string {
  return `${workloadKey(ref)}: healing blocked, permission denied: ${message}`;
}
