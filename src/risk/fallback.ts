/**
 * Deterministic failure score used when the inference service is unusable.
 *
 * Error rate, CPU and unavailable replicas dominate; readiness gap, restarts
 * and memory pressure contribute the rest. Each term is clamped to [0, 1] and
 * the weights sum to 1, so the score is always in [0, 1].
 */

import type { FeatureRecord, RiskLabel } from '../types.js';

const GIB = 1024 ** 3;

export const FALLBACK_WEIGHTS = {
  http_5xx_error_rate: 0.3,
  cpu_usage_pct: 0.25,
  unavailable_replicas: 0.2,
  ready_replica_ratio: 0.1,
  restart_count_last_5m: 0.1,
  memory_usage_bytes: 0.05,
} as const;

/** Non-finite and negative inputs count as 0 */
function sane(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function unit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

export function fallbackScore(features: FeatureRecord): number {
  const w = FALLBACK_WEIGHTS;
  const unavailable = sane(features.unavailable_replicas);
  const ready = Number.isFinite(features.ready_replica_ratio) ? features.ready_replica_ratio : 1;

  const score =
    w.http_5xx_error_rate * unit(sane(features.http_5xx_error_rate)) +
    w.cpu_usage_pct * unit(sane(features.cpu_usage_pct) / 100) +
    w.unavailable_replicas * unit(unavailable / (unavailable + 1)) +
    w.ready_replica_ratio * unit(1 - ready) +
    w.restart_count_last_5m * unit(sane(features.restart_count_last_5m) / 5) +
    w.memory_usage_bytes * unit(sane(features.memory_usage_bytes) / GIB);

  return unit(score);
}

export function labelFor(probability: number, threshold: number): RiskLabel {
  return probability >= threshold ? 'HIGH' : 'LOW';
}
