/**
 * Feature Snapshot Reader
 *
 * Samples the seven runtime signals for one workload from Prometheus
 * (kube-state-metrics, cAdvisor and the app's own request counter) and
 * returns them as a frozen FeatureRecord.
 *
 * Each instant query is retried once; a query that still fails aborts the
 * snapshot with a TransientIOError.
 */

import { z } from 'zod';
import type { Config } from '../config.js';
import type { FeatureName, FeatureRecord, WorkloadRef } from '../types.js';
import { FEATURE_NAMES, workloadKey } from '../types.js';
import { TransientIOError } from '../errors.js';
import { requestJson } from './http.js';
import { withRetry } from './retry.js';
import { log } from '../logger.js';

export interface FeatureSource {
  snapshot(ref: WorkloadRef): Promise<FeatureRecord>;
}

export type PrometheusConfig = Pick<Config, 'prometheusUrl' | 'prometheusTimeoutMs' | 'prometheusRetryDelayMs'>;

/** Value used when a query returns no series (nothing scraped yet, no traffic) */
const EMPTY_DEFAULTS: FeatureRecord = {
  restart_count_last_5m: 0,
  cpu_usage_pct: 0,
  memory_usage_bytes: 0,
  ready_replica_ratio: 1,
  unavailable_replicas: 0,
  network_receive_bytes_per_s: 0,
  http_5xx_error_rate: 0,
};

const INTEGER_FEATURES = new Set<FeatureName>(['restart_count_last_5m', 'memory_usage_bytes', 'unavailable_replicas']);

const UPPER_BOUNDS: Partial<Record<FeatureName, number>> = {
  cpu_usage_pct: 100,
  ready_replica_ratio: 1,
};

export function featureQueries(ref: WorkloadRef): Record<FeatureName, string> {
  const ns = ref.namespace;
  const pods = `namespace="${ns}",pod=~"${ref.name}-.*"`;
  const deploy = `namespace="${ns}",deployment="${ref.name}"`;

  return {
    restart_count_last_5m: `sum(increase(kube_pod_container_status_restarts_total{${pods}}[5m]))`,
    cpu_usage_pct:
      `100 * sum(rate(container_cpu_usage_seconds_total{${pods},container!=""}[5m]))` +
      ` / sum(kube_pod_container_resource_limits{${pods},resource="cpu"})`,
    memory_usage_bytes: `sum(container_memory_working_set_bytes{${pods},container!=""})`,
    ready_replica_ratio:
      `sum(kube_deployment_status_replicas_ready{${deploy}})` +
      ` / sum(kube_deployment_spec_replicas{${deploy}})`,
    unavailable_replicas: `sum(kube_deployment_status_replicas_unavailable{${deploy}})`,
    network_receive_bytes_per_s: `sum(rate(container_network_receive_bytes_total{${pods}}[5m]))`,
    http_5xx_error_rate:
      `sum(rate(http_request_total{${pods},status=~"5.."}[5m]))` +
      ` / sum(rate(http_request_total{${pods}}[5m]))`,
  };
}

/** Prometheus instant-vector response */
const queryResponseSchema = z.object({
  status: z.literal('success'),
  data: z.object({
    resultType: z.string(),
    result: z.array(
      z.object({
        metric: z.record(z.string()).optional(),
        value: z.tuple([z.number(), z.string()]),
      }),
    ),
  }),
});

/** Clamp to the feature's range; NaN / Inf from an empty division fall back to the default */
export function normalizeFeature(name: FeatureName, raw: number | undefined): number {
  if (raw === undefined || !Number.isFinite(raw)) return EMPTY_DEFAULTS[name];
  let value = Math.max(raw, 0);
  const upper = UPPER_BOUNDS[name];
  if (upper !== undefined) value = Math.min(value, upper);
  return INTEGER_FEATURES.has(name) ? Math.round(value) : value;
}

export class PrometheusFeatureReader implements FeatureSource {
  constructor(private readonly config: PrometheusConfig) {}

  async snapshot(ref: WorkloadRef): Promise<FeatureRecord> {
    const queries = featureQueries(ref);

    const sampled: Record<FeatureName, number> = { ...EMPTY_DEFAULTS };
    await Promise.all(
      FEATURE_NAMES.map(async name => {
        sampled[name] = normalizeFeature(name, await this.query(queries[name]));
      }),
    );

    const record = Object.freeze(sampled);
    log(`[Metrics] ${workloadKey(ref)}: ${FEATURE_NAMES.map(n => `${n}=${record[n]}`).join(' ')}`);
    return record;
  }

  /** First sample of an instant query, or undefined when no series matched */
  private async query(promql: string): Promise<number | undefined> {
    const url = `${this.config.prometheusUrl}/api/v1/query?query=${encodeURIComponent(promql)}`;

    const body = await withRetry(
      () => requestJson(url, { method: 'GET' }, this.config.prometheusTimeoutMs),
      { retries: 1, delayMs: this.config.prometheusRetryDelayMs, label: '[Metrics]' },
    );

    const parsed = queryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientIOError(`Unexpected Prometheus response for ${promql}`, { retryable: false });
    }

    const sample = parsed.data.data.result[0];
    return sample ? parseFloat(sample.value[1]) : undefined;
  }
}

// =============================================================================
// Fixed record (CLI --features)
// =============================================================================

export const featureRecordSchema = z.object({
  restart_count_last_5m: z.number().int().nonnegative(),
  cpu_usage_pct: z.number().min(0).max(100),
  memory_usage_bytes: z.number().int().nonnegative(),
  ready_replica_ratio: z.number().min(0).max(1),
  unavailable_replicas: z.number().int().nonnegative(),
  network_receive_bytes_per_s: z.number().nonnegative(),
  http_5xx_error_rate: z.number().nonnegative(),
});

/** Parse and validate a feature record given as JSON text */
export function parseFeatureRecord(json: string): FeatureRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new Error('--features must be a JSON object');
  }
  const parsed = featureRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid --features: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return Object.freeze({ ...parsed.data });
}

/** Serves the same record for every workload and cycle */
export class StaticFeatureSource implements FeatureSource {
  constructor(private readonly record: FeatureRecord) {}

  async snapshot(): Promise<FeatureRecord> {
    return this.record;
  }
}
