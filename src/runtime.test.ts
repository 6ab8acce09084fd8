/**
 * Runtime Wiring Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { createFeatureSource, createStateStore, exitCodeFor } from './runtime.js';
import { loadConfig } from './config.js';
import type { KubeClient } from './services/kube.js';
import { MemoryStateStore } from './state/memory-store.js';
import { AnnotationStateStore } from './state/annotation-store.js';
import { PrometheusFeatureReader, StaticFeatureSource } from './services/metrics-reader.js';
import type { CycleOutcome } from './healing/orchestrator.js';
import type { RiskAssessment } from './types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function makeKube(): KubeClient {
  return {
    readDeployment: vi.fn<KubeClient['readDeployment']>(),
    replaceDeployment: vi.fn<KubeClient['replaceDeployment']>(),
    listReplicaSets: vi.fn<KubeClient['listReplicaSets']>(),
    listPods: vi.fn<KubeClient['listPods']>(),
    exec: vi.fn<KubeClient['exec']>(),
  };
}

const RISK: RiskAssessment = { probability: 0.9, riskLabel: 'HIGH', degraded: false, source: 'model' };

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

describe('createStateStore()', () => {
  it('builds the selected backend', () => {
    expect(createStateStore({ stateBackend: 'memory' }, makeKube())).toBeInstanceOf(MemoryStateStore);
    expect(createStateStore({ stateBackend: 'annotations' }, makeKube())).toBeInstanceOf(AnnotationStateStore);
  });

  it('requires REDIS_URL for the redis backend', () => {
    expect(() => createStateStore({ stateBackend: 'redis' }, makeKube())).toThrow(
      'REDIS_URL is required when HEALING_STATE_BACKEND=redis',
    );
  });
});

describe('createFeatureSource()', () => {
  it('reads Prometheus by default', () => {
    expect(createFeatureSource(loadConfig({}, ['node', 'index']))).toBeInstanceOf(PrometheusFeatureReader);
  });

  it('serves --features when given', async () => {
    const json =
      '{"restart_count_last_5m":0,"cpu_usage_pct":85,"memory_usage_bytes":0,"ready_replica_ratio":1,' +
      '"unavailable_replicas":0,"network_receive_bytes_per_s":0,"http_5xx_error_rate":1}';
    const source = createFeatureSource(loadConfig({}, ['node', 'index', '--features', json]));

    expect(source).toBeInstanceOf(StaticFeatureSource);
    expect((await source.snapshot({ namespace: 'shop', name: 'api' })).cpu_usage_pct).toBe(85);
  });

  it('fails on invalid --features', () => {
    expect(() => createFeatureSource(loadConfig({}, ['node', 'index', '--features', '[]']))).toThrow(
      'Invalid --features',
    );
  });
});

describe('exitCodeFor()', () => {
  it('is 0 when every cycle ran', () => {
    const outcomes: CycleOutcome[] = [
      { kind: 'steady', risk: RISK },
      { kind: 'held', reason: 'cooldown', attempt: 1 },
      { kind: 'aborted', reason: 'transient', message: 'metrics down' },
    ];
    expect(exitCodeFor(outcomes)).toBe(0);
  });

  it('is 2 after an actuator failure', () => {
    expect(exitCodeFor([{ kind: 'aborted', reason: 'actuator', message: 'rollout stuck' }])).toBe(2);
  });

  it('is 2 when the ladder is exhausted', () => {
    expect(exitCodeFor([{ kind: 'steady', risk: RISK }, { kind: 'held', reason: 'exhausted', attempt: 3 }])).toBe(2);
  });

  it('is 3 after a permission refusal, whatever else happened', () => {
    expect(
      exitCodeFor([
        { kind: 'aborted', reason: 'actuator', message: 'rollout stuck' },
        { kind: 'aborted', reason: 'permission', message: 'forbidden' },
      ]),
    ).toBe(3);
  });
});
