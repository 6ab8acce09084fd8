/**
 * Wires the healer's collaborators from configuration.
 */

import type { Config } from './config.js';
import { HealingOrchestrator, type CycleOutcome } from './healing/orchestrator.js';
import { KubernetesActuator } from './actuator/kubernetes.js';
import { createKubeClient, loadKubeConfig, type KubeClient } from './services/kube.js';
import {
  PrometheusFeatureReader,
  StaticFeatureSource,
  parseFeatureRecord,
  type FeatureSource,
} from './services/metrics-reader.js';
import { InferenceClient } from './risk/predictor.js';
import { EventPublisher } from './services/events.js';
import { notify } from './services/notify.js';
import type { HealingStateStore } from './state/store.js';
import { AnnotationStateStore } from './state/annotation-store.js';
import { MemoryStateStore } from './state/memory-store.js';
import { RedisStateStore } from './state/redis-store.js';

const ROLLOUT_POLL_INTERVAL_MS = 2_000;

export interface Runtime {
  orchestrator: HealingOrchestrator;
  predictor: InferenceClient;
  events: EventPublisher;
  store: HealingStateStore;
}

export function createStateStore(config: Pick<Config, 'stateBackend' | 'redisUrl'>, kube: KubeClient): HealingStateStore {
  switch (config.stateBackend) {
    case 'annotations':
      return new AnnotationStateStore(kube);
    case 'redis':
      if (!config.redisUrl) throw new Error('REDIS_URL is required when HEALING_STATE_BACKEND=redis');
      return RedisStateStore.fromUrl(config.redisUrl);
    case 'memory':
      return new MemoryStateStore();
  }
}

export function createFeatureSource(config: Config): FeatureSource {
  return config.featuresJson !== undefined
    ? new StaticFeatureSource(parseFeatureRecord(config.featuresJson))
    : new PrometheusFeatureReader(config);
}

export function createRuntime(config: Config): Runtime {
  const features = createFeatureSource(config);
  const kube = createKubeClient(loadKubeConfig(config.kubeconfigPath));
  const store = createStateStore(config, kube);
  const predictor = new InferenceClient(config);
  const events = new EventPublisher(config);

  const actuator = new KubernetesActuator(kube, {
    cacheClearCommand: config.cacheClearCommand,
    rolloutTimeoutMs: config.rolloutTimeoutSeconds * 1000,
    pollIntervalMs: ROLLOUT_POLL_INTERVAL_MS,
  });

  const orchestrator = new HealingOrchestrator(
    {
      features,
      predictor,
      store,
      actuator,
      notify: message => notify(config, message),
      events,
    },
    {
      healReplicas: config.healReplicas,
      recheckCooldownMs: config.recheckCooldownSeconds * 1000,
      escalationCooldownMs: config.escalationCooldownSeconds * 1000,
      pendingLeaseMs: config.pendingLeaseSeconds * 1000,
      storeRetryDelayMs: config.prometheusRetryDelayMs,
    },
  );

  return { orchestrator, predictor, events, store };
}

/**
 * Exit status of a single-shot run: 3 permission denied, 2 when healing
 * failed (an actuator failure, or the ladder exhausted), else 0
 */
export function exitCodeFor(outcomes: CycleOutcome[]): number {
  const aborted = outcomes.flatMap(o => (o.kind === 'aborted' ? [o.reason] : []));
  if (aborted.includes('permission')) return 3;
  if (aborted.includes('actuator')) return 2;
  if (outcomes.some(o => o.kind === 'held' && o.reason === 'exhausted')) return 2;
  return 0;
}
