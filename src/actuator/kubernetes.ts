/**
 * Kubernetes Actuator
 *
 * Remediation actions against a Deployment:
 * - restart:    rolling restart (template restartedAt annotation)
 * - scale:      set spec.replicas
 * - clearCache: run the cache-clear command in every running pod, then restart
 * - rollback:   re-apply the latest earlier ReplicaSet template that differs
 *                from the running one by more than a restart (rollout undo)
 *
 * Every action waits for the rollout to settle before returning. Failures
 * surface as ActuatorError, or PermissionError when the API refuses us.
 * Re-issuing an action is harmless; escalation progress lives in the
 * healing state, never in what an action left behind.
 */

import type * as k8s from '@kubernetes/client-node';
import { isDeepStrictEqual } from 'util';
import type { ActionReport, WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { ActuatorError, HealingError, PermissionError, StateConflictError, describeError } from '../errors.js';
import { classifyKubeError, podSelector, statusCode, updateDeployment, type KubeClient } from '../services/kube.js';
import { sleep } from '../services/retry.js';
import { log, logWarn } from '../logger.js';

export interface Actuator {
  restart(ref: WorkloadRef): Promise<ActionReport>;
  scale(ref: WorkloadRef, replicas: number): Promise<ActionReport>;
  clearCache(ref: WorkloadRef): Promise<ActionReport>;
  rollback(ref: WorkloadRef): Promise<ActionReport>;
}

export interface KubernetesActuatorOptions {
  cacheClearCommand: string[];
  rolloutTimeoutMs: number;
  pollIntervalMs: number;
}

const RESTARTED_AT = 'kubectl.kubernetes.io/restartedAt';
const REVISION = 'deployment.kubernetes.io/revision';
const POD_TEMPLATE_HASH = 'pod-template-hash';

/**
 * Pod template with the fields a restart or the ReplicaSet controller adds
 * removed, so restart-only revisions compare equal to what they restarted.
 */
function comparableTemplate(template: k8s.V1PodTemplateSpec | undefined): k8s.V1PodTemplateSpec {
  const copy = structuredClone(template ?? {});
  const labels = { ...copy.metadata?.labels };
  const annotations = { ...copy.metadata?.annotations };
  delete labels[POD_TEMPLATE_HASH];
  delete annotations[RESTARTED_AT];
  copy.metadata = {
    ...copy.metadata,
    labels: Object.keys(labels).length > 0 ? labels : undefined,
    annotations: Object.keys(annotations).length > 0 ? annotations : undefined,
  };
  return copy;
}

function revisionOf(meta: k8s.V1ObjectMeta | undefined): number {
  const raw = meta?.annotations?.[REVISION];
  const parsed = raw ? parseInt(raw, 10) : NaN;
  return Number.isNaN(parsed) ? 0 : parsed;
}

/** The controller has processed the latest spec; status describes it */
function observedLatest(deployment: k8s.V1Deployment): boolean {
  return (deployment.status?.observedGeneration ?? 0) >= (deployment.metadata?.generation ?? 0);
}

/**
 * Rollout finished: the controller has seen the latest spec and every
 * desired replica is updated and available, with no old pods left.
 */
export function rolloutComplete(deployment: k8s.V1Deployment): boolean {
  const desired = deployment.spec?.replicas ?? 1;
  const status = deployment.status;
  if (!status) return false;

  return (
    observedLatest(deployment) &&
    (status.updatedReplicas ?? 0) >= desired &&
    (status.availableReplicas ?? 0) >= desired &&
    (status.replicas ?? 0) <= (status.updatedReplicas ?? 0)
  );
}

/**
 * Only trusted once the controller has observed the latest generation: until
 * then the condition still describes the rollout we are replacing.
 */
export function progressDeadlineExceeded(deployment: k8s.V1Deployment): boolean {
  if (!observedLatest(deployment)) return false;
  return (deployment.status?.conditions ?? []).some(
    c => c.type === 'Progressing' && c.reason === 'ProgressDeadlineExceeded',
  );
}

export class KubernetesActuator implements Actuator {
  constructor(
    private readonly kube: KubeClient,
    private readonly options: KubernetesActuatorOptions,
  ) {}

  async restart(ref: WorkloadRef): Promise<ActionReport> {
    const restartedAt = new Date().toISOString();
    log(`[Actuator] Rolling restart of ${workloadKey(ref)}`);

    await this.mutate(ref, 'restart', deployment => {
      const template = deployment.spec?.template;
      if (!template) throw new ActuatorError(`Deployment ${workloadKey(ref)} has no pod template`);
      template.metadata = {
        ...template.metadata,
        annotations: { ...template.metadata?.annotations, [RESTARTED_AT]: restartedAt },
      };
    });
    await this.waitForRollout(ref);

    return { action: 'restart', workload: ref, detail: `restarted at ${restartedAt}` };
  }

  async scale(ref: WorkloadRef, replicas: number): Promise<ActionReport> {
    log(`[Actuator] Scaling ${workloadKey(ref)} to ${replicas} replicas`);

    await this.mutate(ref, 'scale', deployment => {
      if (!deployment.spec) throw new ActuatorError(`Deployment ${workloadKey(ref)} has no spec`);
      deployment.spec.replicas = replicas;
    });
    await this.waitForRollout(ref);

    return { action: 'scale', workload: ref, detail: `scaled to ${replicas} replicas` };
  }

  /**
   * Exec failures other than a permission refusal are logged and the restart
   * still runs: fresh pods start with an empty cache either way.
   */
  async clearCache(ref: WorkloadRef): Promise<ActionReport> {
    log(`[Actuator] Clearing cache in pods of ${workloadKey(ref)}`);
    const command = this.options.cacheClearCommand;

    let cleared = 0;
    let pods: k8s.V1Pod[] = [];
    try {
      const deployment = await this.kube.readDeployment(ref);
      pods = await this.kube.listPods(ref.namespace, podSelector(deployment, ref));
    } catch (err) {
      this.warnOrThrow(err, `Listing pods of ${workloadKey(ref)}`);
    }

    for (const pod of pods) {
      const name = pod.metadata?.name;
      const container = pod.spec?.containers[0]?.name;
      if (!name || !container || pod.status?.phase !== 'Running') continue;

      try {
        const result = await this.kube.exec(ref.namespace, name, container, command);
        if (result.success) {
          cleared++;
        } else {
          logWarn(`[Actuator] Cache clear in ${name} failed: ${result.message ?? result.stderr}`);
        }
      } catch (err) {
        this.warnOrThrow(err, `Cache clear in ${name}`);
      }
    }

    const restart = await this.restart(ref);
    return {
      action: 'clear-cache',
      workload: ref,
      detail: `cache cleared in ${cleared}/${pods.length} pods, ${restart.detail}`,
    };
  }

  async rollback(ref: WorkloadRef): Promise<ActionReport> {
    log(`[Actuator] Rolling back ${workloadKey(ref)}`);

    let target: k8s.V1ReplicaSet;
    let current: number;
    try {
      const deployment = await this.kube.readDeployment(ref);
      current = revisionOf(deployment.metadata);
      const replicaSets = await this.kube.listReplicaSets(ref.namespace, podSelector(deployment, ref));
      const uid = deployment.metadata?.uid;

      const previous = replicaSets
        .filter(rs => (rs.metadata?.ownerReferences ?? []).some(o => o.uid === uid))
        .filter(rs => revisionOf(rs.metadata) > 0 && revisionOf(rs.metadata) < current)
        .sort((a, b) => revisionOf(b.metadata) - revisionOf(a.metadata));

      if (previous.length === 0) {
        throw new ActuatorError(`No previous revision of ${workloadKey(ref)} to roll back to (current ${current})`);
      }
      const running = comparableTemplate(deployment.spec?.template);
      const changed = previous.find(rs => !isDeepStrictEqual(comparableTemplate(rs.spec?.template), running));
      if (!changed) {
        logWarn(`[Actuator] Every earlier revision of ${workloadKey(ref)} only differs by a restart; using the latest`);
      }
      target = changed ?? previous[0];
    } catch (err) {
      throw this.failure(err, `Preparing rollback of ${workloadKey(ref)}`);
    }

    const revision = revisionOf(target.metadata);
    const template = target.spec?.template;
    if (!template) throw new ActuatorError(`ReplicaSet for revision ${revision} has no pod template`);

    const labels = { ...template.metadata?.labels };
    delete labels[POD_TEMPLATE_HASH];
    const restored: k8s.V1PodTemplateSpec = {
      ...structuredClone(template),
      metadata: { ...template.metadata, labels },
    };

    await this.mutate(ref, 'rollback', deployment => {
      if (!deployment.spec) throw new ActuatorError(`Deployment ${workloadKey(ref)} has no spec`);
      deployment.spec.template = restored;
    });
    await this.waitForRollout(ref);

    return {
      action: 'rollback',
      workload: ref,
      detail: `rolled back from revision ${current} to ${revision}`,
      revision,
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async mutate(
    ref: WorkloadRef,
    what: string,
    change: (deployment: k8s.V1Deployment) => void,
  ): Promise<void> {
    try {
      await updateDeployment(this.kube, ref, change);
    } catch (err) {
      throw this.failure(err, `${what} of ${workloadKey(ref)}`);
    }
  }

  private async waitForRollout(ref: WorkloadRef): Promise<void> {
    const deadline = Date.now() + this.options.rolloutTimeoutMs;

    for (;;) {
      let deployment: k8s.V1Deployment;
      try {
        deployment = await this.kube.readDeployment(ref);
      } catch (err) {
        throw this.failure(err, `Watching rollout of ${workloadKey(ref)}`);
      }

      if (rolloutComplete(deployment)) {
        log(`[Actuator] Rollout of ${workloadKey(ref)} complete`);
        return;
      }
      if (progressDeadlineExceeded(deployment)) {
        throw new ActuatorError(`Rollout of ${workloadKey(ref)} exceeded its progress deadline`);
      }
      if (Date.now() >= deadline) {
        throw new ActuatorError(
          `Rollout of ${workloadKey(ref)} did not complete within ${Math.round(this.options.rolloutTimeoutMs / 1000)}s`,
        );
      }
      await sleep(this.options.pollIntervalMs);
    }
  }

  /** Actions report ActuatorError or PermissionError, nothing else */
  private failure(err: unknown, what: string): HealingError {
    if (err instanceof StateConflictError) return new ActuatorError(`${what}: ${err.message}`, { cause: err });
    return classifyKubeError(err, what, 'actuator');
  }

  private warnOrThrow(err: unknown, what: string): void {
    const code = statusCode(err);
    if (code === 401 || code === 403) throw new PermissionError(`${what}: forbidden (HTTP ${code})`, { cause: err });
    logWarn(`[Actuator] ${what} failed: ${describeError(err)}`);
  }
}
