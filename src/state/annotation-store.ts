/**
 * Healing state kept as annotations on the managed Deployment, so the healer
 * itself stays stateless between runs.
 *
 * The version token is our own `healing.version` annotation rather than the
 * Deployment's resourceVersion: restarts and rollbacks change the latter on
 * every action, while the token only moves when healing state is written.
 * The write itself rides on the resourceVersion replace, so a concurrent
 * writer shows up either as a different token or as a 409 and a re-read.
 */

import type { HealingState, HealingStateUpdate, WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { StateConflictError } from '../errors.js';
import type { HealingStateStore } from './store.js';
import { FIELDS, decodeHealingState, encodeHealingState, newVersionToken } from './codec.js';
import { classifyKubeError, updateDeployment, type KubeClient } from '../services/kube.js';

export class AnnotationStateStore implements HealingStateStore {
  constructor(
    private readonly kube: KubeClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async read(ref: WorkloadRef): Promise<HealingState> {
    try {
      const deployment = await this.kube.readDeployment(ref);
      return decodeHealingState(ref, deployment.metadata?.annotations);
    } catch (err) {
      throw classifyKubeError(err, `Reading healing state of ${workloadKey(ref)}`, 'io');
    }
  }

  async write(ref: WorkloadRef, update: HealingStateUpdate, expectedToken: string): Promise<HealingState> {
    const fields = encodeHealingState(update, this.now(), newVersionToken());

    try {
      const updated = await updateDeployment(this.kube, ref, deployment => {
        const metadata = deployment.metadata ?? {};
        const annotations = { ...metadata.annotations };

        const stored = annotations[FIELDS.version] ?? '';
        if (stored !== expectedToken) {
          throw new StateConflictError(
            `Healing state of ${workloadKey(ref)} changed (expected version "${expectedToken}", found "${stored}")`,
          );
        }

        for (const [field, value] of Object.entries(fields)) {
          if (value === null) delete annotations[field];
          else annotations[field] = value;
        }
        deployment.metadata = { ...metadata, annotations };
      });
      return decodeHealingState(ref, updated.metadata?.annotations);
    } catch (err) {
      throw classifyKubeError(err, `Writing healing state of ${workloadKey(ref)}`, 'io');
    }
  }

  async close(): Promise<void> {
    // The Kubernetes client holds no connections between calls
  }
}
