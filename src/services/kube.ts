/**
 * Kubernetes API access for the actuator and the annotation store.
 *
 * Wraps @kubernetes/client-node behind a small client interface so the rest
 * of the healer (and its tests) only deal with Deployments, ReplicaSets, pods
 * and pod exec.
 */

import * as k8s from '@kubernetes/client-node';
import { Writable } from 'stream';
import type { WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { ActuatorError, HealingError, PermissionError, StateConflictError, TransientIOError, describeError } from '../errors.js';
import { log } from '../logger.js';

const EXEC_TIMEOUT_MS = 30_000;

export interface ExecResult {
  success: boolean;
  stdout: string;
  stderr: string;
  message?: string;
}

export interface KubeClient {
  readDeployment(ref: WorkloadRef): Promise<k8s.V1Deployment>;
  replaceDeployment(ref: WorkloadRef, body: k8s.V1Deployment): Promise<k8s.V1Deployment>;
  listReplicaSets(namespace: string, labelSelector: string): Promise<k8s.V1ReplicaSet[]>;
  listPods(namespace: string, labelSelector: string): Promise<k8s.V1Pod[]>;
  exec(namespace: string, pod: string, container: string, command: string[]): Promise<ExecResult>;
}

/** The open exec connection; closed once the command ends or times out */
export interface ExecStream {
  close(): void;
}

export type ExecRunner = (
  namespace: string,
  pod: string,
  container: string,
  command: string[],
  stdout: Writable,
  stderr: Writable,
  onStatus: (status: k8s.V1Status) => void,
) => Promise<ExecStream>;

export function loadKubeConfig(kubeconfigPath?: string): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (kubeconfigPath) {
    kc.loadFromFile(kubeconfigPath);
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

export function createKubeClient(kc: k8s.KubeConfig): KubeClient {
  const apps = kc.makeApiClient(k8s.AppsV1Api);
  const core = kc.makeApiClient(k8s.CoreV1Api);
  const execApi = new k8s.Exec(kc);

  return {
    readDeployment: ref => apps.readNamespacedDeployment({ name: ref.name, namespace: ref.namespace }),

    replaceDeployment: (ref, body) =>
      apps.replaceNamespacedDeployment({ name: ref.name, namespace: ref.namespace, body }),

    listReplicaSets: async (namespace, labelSelector) =>
      (await apps.listNamespacedReplicaSet({ namespace, labelSelector })).items,

    listPods: async (namespace, labelSelector) =>
      (await core.listNamespacedPod({ namespace, labelSelector })).items,

    exec: (namespace, pod, container, command) =>
      execInPod(
        (ns, name, c, cmd, stdout, stderr, onStatus) =>
          execApi.exec(ns, name, c, cmd, stdout, stderr, null, false, onStatus),
        namespace,
        pod,
        container,
        command,
      ),
  };
}

/**
 * Run a command in a pod and collect its output. The connection is closed
 * when the status arrives or the timeout fires, whichever comes first.
 */
export function execInPod(
  run: ExecRunner,
  namespace: string,
  pod: string,
  container: string,
  command: string[],
  timeoutMs = EXEC_TIMEOUT_MS,
): Promise<ExecResult> {
  return new Promise<ExecResult>((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let stream: ExecStream | undefined;
    let finished = false;

    const finish = () => {
      finished = true;
      clearTimeout(timer);
      stream?.close();
    };
    const timer = setTimeout(() => {
      finish();
      reject(new Error(`exec in ${namespace}/${pod} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const collect = (append: (text: string) => void) =>
      new Writable({
        write(chunk: Buffer, _encoding, callback) {
          append(chunk.toString());
          callback();
        },
      });

    run(
      namespace,
      pod,
      container,
      command,
      collect(text => { stdout += text; }),
      collect(text => { stderr += text; }),
      status => {
        if (finished) return;
        finish();
        resolve({
          success: status.status === 'Success',
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          message: status.message,
        });
      },
    )
      .then(opened => {
        stream = opened;
        if (finished) opened.close();
      })
      .catch(err => {
        if (finished) return;
        finish();
        reject(err);
      });
  });
}

// ============================================================================
// Errors
// ============================================================================

/** HTTP status of a failed API call, if the error carries one */
export function statusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

/**
 * Map a raw client error onto the healing taxonomy. 401/403 are always a
 * PermissionError; other failures become an ActuatorError for mutations, or
 * a TransientIOError for state reads and writes.
 */
export function classifyKubeError(err: unknown, what: string, kind: 'actuator' | 'io'): HealingError {
  if (err instanceof HealingError) return err;

  const code = statusCode(err);
  const message = `${what}: ${describeError(err)}${code ? ` (HTTP ${code})` : ''}`;

  if (code === 401 || code === 403) return new PermissionError(message, { cause: err });
  if (kind === 'actuator') return new ActuatorError(message, { cause: err });
  return new TransientIOError(message, {
    status: code,
    retryable: code === undefined || code >= 500 || code === 429,
    cause: err,
  });
}

// ============================================================================
// Deployment helpers
// ============================================================================

const MAX_CONFLICT_RETRIES = 5;

/**
 * Read-modify-replace on resourceVersion. A 409 (usually the controller
 * updating status) re-reads and re-applies `mutate`; `mutate` may throw to
 * abandon the update.
 */
export async function updateDeployment(
  client: KubeClient,
  ref: WorkloadRef,
  mutate: (deployment: k8s.V1Deployment) => void,
): Promise<k8s.V1Deployment> {
  for (let attempt = 1; attempt <= MAX_CONFLICT_RETRIES; attempt++) {
    const deployment = await client.readDeployment(ref);
    mutate(deployment);
    try {
      return await client.replaceDeployment(ref, deployment);
    } catch (err) {
      if (statusCode(err) !== 409) throw err;
      log(`[Kube] ${workloadKey(ref)} changed during update (attempt ${attempt}/${MAX_CONFLICT_RETRIES}), re-reading`);
    }
  }
  throw new StateConflictError(`Deployment ${workloadKey(ref)} kept changing; gave up after ${MAX_CONFLICT_RETRIES} attempts`);
}

/** `k=v,k=v` selector for the Deployment's pods; falls back to `app=<name>` */
export function podSelector(deployment: k8s.V1Deployment, ref: WorkloadRef): string {
  const labels = deployment.spec?.selector.matchLabels;
  if (!labels || Object.keys(labels).length === 0) return `app=${ref.name}`;
  return Object.entries(labels)
    .map(([k, v]) => `${k}=${v}`)
    .join(',');
}
