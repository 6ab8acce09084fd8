/**
 * Annotation State Store Tests
 *
 * Uses an in-process API server stand-in that enforces resourceVersion on
 * replace, the way the real one does.
 */

import { describe, it, expect, vi } from 'vitest';
import type * as k8s from '@kubernetes/client-node';
import { AnnotationStateStore } from './annotation-store.js';
import type { KubeClient } from '../services/kube.js';
import { PermissionError, StateConflictError, TransientIOError } from '../errors.js';

const REF = { namespace: 'shop', name: 'api' };
const NOW = new Date('2026-03-01T12:00:00.000Z');

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function apiError(code: number): Error {
  return Object.assign(new Error(`HTTP-Code: ${code}`), { code });
}

function makeKube(annotations: Record<string, string> = { team: 'payments' }) {
  let conflictsLeft = 0;
  let stored: k8s.V1Deployment = {
    metadata: { name: REF.name, namespace: REF.namespace, resourceVersion: '1', annotations },
    spec: { selector: { matchLabels: { app: 'api' } }, template: {} },
  };

  const kube = {
    /** Fail the next `n` replaces with 409, as if the controller wrote status first */
    conflictNextReplaces: (n: number) => {
      conflictsLeft = n;
    },
    readDeployment: vi.fn<KubeClient['readDeployment']>(async () => structuredClone(stored)),
    replaceDeployment: vi.fn<KubeClient['replaceDeployment']>(async (_ref, body) => {
      if (conflictsLeft > 0) {
        conflictsLeft--;
        stored = { ...stored, metadata: { ...stored.metadata, resourceVersion: String(Number(stored.metadata?.resourceVersion) + 1) } };
        throw apiError(409);
      }
      if (body.metadata?.resourceVersion !== stored.metadata?.resourceVersion) throw apiError(409);
      stored = structuredClone(body);
      stored.metadata = { ...stored.metadata, resourceVersion: String(Number(body.metadata?.resourceVersion) + 1) };
      return structuredClone(stored);
    }),
    listReplicaSets: vi.fn<KubeClient['listReplicaSets']>(async () => []),
    listPods: vi.fn<KubeClient['listPods']>(async () => []),
    exec: vi.fn<KubeClient['exec']>(async () => ({ success: true, stdout: '', stderr: '' })),
    current: () => stored,
  };
  return kube;
}

// ---------------------------------------------------------------------------
// AnnotationStateStore
// ---------------------------------------------------------------------------

describe('AnnotationStateStore', () => {
  it('reads a Deployment without healing annotations as HEALTHY', async () => {
    const state = await new AnnotationStateStore(makeKube(), () => NOW).read(REF);
    expect(state.attempt).toBe(0);
    expect(state.lastAction).toBe('NONE');
    expect(state.versionToken).toBe('');
  });

  it('writes healing annotations and keeps foreign ones', async () => {
    const kube = makeKube();
    const store = new AnnotationStateStore(kube, () => NOW);

    const written = await store.write(REF, { attempt: 1, lastAction: 'RESTARTED', pending: null }, '');

    const annotations = kube.current().metadata?.annotations ?? {};
    expect(annotations['team']).toBe('payments');
    expect(annotations['healing.attempt']).toBe('1');
    expect(annotations['healing.last-action']).toBe('RESTARTED');
    expect(annotations['healing.last-updated']).toBe('2026-03-01T12:00:00.000Z');
    expect(annotations['healing.version']).toBe(written.versionToken);
    expect('healing.pending-tier' in annotations).toBe(false);
    expect(await store.read(REF)).toEqual(written);
  });

  it('rejects a write when the healing version moved', async () => {
    const kube = makeKube({ 'healing.attempt': '2', 'healing.version': 'v-other' });
    const store = new AnnotationStateStore(kube, () => NOW);

    await expect(store.write(REF, { attempt: 0, lastAction: 'NONE', pending: null }, 'v-mine')).rejects.toBeInstanceOf(
      StateConflictError,
    );
    expect(kube.replaceDeployment).not.toHaveBeenCalled();
  });

  it('re-reads and re-applies after a resourceVersion conflict', async () => {
    const kube = makeKube();
    kube.conflictNextReplaces(1);
    const store = new AnnotationStateStore(kube, () => NOW);

    const written = await store.write(REF, { attempt: 1, lastAction: 'RESTARTED', pending: null }, '');

    expect(kube.replaceDeployment).toHaveBeenCalledTimes(2);
    expect(written.attempt).toBe(1);
  });

  it('gives up with StateConflictError when the Deployment keeps changing', async () => {
    const kube = makeKube();
    kube.conflictNextReplaces(10);

    await expect(
      new AnnotationStateStore(kube, () => NOW).write(REF, { attempt: 1, lastAction: 'RESTARTED', pending: null }, ''),
    ).rejects.toBeInstanceOf(StateConflictError);
    expect(kube.replaceDeployment).toHaveBeenCalledTimes(5);
  });

  it('maps 403 to PermissionError', async () => {
    const kube = makeKube();
    kube.readDeployment.mockRejectedValue(apiError(403));

    await expect(new AnnotationStateStore(kube).read(REF)).rejects.toBeInstanceOf(PermissionError);
  });

  it('maps server errors to retryable TransientIOError', async () => {
    const kube = makeKube();
    kube.readDeployment.mockRejectedValue(apiError(503));

    const err = await new AnnotationStateStore(kube).read(REF).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransientIOError);
    expect(err instanceof TransientIOError && err.retryable).toBe(true);
    expect(err instanceof TransientIOError && err.status).toBe(503);
  });

  it('does not retry a 404 as transient', async () => {
    const kube = makeKube();
    kube.readDeployment.mockRejectedValue(apiError(404));

    const err = await new AnnotationStateStore(kube).read(REF).catch((e: unknown) => e);
    expect(err instanceof TransientIOError && err.retryable).toBe(false);
  });
});
