/**
 * In-process store: workload key -> encoded fields.
 *
 * Only coordinates cycles inside one process; used for local runs
 * (HEALING_STATE_BACKEND=memory) and as the store behind orchestrator tests.
 */

import type { HealingState, HealingStateUpdate, WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { StateConflictError } from '../errors.js';
import type { HealingStateStore } from './store.js';
import { FIELDS, decodeHealingState, encodeHealingState, newVersionToken } from './codec.js';

export class MemoryStateStore implements HealingStateStore {
  private records = new Map<string, Record<string, string>>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async read(ref: WorkloadRef): Promise<HealingState> {
    return decodeHealingState(ref, this.records.get(workloadKey(ref)));
  }

  async write(ref: WorkloadRef, update: HealingStateUpdate, expectedToken: string): Promise<HealingState> {
    const key = workloadKey(ref);
    const current = this.records.get(key) ?? {};
    const stored = current[FIELDS.version] ?? '';
    if (stored !== expectedToken) {
      throw new StateConflictError(`Healing state of ${key} changed (expected version "${expectedToken}", found "${stored}")`);
    }

    const next: Record<string, string> = { ...current };
    for (const [field, value] of Object.entries(encodeHealingState(update, this.now(), newVersionToken()))) {
      if (value === null) delete next[field];
      else next[field] = value;
    }
    this.records.set(key, next);
    return decodeHealingState(ref, next);
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
