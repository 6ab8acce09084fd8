/**
 * Escalation State Store
 *
 * A versioned record per workload with compare-and-swap writes. `write`
 * stamps `lastUpdated`, rotates the version token and throws
 * StateConflictError when the stored token is not `expectedToken`.
 */

import type { HealingState, HealingStateUpdate, WorkloadRef } from '../types.js';

export interface HealingStateStore {
  read(ref: WorkloadRef): Promise<HealingState>;
  write(ref: WorkloadRef, update: HealingStateUpdate, expectedToken: string): Promise<HealingState>;
  close(): Promise<void>;
}
