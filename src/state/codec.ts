/**
 * HealingState <-> flat string fields.
 *
 * The same field names are used as Deployment annotations and as Redis hash
 * fields. `healing.attempt` is the key older healing scripts already wrote.
 */

import { randomUUID } from 'crypto';
import type { HealingState, HealingStateUpdate, PendingAction, WorkloadRef } from '../types.js';
import { isTier, lastActionFor, normalizeAttempt } from '../healing/state-machine.js';

export const FIELDS = {
  attempt: 'healing.attempt',
  lastAction: 'healing.last-action',
  lastUpdated: 'healing.last-updated',
  version: 'healing.version',
  pendingTier: 'healing.pending-tier',
  pendingSince: 'healing.pending-since',
} as const;

/** Field values to write; null removes the field */
export type EncodedFields = Record<string, string | null>;

function parseDate(raw: string | undefined): Date | null {
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

function decodePending(tierRaw: string | undefined, sinceRaw: string | undefined): PendingAction | undefined {
  const tier = Number(tierRaw);
  const since = parseDate(sinceRaw);
  return tierRaw && isTier(tier) && since ? { tier, since } : undefined;
}

/**
 * Tolerant decode: the marker is always re-derived from the attempt counter,
 * so an operator who only resets `healing.attempt` gets a consistent state.
 */
export function decodeHealingState(
  workload: WorkloadRef,
  fields: Readonly<Record<string, string | undefined>> = {},
): HealingState {
  const attempt = normalizeAttempt(fields[FIELDS.attempt]);
  const pending = decodePending(fields[FIELDS.pendingTier], fields[FIELDS.pendingSince]);

  return {
    workload,
    attempt,
    lastAction: lastActionFor(attempt),
    lastUpdated: parseDate(fields[FIELDS.lastUpdated]),
    versionToken: fields[FIELDS.version] ?? '',
    ...(pending ? { pending } : {}),
  };
}

export function encodeHealingState(update: HealingStateUpdate, now: Date, versionToken: string): EncodedFields {
  return {
    [FIELDS.attempt]: String(update.attempt),
    [FIELDS.lastAction]: update.lastAction,
    [FIELDS.lastUpdated]: now.toISOString(),
    [FIELDS.version]: versionToken,
    [FIELDS.pendingTier]: update.pending ? String(update.pending.tier) : null,
    [FIELDS.pendingSince]: update.pending ? update.pending.since.toISOString() : null,
  };
}

export function newVersionToken(): string {
  return randomUUID();
}
