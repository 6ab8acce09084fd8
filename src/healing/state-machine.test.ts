/**
 * Escalation Ladder Tests
 */

import { describe, it, expect } from 'vitest';
import { assertTransition, decide, lastActionFor, normalizeAttempt, phaseOf } from './state-machine.js';

const NOW = new Date('2026-03-01T12:00:00Z');
const OPTS = { now: NOW, escalationCooldownMs: 120_000 };

function secondsAgo(s: number): Date {
  return new Date(NOW.getTime() - s * 1000);
}

describe('decide()', () => {
  it('stays steady on LOW at attempt 0', () => {
    expect(decide({ attempt: 0, lastUpdated: null }, 'LOW', OPTS)).toEqual({ kind: 'steady' });
  });

  it('recovers on LOW from any escalated phase', () => {
    expect(decide({ attempt: 2, lastUpdated: secondsAgo(10) }, 'LOW', OPTS)).toEqual({
      kind: 'recover',
      from: 'ESCALATING_2',
    });
  });

  it('escalates one tier at a time on HIGH', () => {
    expect(decide({ attempt: 0, lastUpdated: null }, 'HIGH', OPTS)).toEqual({
      kind: 'escalate',
      tier: 1,
      action: 'restart',
      marks: 'RESTARTED',
    });
    expect(decide({ attempt: 1, lastUpdated: secondsAgo(300) }, 'HIGH', OPTS)).toEqual({
      kind: 'escalate',
      tier: 2,
      action: 'clear-cache',
      marks: 'CACHE_CLEARED',
    });
    expect(decide({ attempt: 2, lastUpdated: secondsAgo(300) }, 'HIGH', OPTS)).toEqual({
      kind: 'escalate',
      tier: 3,
      action: 'rollback',
      marks: 'ROLLED_BACK',
    });
  });

  it('holds once the ladder is exhausted', () => {
    expect(decide({ attempt: 3, lastUpdated: secondsAgo(3600) }, 'HIGH', OPTS)).toEqual({
      kind: 'hold',
      reason: 'exhausted',
      phase: 'ROLLED_BACK',
    });
  });

  it('holds the next tier during the escalation cool-down', () => {
    expect(decide({ attempt: 1, lastUpdated: secondsAgo(30) }, 'HIGH', OPTS)).toEqual({
      kind: 'hold',
      reason: 'cooldown',
      phase: 'ESCALATING_1',
    });
  });

  it('ignores the cool-down for tier 1', () => {
    expect(decide({ attempt: 0, lastUpdated: secondsAgo(1) }, 'HIGH', OPTS).kind).toBe('escalate');
  });
});

describe('assertTransition()', () => {
  it('accepts the next tier with its marker', () => {
    expect(() => assertTransition({ attempt: 1 }, { attempt: 2, lastAction: 'CACHE_CLEARED' })).not.toThrow();
  });

  it('accepts a reset from any phase', () => {
    expect(() => assertTransition({ attempt: 3 }, { attempt: 0, lastAction: 'NONE' })).not.toThrow();
  });

  it('rejects skipping a tier', () => {
    expect(() => assertTransition({ attempt: 0 }, { attempt: 2, lastAction: 'CACHE_CLEARED' })).toThrow(
      'Illegal healing transition 0 → 2/CACHE_CLEARED',
    );
  });

  it('rejects a partial regression', () => {
    expect(() => assertTransition({ attempt: 2 }, { attempt: 1, lastAction: 'RESTARTED' })).toThrow();
  });

  it('rejects a mismatched marker', () => {
    expect(() => assertTransition({ attempt: 0 }, { attempt: 1, lastAction: 'ROLLED_BACK' })).toThrow();
  });
});

describe('normalizeAttempt()', () => {
  it('reads missing and garbage values as 0', () => {
    expect(normalizeAttempt(undefined)).toBe(0);
    expect(normalizeAttempt('abc')).toBe(0);
    expect(normalizeAttempt('1.5')).toBe(0);
  });

  it('clamps to the ladder', () => {
    expect(normalizeAttempt('-2')).toBe(0);
    expect(normalizeAttempt('7')).toBe(3);
    expect(normalizeAttempt(' 2 ')).toBe(2);
  });
});

describe('phaseOf() / lastActionFor()', () => {
  it('maps attempts to phases and markers', () => {
    expect([0, 1, 2, 3].map(phaseOf)).toEqual(['HEALTHY', 'ESCALATING_1', 'ESCALATING_2', 'ROLLED_BACK']);
    expect([0, 1, 2, 3].map(lastActionFor)).toEqual(['NONE', 'RESTARTED', 'CACHE_CLEARED', 'ROLLED_BACK']);
  });
});
