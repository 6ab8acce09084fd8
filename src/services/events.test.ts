/**
 * Event Publisher Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EventPublisher, type EventPool } from './events.js';

const REF = { namespace: 'shop', name: 'api' };

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function makePool() {
  return {
    query: vi.fn<EventPool['query']>(async () => ({ rowCount: 1 })),
    end: vi.fn<EventPool['end']>(async () => undefined),
  };
}

// ---------------------------------------------------------------------------
// EventPublisher
// ---------------------------------------------------------------------------

describe('EventPublisher', () => {
  it('is disabled without a Postgres URL', async () => {
    const publisher = new EventPublisher({ postgresUrl: undefined });
    await expect(publisher.publish({ eventType: 'HEALER_START' })).resolves.toBeUndefined();
    await publisher.close();
  });

  it('inserts a row per event', async () => {
    const pool = makePool();
    const publisher = new EventPublisher({ postgresUrl: undefined }, pool);

    await publisher.publish({
      eventType: 'ESCALATED',
      severity: 'WARNING',
      workload: REF,
      tier: 1,
      action: 'restart',
      risk: { probability: 0.81, riskLabel: 'HIGH', degraded: false, source: 'model' },
      success: true,
      message: 'restarted',
      details: { revision: 4 },
    });

    expect(pool.query).toHaveBeenCalledTimes(1);
    const [sql, values] = pool.query.mock.calls[0];
    expect(sql.startsWith('INSERT INTO healing_events')).toBe(true);
    expect(values).toEqual([
      'ESCALATED',
      'WARNING',
      'shop',
      'api',
      1,
      'restart',
      0.81,
      false,
      true,
      'restarted',
      '{"revision":4}',
    ]);
  });

  it('fills absent fields with NULL and INFO severity', async () => {
    const pool = makePool();
    await new EventPublisher({ postgresUrl: undefined }, pool).publishLifecycle(true);

    expect(pool.query.mock.calls[0][1]).toEqual([
      'HEALER_START',
      'INFO',
      null,
      null,
      null,
      null,
      null,
      null,
      null,
      'Healer started',
      null,
    ]);
  });

  it('stops publishing once the table is missing', async () => {
    const pool = makePool();
    pool.query.mockRejectedValueOnce(new Error('relation "healing_events" does not exist'));
    const publisher = new EventPublisher({ postgresUrl: undefined }, pool);

    await publisher.publish({ eventType: 'HEALER_START' });
    await publisher.publish({ eventType: 'HEALER_STOP' });

    expect(pool.query).toHaveBeenCalledTimes(1);
  });

  it('keeps publishing after other failures', async () => {
    const pool = makePool();
    pool.query.mockRejectedValueOnce(new Error('connection terminated'));
    const publisher = new EventPublisher({ postgresUrl: undefined }, pool);

    await publisher.publish({ eventType: 'HEALER_START' });
    await publisher.publish({ eventType: 'HEALER_STOP' });

    expect(pool.query).toHaveBeenCalledTimes(2);
  });

  it('ends the pool on close', async () => {
    const pool = makePool();
    const publisher = new EventPublisher({ postgresUrl: undefined }, pool);
    await publisher.close();
    await publisher.close();
    expect(pool.end).toHaveBeenCalledTimes(1);
  });
});
