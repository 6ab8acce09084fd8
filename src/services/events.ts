/**
 * Event Publisher
 *
 * Writes healing events (escalations, recoveries, lifecycle) directly to
 * Postgres, table `healing_events` (see sql/healing_events.sql). Dashboards
 * read the escalation history from there.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import type { EscalationTier, RemediationAction, RiskAssessment, WorkloadRef } from '../types.js';
import { describeError } from '../errors.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type HealingEventType =
  | 'ESCALATED'
  | 'ESCALATION_FAILED'
  | 'ROLLED_BACK'
  | 'RECOVERED'
  | 'CYCLE_SKIPPED'
  | 'PERMISSION_DENIED'
  | 'HEALER_START'
  | 'HEALER_STOP';

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface HealingEvent {
  eventType: HealingEventType;
  severity?: EventSeverity;
  workload?: WorkloadRef;
  tier?: EscalationTier;
  action?: RemediationAction;
  risk?: RiskAssessment;
  success?: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/** The slice of pg.Pool the publisher uses */
export interface EventPool {
  query(text: string, values: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

export interface EventLog {
  publish(event: HealingEvent): Promise<void>;
}

const INSERT_EVENT = `INSERT INTO healing_events
  (event_type, severity, namespace, workload, tier, action, probability, degraded, success, message, details)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`;

/**
 * Event publisher that writes directly to Postgres.
 * Falls back to logging only if Postgres is unavailable.
 */
export class EventPublisher implements EventLog {
  private pool: EventPool | null = null;
  private postgresAvailable = true;

  constructor(config: Pick<Config, 'postgresUrl'>, pool?: EventPool) {
    if (pool) {
      this.pool = pool;
    } else {
      this.initPostgres(config);
    }
  }

  private initPostgres(config: Pick<Config, 'postgresUrl'>): void {
    if (!config.postgresUrl) {
      log('[Events] No Postgres URL configured, event publishing disabled');
      this.postgresAvailable = false;
      return;
    }

    const pool = new Pool({
      connectionString: config.postgresUrl,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    pool.on('error', err => {
      log(`[Events] Postgres pool error: ${err.message}`);
      this.postgresAvailable = false;
    });
    this.pool = pool;
  }

  /**
   * Publish an event to the healing_events table. Never throws.
   */
  async publish(event: HealingEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) {
      log(`[Events] Postgres unavailable, skipping event: ${event.eventType}`);
      return;
    }

    try {
      await this.pool.query(INSERT_EVENT, [
        event.eventType,
        event.severity ?? 'INFO',
        event.workload?.namespace ?? null,
        event.workload?.name ?? null,
        event.tier ?? null,
        event.action ?? null,
        event.risk?.probability ?? null,
        event.risk?.degraded ?? null,
        event.success ?? null,
        event.message ?? null,
        event.details ? JSON.stringify(event.details) : null,
      ]);

      log(`[Events] Published ${event.eventType}: ${event.message ?? 'ok'}`);
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] healing_events table does not exist, skipping event publishing');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish event: ${describeError(err)}`);
      }
    }
  }

  async publishLifecycle(started: boolean): Promise<void> {
    await this.publish({
      eventType: started ? 'HEALER_START' : 'HEALER_STOP',
      severity: 'INFO',
      message: started ? 'Healer started' : 'Healer stopped',
    });
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
