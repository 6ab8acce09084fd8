/**
 * Notification Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  escalationNotice,
  exhaustedNotice,
  failedStepNotice,
  notify,
  permissionNotice,
  recoveryNotice,
  rollbackNotice,
} from './notify.js';
import type { RiskAssessment } from '../types.js';

const REF = { namespace: 'shop', name: 'api' };

const MODEL_RISK: RiskAssessment = { probability: 0.8123, riskLabel: 'HIGH', degraded: false, source: 'model' };
const FALLBACK_RISK: RiskAssessment = {
  probability: 0.5126,
  riskLabel: 'HIGH',
  degraded: true,
  source: 'fallback',
  reason: 'inference service unavailable',
};

describe('notify()', () => {
  it('only logs without a webhook', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    await notify({ webhookUrl: undefined }, 'hello');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts the message as text', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await notify({ webhookUrl: 'http://hooks.test/healer' }, 'shop/api recovered');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://hooks.test/healer');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"text":"shop/api recovered"}');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('swallows webhook failures', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    }));

    await expect(notify({ webhookUrl: 'http://hooks.test/healer' }, 'x')).resolves.toBeUndefined();
  });

  it('swallows error statuses', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => new Response('nope', { status: 500 })));

    await expect(notify({ webhookUrl: 'http://hooks.test/healer' }, 'x')).resolves.toBeUndefined();
  });
});

describe('notices', () => {
  it('describes an escalation', () => {
    expect(escalationNotice(REF, 1, 'restart', MODEL_RISK)).toBe(
      'shop/api: escalation tier 1 (restart) completed, risk 0.812',
    );
  });

  it('flags a fallback score', () => {
    expect(escalationNotice(REF, 2, 'clear-cache', FALLBACK_RISK)).toBe(
      'shop/api: escalation tier 2 (clear-cache) completed, risk 0.513, fallback score',
    );
  });

  it('describes a rollback', () => {
    expect(rollbackNotice(REF, 'rolled back from revision 3 to 2', MODEL_RISK)).toBe(
      'shop/api: rolled back from revision 3 to 2 after repeated high risk (risk 0.812); escalation ladder exhausted',
    );
  });

  it('describes a recovery', () => {
    const low: RiskAssessment = { probability: 0.1, riskLabel: 'LOW', degraded: false, source: 'model' };
    expect(recoveryNotice(REF, 2, low)).toBe('shop/api: recovered after 2 healing step(s), risk 0.100');
  });

  it('asks for an operator once the ladder is exhausted', () => {
    expect(exhaustedNotice(REF, MODEL_RISK)).toBe(
      'shop/api: auto-healing failed, risk still HIGH after rollback (risk 0.812). Manual intervention needed',
    );
  });

  it('asks for an operator when a step fails', () => {
    expect(failedStepNotice(REF, 3, 'rollback', 'No previous revision of shop/api to roll back to (current 1)')).toBe(
      'shop/api: auto-healing failed at tier 3 (rollback): No previous revision of shop/api to roll back to (current 1). Manual intervention needed',
    );
  });

  it('describes a permission refusal', () => {
    expect(permissionNotice(REF, 'restart of shop/api: forbidden')).toBe(
      'shop/api: healing blocked, permission denied: restart of shop/api: forbidden',
    );
  });
});
