/**
 * Redis-backed healing state, for platforms where workload metadata cannot
 * hold it. One hash per workload; writes go through a Lua compare-and-set so
 * the token check and the update are a single atomic step.
 */

import { Redis } from 'ioredis';
import type { HealingState, HealingStateUpdate, WorkloadRef } from '../types.js';
import { workloadKey } from '../types.js';
import { StateConflictError, TransientIOError, describeError } from '../errors.js';
import type { HealingStateStore } from './store.js';
import { FIELDS, decodeHealingState, encodeHealingState, newVersionToken } from './codec.js';
import { log } from '../logger.js';

const KEY_PREFIX = 'healing:state:';

/**
 * KEYS[1] hash; ARGV[1] version field; ARGV[2] expected token;
 * ARGV[3..] field/value pairs. Returns 1 when written, 0 on token mismatch.
 */
export const CAS_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
if (current or '') ~= ARGV[2] then
  return 0
end
for i = 3, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
return 1
`;

/** The two commands the store needs */
export interface HashClient {
  hgetall(key: string): Promise<Record<string, string>>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function redisHashClient(redis: Redis): HashClient {
  return {
    hgetall: key => redis.hgetall(key),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
    quit: () => redis.quit(),
  };
}

export class RedisStateStore implements HealingStateStore {
  constructor(
    private readonly client: HashClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  static fromUrl(url: string): RedisStateStore {
    const redis = new Redis(url, {
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      commandTimeout: 3000,
    });
    redis.on('error', (err: Error) => {
      log(`[StateStore] Redis error: ${err.message}`);
    });
    return new RedisStateStore(redisHashClient(redis));
  }

  async read(ref: WorkloadRef): Promise<HealingState> {
    try {
      return decodeHealingState(ref, await this.client.hgetall(KEY_PREFIX + workloadKey(ref)));
    } catch (err) {
      throw new TransientIOError(`Redis read of ${workloadKey(ref)} failed: ${describeError(err)}`, { cause: err });
    }
  }

  async write(ref: WorkloadRef, update: HealingStateUpdate, expectedToken: string): Promise<HealingState> {
    const key = KEY_PREFIX + workloadKey(ref);
    const fields = encodeHealingState(update, this.now(), newVersionToken());
    const pairs = Object.entries(fields).flatMap(([field, value]) => [field, value ?? '']);

    let written: unknown;
    try {
      written = await this.client.eval(CAS_SCRIPT, 1, key, FIELDS.version, expectedToken, ...pairs);
    } catch (err) {
      throw new TransientIOError(`Redis write of ${workloadKey(ref)} failed: ${describeError(err)}`, {
        retryable: false,
        cause: err,
      });
    }

    if (written !== 1) {
      throw new StateConflictError(`Healing state of ${workloadKey(ref)} changed since it was read`);
    }

    const stored: Record<string, string> = {};
    for (const [field, value] of Object.entries(fields)) {
      if (value !== null) stored[field] = value;
    }
    return decodeHealingState(ref, stored);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
