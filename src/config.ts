/**
 * Healer configuration.
 *
 * All values can be overridden via environment variables; run mode comes
 * from CLI flags.
 */

import type { WorkloadRef } from './types.js';

export type StateBackend = 'annotations' | 'redis' | 'memory';

export interface Config {
  /** Deployments under management, `namespace/name` (namespace defaults to `default`) */
  workloads: WorkloadRef[];

  /** Deployment environment; selects the default risk threshold */
  deployEnv: string;
  /** HIGH iff probability >= riskThreshold */
  riskThreshold: number;

  /** Inference service */
  predictorUrl: string;
  predictorTimeoutMs: number;
  predictorRetryDelayMs: number;

  /** Metrics backend */
  prometheusUrl: string;
  prometheusTimeoutMs: number;
  prometheusRetryDelayMs: number;

  /** Kubeconfig file; in-cluster / default discovery when unset */
  kubeconfigPath?: string;

  /** Where healing state lives */
  stateBackend: StateBackend;
  redisUrl?: string;

  /** Healing event log (optional) */
  postgresUrl?: string;

  /** Notification webhook (Slack-compatible) */
  webhookUrl?: string;

  /** Replica count applied with tier 1 and 2; undefined leaves replicas alone */
  healReplicas?: number;
  cacheClearCommand: string[];
  rolloutTimeoutSeconds: number;

  /** Wait before the single re-check that follows an escalation */
  recheckCooldownSeconds: number;
  /** Minimum age of the last state write before the next tier may run */
  escalationCooldownSeconds: number;
  /** Age after which an unfinished claim is considered abandoned */
  pendingLeaseSeconds: number;

  healthCheckIntervalSeconds: number;

  /** Feature record given on the command line instead of querying Prometheus */
  featuresJson?: string;

  /** Run mode */
  daemon: boolean;
  once: boolean;
  status: boolean;
  reset: boolean;
}

export const DEFAULT_CACHE_CLEAR_COMMAND = ['sh', '-c', 'rm -rf /tmp/*'];

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv,
): Config {
  const deployEnv = env.DEPLOY_ENV ?? 'development';

  return {
    workloads: parseWorkloads(env.WORKLOADS ?? 'default/app'),

    deployEnv,
    riskThreshold: threshold(env.RISK_THRESHOLD, deployEnv),

    predictorUrl: trimSlash(env.PREDICTOR_URL ?? 'http://localhost:5000'),
    predictorTimeoutMs: int(env.PREDICTOR_TIMEOUT_MS, 5_000),
    predictorRetryDelayMs: int(env.PREDICTOR_RETRY_DELAY_MS, 500),

    prometheusUrl: trimSlash(env.PROMETHEUS_URL ?? 'http://localhost:9090'),
    prometheusTimeoutMs: int(env.PROMETHEUS_TIMEOUT_MS, 5_000),
    prometheusRetryDelayMs: int(env.PROMETHEUS_RETRY_DELAY_MS, 1_000),

    kubeconfigPath: env.KUBECONFIG_PATH,

    stateBackend: backend(env.HEALING_STATE_BACKEND),
    redisUrl: env.REDIS_URL,
    postgresUrl: env.POSTGRES_URL,
    webhookUrl: env.WEBHOOK_URL ?? env.SLACK_WEBHOOK_URL,

    healReplicas: replicas(env.HEAL_REPLICAS),
    cacheClearCommand: env.CACHE_CLEAR_COMMAND
      ? ['sh', '-c', env.CACHE_CLEAR_COMMAND]
      : DEFAULT_CACHE_CLEAR_COMMAND,
    rolloutTimeoutSeconds: int(env.ROLLOUT_TIMEOUT_SECONDS, 120),

    recheckCooldownSeconds: int(env.RECHECK_COOLDOWN_SECONDS, 120),
    escalationCooldownSeconds: int(env.ESCALATION_COOLDOWN_SECONDS, 120),
    pendingLeaseSeconds: int(env.PENDING_LEASE_SECONDS, 600),

    healthCheckIntervalSeconds: int(env.HEALTH_CHECK_INTERVAL, 60),

    featuresJson: flagValue(argv, '--features'),

    daemon: argv.includes('--daemon'),
    once: argv.includes('--once'),
    status: argv.includes('--status'),
    reset: argv.includes('--reset'),
  };
}

/**
 * One canonical policy: an explicit RISK_THRESHOLD wins, otherwise production
 * uses 0.7 and every other environment 0.5. Comparison is always `>=`.
 */
export function threshold(raw: string | undefined, deployEnv: string): number {
  if (raw === undefined || raw === '') {
    return deployEnv === 'production' ? 0.7 : 0.5;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`RISK_THRESHOLD must be a number in [0, 1], got "${raw}"`);
  }
  return value;
}

export function parseWorkloads(raw: string): WorkloadRef[] {
  const refs = raw
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(entry => {
      const parts = entry.split('/');
      if (parts.length > 2 || parts.some(p => p === '')) {
        throw new Error(`Invalid workload "${entry}" (expected namespace/name)`);
      }
      return parts.length === 2
        ? { namespace: parts[0], name: parts[1] }
        : { namespace: 'default', name: parts[0] };
    });

  if (refs.length === 0) throw new Error('WORKLOADS must name at least one deployment');
  return refs;
}

function backend(raw: string | undefined): StateBackend {
  switch (raw ?? 'annotations') {
    case 'annotations':
      return 'annotations';
    case 'redis':
      return 'redis';
    case 'memory':
      return 'memory';
    default:
      throw new Error(`HEALING_STATE_BACKEND must be annotations, redis or memory, got "${raw}"`);
  }
}

function replicas(raw: string | undefined): number | undefined {
  if (raw === 'off') return undefined;
  const value = int(raw, 3);
  if (value < 0) throw new Error(`HEAL_REPLICAS must be >= 0 or "off", got "${raw}"`);
  return value;
}

function flagValue(argv: string[], flag: string): string | undefined {
  const idx = argv.findIndex(a => a === flag || a.startsWith(`${flag}=`));
  if (idx < 0) return undefined;
  const arg = argv[idx];
  return arg === flag ? argv[idx + 1] : arg.slice(flag.length + 1);
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function int(val: string | undefined, fallback: number): number {
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}
