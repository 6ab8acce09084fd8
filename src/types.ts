/** Managed workload (a Deployment) */
export interface WorkloadRef {
  namespace: string;
  name: string;
}

export function workloadKey(ref: WorkloadRef): string {
  return `${ref.namespace}/${ref.name}`;
}

/** Runtime signals sampled for one risk evaluation, in wire order */
export const FEATURE_NAMES = [
  'restart_count_last_5m',
  'cpu_usage_pct',
  'memory_usage_bytes',
  'ready_replica_ratio',
  'unavailable_replicas',
  'network_receive_bytes_per_s',
  'http_5xx_error_rate',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureRecord = Readonly<Record<FeatureName, number>>;

export type RiskLabel = 'HIGH' | 'LOW';

export interface RiskAssessment {
  probability: number;
  riskLabel: RiskLabel;
  /** True when the inference service was not usable and the fallback heuristic scored */
  degraded: boolean;
  source: 'model' | 'fallback';
  reason?: string;
}

/** Marker written after each committed escalation tier */
export type LastAction = 'NONE' | 'RESTARTED' | 'CACHE_CLEARED' | 'ROLLED_BACK';

export type EscalationTier = 1 | 2 | 3;

export type RemediationAction = 'restart' | 'clear-cache' | 'rollback';

/** Claim recorded before an action runs, cleared when it is committed or released */
export interface PendingAction {
  tier: EscalationTier;
  since: Date;
}

export interface HealingState {
  workload: WorkloadRef;
  attempt: number;
  lastAction: LastAction;
  lastUpdated: Date | null;
  /** Opaque; '' until the first write */
  versionToken: string;
  pending?: PendingAction;
}

/** Fields a writer chooses; timestamp and token are set by the store */
export interface HealingStateUpdate {
  attempt: number;
  lastAction: LastAction;
  pending: PendingAction | null;
}

/** Outcome of one actuator operation */
export interface ActionReport {
  action: RemediationAction | 'scale';
  workload: WorkloadRef;
  detail: string;
  /** Deployment revision rolled back to */
  revision?: number;
}
