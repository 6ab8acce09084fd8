/**
 * Deploy Risk Healer
 *
 * Scores each managed Deployment's failure risk from live metrics and walks
 * an escalation ladder (restart → cache clear → rollback) while the risk
 * stays HIGH, resetting once it drops.
 *
 * Usage:
 *   npx tsx src/index.ts                          # Single cycle per workload
 *   npx tsx src/index.ts --once                   # Single cycle (alias)
 *   npx tsx src/index.ts --daemon                 # Continuous healing
 *   npx tsx src/index.ts --status                 # Print healing state
 *   npx tsx src/index.ts --reset                  # Operator reset to HEALTHY
 *   npx tsx src/index.ts --features '{"cpu_usage_pct": 85, ...}'
 *
 * Data Flow:
 *   Prometheus → Healer (this) → Inference service
 *                   ↓                 ↓
 *             Kubernetes ←── escalation state (annotations / Redis)
 *                   ↘ Postgres (events), webhook (notices)
 *
 * Exit codes: 1 configuration error, 2 healing failed (actuator failure or ladder exhausted), 3 permission denied.
 */

import { loadConfig, type Config } from './config.js';
import { createRuntime, exitCodeFor, type Runtime } from './runtime.js';
import type { CycleOutcome } from './healing/orchestrator.js';
import { phaseOf } from './healing/state-machine.js';
import { workloadKey } from './types.js';
import { describeError } from './errors.js';
import { log, logError } from './logger.js';

async function runHealingPass(config: Config, runtime: Runtime): Promise<CycleOutcome[]> {
  log('==================== HEALING CYCLE ====================');

  const outcomes: CycleOutcome[] = [];
  for (const ref of config.workloads) {
    const outcome = await runtime.orchestrator.runCycle(ref);
    log(`[Healer] ${workloadKey(ref)}: ${outcome.kind}`);
    outcomes.push(outcome);
  }
  return outcomes;
}

async function printStatus(config: Config, runtime: Runtime): Promise<void> {
  for (const ref of config.workloads) {
    const state = await runtime.orchestrator.inspect(ref);
    const pending = state.pending ? ` pending=tier${state.pending.tier}@${state.pending.since.toISOString()}` : '';
    log(
      `[Status] ${workloadKey(ref)}: ${phaseOf(state.attempt)} attempt=${state.attempt} ` +
        `last_action=${state.lastAction} updated=${state.lastUpdated?.toISOString() ?? 'never'}${pending}`,
    );
  }
}

async function resetAll(config: Config, runtime: Runtime): Promise<void> {
  for (const ref of config.workloads) {
    await runtime.orchestrator.resetEpisode(ref);
  }
}

async function shutdownRuntime(runtime: Runtime): Promise<void> {
  await runtime.store.close();
  await runtime.events.close();
}

async function main(): Promise<number> {
  let config: Config;
  let runtime: Runtime;
  try {
    config = loadConfig();
    runtime = createRuntime(config);
  } catch (err) {
    logError(`[Healer] Configuration error: ${describeError(err)}`);
    return 1;
  }

  if (config.status) {
    await printStatus(config, runtime);
    await shutdownRuntime(runtime);
    return 0;
  }
  if (config.reset) {
    await resetAll(config, runtime);
    await shutdownRuntime(runtime);
    return 0;
  }

  log('Deploy Risk Healer starting');
  log(`Workloads: ${config.workloads.map(workloadKey).join(', ')}`);
  log(`Mode: ${config.daemon ? 'daemon' : 'single cycle'}`);
  log(`Risk threshold: ${config.riskThreshold} (${config.deployEnv})`);
  log(`State backend: ${config.stateBackend}`);
  log(`Interval: ${config.healthCheckIntervalSeconds}s`);

  const health = await runtime.predictor.health();
  log(
    health
      ? `[Predictor] status=${health.status} model_loaded=${health.model_loaded}`
      : '[Predictor] Inference service unreachable, fallback scoring until it answers',
  );

  await runtime.events.publishLifecycle(true);

  if (config.daemon && !config.once) {
    let stopping = false;
    const shutdown = async (): Promise<void> => {
      if (stopping) return;
      stopping = true;
      log('[Healer] Shutting down...');
      await runtime.events.publishLifecycle(false);
      await shutdownRuntime(runtime);
      process.exit(0);
    };
    const onSignal = (): void => {
      shutdown().catch(err => {
        logError(`[Healer] Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    for (;;) {
      try {
        await runHealingPass(config, runtime);
      } catch (err) {
        logError(`[Healer] Unexpected error: ${describeError(err)}`);
      }
      await new Promise(resolve => setTimeout(resolve, config.healthCheckIntervalSeconds * 1000));
    }
  }

  const outcomes = await runHealingPass(config, runtime);
  await runtime.events.publishLifecycle(false);
  await shutdownRuntime(runtime);
  return exitCodeFor(outcomes);
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
