/**
 * Risk Predictor
 *
 * Scores a feature record through the inference service (POST /predict) and
 * falls back to the local heuristic when the service is unreachable, answers
 * with something unusable, or reports that no model is loaded.
 */

import { z } from 'zod';
import type { Config } from '../config.js';
import type { FeatureRecord, RiskAssessment } from '../types.js';
import { describeError } from '../errors.js';
import { requestJson } from '../services/http.js';
import { withRetry } from '../services/retry.js';
import { fallbackScore, labelFor } from './fallback.js';
import { log, logWarn } from '../logger.js';

export interface RiskPredictor {
  assess(features: FeatureRecord): Promise<RiskAssessment>;
}

export type PredictorConfig = Pick<
  Config,
  'predictorUrl' | 'predictorTimeoutMs' | 'predictorRetryDelayMs' | 'riskThreshold'
>;

const predictResponseSchema = z.object({
  probability: z.number().finite(),
  risk: z.enum(['HIGH', 'LOW']).optional(),
  features: z.record(z.number()).optional(),
  model_loaded: z.boolean().default(true),
  model_error: z.string().nullable().optional(),
});

export const healthResponseSchema = z.object({
  ok: z.boolean(),
  status: z.string(),
  model_loaded: z.boolean(),
  model_error: z.string().nullable(),
  model_path: z.string(),
  model_path_exists: z.boolean(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;

export class InferenceClient implements RiskPredictor {
  constructor(private readonly config: PredictorConfig) {}

  async assess(features: FeatureRecord): Promise<RiskAssessment> {
    const url = `${this.config.predictorUrl}/predict`;

    let body: unknown;
    try {
      body = await withRetry(
        () => requestJson(url, { method: 'POST', body: JSON.stringify(features) }, this.config.predictorTimeoutMs),
        { retries: 1, delayMs: this.config.predictorRetryDelayMs, label: '[Predictor]' },
      );
    } catch (err) {
      return this.fallback(features, `inference service unavailable: ${describeError(err)}`);
    }

    const parsed = predictResponseSchema.safeParse(body);
    if (!parsed.success) {
      return this.fallback(features, `malformed /predict response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    if (!parsed.data.model_loaded) {
      return this.fallback(features, `model not loaded: ${parsed.data.model_error ?? 'unknown error'}`);
    }

    const probability = Math.min(Math.max(parsed.data.probability, 0), 1);
    return {
      probability,
      riskLabel: labelFor(probability, this.config.riskThreshold),
      degraded: false,
      source: 'model',
    };
  }

  /**
   * GET /healthz. Returns null when the service is down or answers with an
   * unexpected shape.
   */
  async health(): Promise<HealthResponse | null> {
    try {
      const body = await requestJson(`${this.config.predictorUrl}/healthz`, { method: 'GET' }, this.config.predictorTimeoutMs);
      const parsed = healthResponseSchema.safeParse(body);
      return parsed.success ? parsed.data : null;
    } catch (err) {
      log(`[Predictor] Health check failed: ${describeError(err)}`);
      return null;
    }
  }

  private fallback(features: FeatureRecord, reason: string): RiskAssessment {
    const probability = fallbackScore(features);
    logWarn(`[Predictor] ${reason}; using fallback score ${probability.toFixed(3)}`);
    return {
      probability,
      riskLabel: labelFor(probability, this.config.riskThreshold),
      degraded: true,
      source: 'fallback',
      reason,
    };
  }
}
