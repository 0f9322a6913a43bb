import fs from 'fs';
import { z } from 'zod';
import { FEATURE_NAMES, FeatureRow } from '../types';
import { MLPredictor } from './interfaces';
import { ConfigurationError, errorMessage } from '../utils/ErrorHandler';
import { logger } from '../utils/logger';

const coefficientsSchema = z.object({
  midPrice: z.number(),
  spread: z.number(),
  volume: z.number(),
  bestBidSize: z.number(),
  bestAskSize: z.number(),
  sizeImbalance: z.number(),
  zscoreSpread5m: z.number(),
  priceVelocity10s: z.number(),
  timeToExpiryMinutes: z.number(),
  daysToExpiry: z.number(),
  synonymPriceDeltaZscore: z.number(),
  volatility5m: z.number(),
}).partial();

export const logisticModelSchema = z.object({
  name: z.string().default('logistic'),
  intercept: z.number(),
  coefficients: coefficientsSchema,
  /** Optional standardisation applied before the linear term. */
  means: coefficientsSchema.default({}),
  scales: coefficientsSchema.default({}),
});

export type LogisticModelSpec = z.infer<typeof logisticModelSchema>;

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * Logistic regression over the feature row, loaded from a JSON document.
 * Features without a coefficient contribute nothing.
 */
export class LogisticModel implements MLPredictor {
  readonly spec: LogisticModelSpec;

  constructor(spec: LogisticModelSpec) {
    this.spec = spec;
  }

  predictProbabilities(rows: FeatureRow[]): number[] {
    return rows.map(row => this.predictOne(row));
  }

  private predictOne(row: FeatureRow): number {
    let z = this.spec.intercept;
    for (const name of FEATURE_NAMES) {
      const weight = this.spec.coefficients[name];
      if (weight === undefined) continue;
      const centre = this.spec.means[name] ?? 0;
      const scale = this.spec.scales[name] || 1;
      const value = Number.isFinite(row[name]) ? row[name] : 0;
      z += weight * ((value - centre) / scale);
    }
    return sigmoid(z);
  }
}

export function loadModel(modelPath: string): LogisticModel {
  let raw: string;
  try {
    raw = fs.readFileSync(modelPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`ML model not readable at ${modelPath}: ${errorMessage(error)}`);
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`ML model at ${modelPath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = logisticModelSchema.safeParse(parsedJson);
  if (!parsed.success) {
    throw new ConfigurationError(`ML model at ${modelPath} is invalid`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.info(`ML model loaded: ${parsed.data.name} (${modelPath})`);
  return new LogisticModel(parsed.data);
}
