import { z } from 'zod';
import { FeatureRow, JsonValue, SignalPayload } from '../types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const tradeLegSchema = z.object({
  marketId: z.string(),
  optionId: z.string(),
  side: z.enum(['buy', 'sell']),
  qty: z.number(),
  referencePrice: z.number(),
  limitPrice: z.number(),
  label: z.string(),
});

export const tradePlanSchema = z.object({
  action: z.string(),
  rationale: z.string(),
  legs: z.array(tradeLegSchema),
  estimatedEdgeBps: z.number().nullable(),
  confidence: z.number().nullable(),
});

const bookEntrySchema = z.object({
  optionId: z.string(),
  label: z.string(),
  price: z.number(),
  bestBid: z.number(),
  bestAsk: z.number(),
  liquidity: z.number(),
  ts: z.string().nullable(),
});

export const signalPayloadSchema = z.object({
  suggestedTrade: tradePlanSchema.optional(),
  bookSnapshot: z.array(bookEntrySchema).optional(),
  estimatedEdgeBps: z.number().optional(),
  gap: z.number().optional(),
  edgeScore: z.number().optional(),
  marketTitle: z.string().optional(),
  ruleName: z.string().optional(),
  ruleId: z.number().nullable().optional(),
  ruleType: z.string().optional(),
  details: z.record(jsonValueSchema).default({}),
});

export const featureRowSchema = z.object({
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
});

export function parseJsonColumn(value: unknown): unknown {
  if (typeof value === 'string') {
    return JSON.parse(value);
  }
  return value;
}

export function parseSignalPayload(value: unknown): SignalPayload {
  return signalPayloadSchema.parse(parseJsonColumn(value));
}

export function parseFeatureRow(value: unknown): FeatureRow | null {
  const parsed = featureRowSchema.safeParse(parseJsonColumn(value));
  return parsed.success ? parsed.data : null;
}

export function parseJsonObject(value: unknown): Record<string, unknown> {
  const parsed = parseJsonColumn(value);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return {};
}

export function parseStringArray(value: unknown): string[] {
  const parsed = z.array(z.string()).safeParse(parseJsonColumn(value));
  return parsed.success ? parsed.data : [];
}

export function parseNumberArray(value: unknown): number[] | undefined {
  if (value === null || value === undefined) return undefined;
  const parsed = z.array(z.number()).safeParse(parseJsonColumn(value));
  return parsed.success ? parsed.data : undefined;
}

export const signalLevelSchema = z.enum(['P1', 'P2', 'P3']);
export const signalSourceSchema = z.enum(['rule', 'ml', 'hybrid']);
export const tradeSideSchema = z.enum(['buy', 'sell']);
export const marketStatusSchema = z.enum(['active', 'closed']);
export const synonymMethodSchema = z.enum(['keyword', 'embedding', 'manual']);
export const intentStatusSchema = z.enum(['suggested', 'confirmed', 'sent', 'rejected', 'filled']);
