import { z } from 'zod';
import { DETECTOR_KINDS } from '../types';

export const RULE_PAYLOAD_MAX_BYTES = 16000;

const scoreSchema = z.object({
  base: z.number().optional(),
  weights: z.record(z.number()).default({}),
});

/**
 * Declarative rule document. Unknown top-level keys are rejected; nested
 * `params` stay free-form and are read by each detector with its own defaults.
 */
export const ruleDocumentSchema = z
  .object({
    name: z.string().trim().min(1).max(120),
    type: z.enum(DETECTOR_KINDS),
    enabled: z.boolean().default(true),
    description: z.string().optional(),
    tags: z.array(z.string()).default([]),
    params: z.record(z.unknown()).default({}),
    outputs: z.object({
      level: z.enum(['P1', 'P2', 'P3']),
      score: scoreSchema.optional(),
    }),
    scope: z
      .object({
        platforms: z.array(z.string()).optional(),
        tags: z.array(z.string()).optional(),
      })
      .default({}),
    dedupe: z
      .object({
        cooldown_secs: z.number().nonnegative().optional(),
      })
      .default({}),
  })
  .strict();

export type RuleDocument = z.infer<typeof ruleDocumentSchema>;
