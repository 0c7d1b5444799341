/**
 * Lenient readers for whatever the pipeline hands the debug side channel.
 * Anything that does not parse is skipped, never thrown.
 */

import { z } from 'zod';

const ClusterContextSchema = z.object({
  clusterKey: z.string(),
  clusterScore: z.number().optional()
});

export const DebugCandidateSchema = z.object({
  entityId: z.string().min(1),
  domain: z.string().nullish(),
  area: z.string().nullish(),
  state: z.string().nullish(),
  friendlyName: z.string().nullish(),
  similarity: z.number().optional(),
  annotations: z
    .object({
      clusterContext: ClusterContextSchema.optional(),
      vectorScore: z.number().optional(),
      memoryBoosted: z.boolean().optional(),
      memoryRelevance: z.number().optional()
    })
    .optional()
});
export type DebugCandidate = z.infer<typeof DebugCandidateSchema>;

export const DebugScoreSchema = z.object({
  entity: DebugCandidateSchema,
  baseScore: z.number(),
  contextBoost: z.number(),
  finalScore: z.number(),
  rankingFactors: z.record(z.string(), z.number()),
  usedFallbackMatching: z.boolean().optional(),
  crossEncoderScore: z.number().optional()
});
export type DebugScore = z.infer<typeof DebugScoreSchema>;

/** Candidates in `items`, malformed entries dropped */
export function readCandidates(items: readonly unknown[] | null | undefined): DebugCandidate[] {
  return readAll(items, DebugCandidateSchema);
}

/** Entity scores in `items`, malformed entries dropped */
export function readScores(items: readonly unknown[] | null | undefined): DebugScore[] {
  return readAll(items, DebugScoreSchema);
}

function readAll<T>(items: readonly unknown[] | null | undefined, schema: z.ZodType<T>): T[] {
  if (!items) return [];
  const parsed: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) parsed.push(result.data);
  }
  return parsed;
}
