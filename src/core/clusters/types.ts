/**
 * Cluster Types
 */

import { z } from 'zod';
import { CLUSTER_TYPES } from '@/core/entities/types';
import type { ClusterRecord, ClusterScope } from '@/providers/graph/types';

export const CLUSTER_SCOPES = ['specific', 'area_wide', 'global'] as const satisfies readonly ClusterScope[];

/**
 * A cluster as declared by a caller or the bootstrap table.
 * Everything but key, name, type and description is optional.
 */
export const ClusterDefinitionSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, 'key must be lowercase letters, digits and underscores'),
  name: z.string().min(1),
  type: z.enum(CLUSTER_TYPES),
  description: z.string().min(1),
  queryPatterns: z.array(z.string()).default([]),
  areas: z.array(z.string()).default([]),
  domains: z.array(z.string()).default([]),
  scope: z.enum(CLUSTER_SCOPES).default('specific')
});
export type ClusterDefinition = z.infer<typeof ClusterDefinitionSchema>;
export type ClusterDefinitionInput = z.input<typeof ClusterDefinitionSchema>;

export const BootstrapFileSchema = z.object({
  clusters: z.array(ClusterDefinitionSchema)
});

/**
 * A cluster that matched a query vector.
 */
export interface ClusterMatch {
  cluster: ClusterRecord;
  similarity: number;
}

export interface BootstrapResult {
  created: string[];
  skipped: string[];
  failed: string[];
  members: number;
}
