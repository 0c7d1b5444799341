/**
 * Neo4j Record Mapping
 *
 * Translators from driver records to provider records. Node properties
 * go through zod schemas; a node that does not fit throws.
 */

import neo4j from 'neo4j-driver';
import { z } from 'zod';
import { CLUSTER_ROLES, CLUSTER_TYPES } from '@/core/entities/types';
import type { ClusterRecord, StoredDocument, StoredEntity } from '../types';

// ============================================================
// NODE SHAPES
// ============================================================

const nodeSchema = z.object({
  properties: z.record(z.string(), z.unknown())
});

/**
 * Shape of a Neo4j node as returned by the driver.
 */
export type Neo4jNode = z.infer<typeof nodeSchema>;

const nullableString = z.string().nullish().transform((value) => value ?? null);
const stringList = z.array(z.string()).nullish().transform((value) => value ?? []);

/** Neo4j returns whole numbers as Integer objects */
const numeric = z.unknown().transform((value, ctx) => {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  ctx.addIssue({ code: 'custom', message: 'expected a number' });
  return z.NEVER;
});

const attributesSchema = z
  .string()
  .nullish()
  .transform((value): Record<string, unknown> => {
    if (!value) return {};
    try {
      const parsed: unknown = JSON.parse(value);
      const result = z.record(z.string(), z.unknown()).safeParse(parsed);
      return result.success ? result.data : {};
    } catch {
      return {};
    }
  });

const entityPropertiesSchema = z.object({
  entity_id: z.string(),
  domain: z.string().nullish(),
  area: nullableString,
  state: nullableString,
  device_class: nullableString,
  friendly_name: nullableString,
  text: nullableString,
  attributes: attributesSchema,
  embedding: z.array(numeric).nullish().transform((value) => value ?? null)
});

const clusterPropertiesSchema = z.object({
  key: z.string(),
  name: z.string(),
  type: z.enum(CLUSTER_TYPES),
  scope: z.enum(['specific', 'area_wide', 'global']),
  description: z.string(),
  embedding: z.array(numeric).nullish().transform((value) => value ?? []),
  query_patterns: stringList,
  areas: stringList,
  domains: stringList,
  created_at: z.string(),
  updated_at: z.string()
});

const documentPropertiesSchema = z.object({
  key: z.string(),
  body: z.string(),
  expires_at: z.string()
});

export const membershipSchema = z.object({
  cluster_key: z.string(),
  role: z.enum(CLUSTER_ROLES),
  weight: numeric,
  context_boost: numeric
});

// ============================================================
// RECORD TRANSLATORS
// ============================================================

function properties(node: unknown): Record<string, unknown> {
  return nodeSchema.parse(node).properties;
}

export function recordToEntity(node: unknown): StoredEntity {
  const props = entityPropertiesSchema.parse(properties(node));
  const dot = props.entity_id.indexOf('.');
  return {
    entityId: props.entity_id,
    domain: props.domain ?? (dot > 0 ? props.entity_id.slice(0, dot) : ''),
    area: props.area,
    state: props.state,
    deviceClass: props.device_class,
    friendlyName: props.friendly_name,
    text: props.text,
    attributes: props.attributes,
    embedding: props.embedding
  };
}

export function recordToCluster(node: unknown): ClusterRecord {
  const props = clusterPropertiesSchema.parse(properties(node));
  return {
    key: props.key,
    name: props.name,
    type: props.type,
    scope: props.scope,
    description: props.description,
    embedding: props.embedding,
    queryPatterns: props.query_patterns,
    areas: props.areas,
    domains: props.domains,
    createdAt: props.created_at,
    updatedAt: props.updated_at
  };
}

export function recordToDocument(node: unknown): StoredDocument {
  const props = documentPropertiesSchema.parse(properties(node));
  return { key: props.key, body: props.body, expiresAt: props.expires_at };
}

/**
 * Read an aggregate count column.
 */
export function toCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return 0;
}

/** Stored timestamps are ISO-8601 strings, compared lexically by the expiry queries */
export function toStoreTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}
