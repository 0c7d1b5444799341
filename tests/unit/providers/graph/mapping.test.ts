/**
 * Neo4j Record Mapping Tests
 */

import neo4j from 'neo4j-driver';
import { describe, expect, test } from 'vitest';
import {
  recordToCluster,
  recordToDocument,
  recordToEntity,
  toCount,
  toStoreTimestamp
} from '@/providers/graph/neo4j/mapping';

describe('recordToEntity', () => {
  test('maps snake_case properties and parses attributes', () => {
    const entity = recordToEntity({
      properties: {
        entity_id: 'light.nappali',
        domain: 'light',
        area: 'nappali',
        state: 'on',
        friendly_name: 'Nappali lámpa',
        attributes: '{"brightness": 200}',
        embedding: [neo4j.int(1), 0.5]
      }
    });

    expect(entity).toEqual({
      entityId: 'light.nappali',
      domain: 'light',
      area: 'nappali',
      state: 'on',
      deviceClass: null,
      friendlyName: 'Nappali lámpa',
      text: null,
      attributes: { brightness: 200 },
      embedding: [1, 0.5]
    });
  });

  test('derives the domain from the entity id', () => {
    expect(recordToEntity({ properties: { entity_id: 'sensor.temp_konyha' } }).domain).toBe('sensor');
    expect(recordToEntity({ properties: { entity_id: 'nodot' } }).domain).toBe('');
  });

  test('drops attributes that are not a JSON object', () => {
    expect(recordToEntity({ properties: { entity_id: 'a.b', attributes: '{broken' } }).attributes).toEqual({});
    expect(recordToEntity({ properties: { entity_id: 'a.b', attributes: '[1, 2]' } }).attributes).toEqual({});
  });

  test('rejects a node without an entity id', () => {
    expect(() => recordToEntity({ properties: { domain: 'light' } })).toThrow();
  });
});

describe('recordToCluster', () => {
  test('defaults missing lists', () => {
    const cluster = recordToCluster({
      properties: {
        key: 'all_lights',
        name: 'All lights',
        type: 'overview_cluster',
        scope: 'global',
        description: 'lámpa',
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-02T00:00:00.000Z'
      }
    });

    expect(cluster.embedding).toEqual([]);
    expect(cluster.queryPatterns).toEqual([]);
    expect(cluster.areas).toEqual([]);
    expect(cluster.domains).toEqual([]);
    expect(cluster.updatedAt).toBe('2026-01-02T00:00:00.000Z');
  });
});

describe('recordToDocument', () => {
  test('maps the expiry', () => {
    expect(
      recordToDocument({ properties: { key: 'k', body: '{}', expires_at: '2026-01-01T00:00:00.000Z' } })
    ).toEqual({ key: 'k', body: '{}', expiresAt: '2026-01-01T00:00:00.000Z' });
  });
});

describe('toCount', () => {
  test('reads numbers and driver integers', () => {
    expect(toCount(3)).toBe(3);
    expect(toCount(neo4j.int(7))).toBe(7);
    expect(toCount(null)).toBe(0);
  });
});

describe('toStoreTimestamp', () => {
  test('formats as ISO 8601', () => {
    expect(toStoreTimestamp(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)))).toBe('2026-01-02T03:04:05.006Z');
  });
});
