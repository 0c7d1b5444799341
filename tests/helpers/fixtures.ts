/**
 * Test Fixtures
 *
 * Shared test data: vectors, configs and a small home of entities.
 */

import type { Config } from '@/config/schema';
import { configSchema } from '@/config/schema';
import { type CandidateInit, createCandidate } from '@/core/entities/candidate';
import type { EntityCandidate } from '@/core/entities/types';
import type { StoredEntity } from '@/providers/graph/types';
import { keywordVector } from './mocks';

// ═══════════════════════════════════════════════════════════════════════════════
// Vector Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

export const UNIT_VECTOR_X = [1, 0, 0];
export const UNIT_VECTOR_Y = [0, 1, 0];
export const ZERO_VECTOR = [0, 0, 0];

/** |v| = 5, normalizes to NORMALIZED_VECTOR */
export const UNNORMALIZED_VECTOR = [3, 4, 0];
export const NORMALIZED_VECTOR = [0.6, 0.8, 0];

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config for testing */
export const VALID_MINIMAL_CONFIG = {
  graph: {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'test-password'
  },
  embedding: {
    provider: 'openai' as const,
    apiKey: 'test-key',
    model: 'text-embedding-3-small',
    dimensions: 1536
  }
};

/** Valid config with openai-compatible providers and an llm section */
export const VALID_COMPATIBLE_CONFIG = {
  graph: {
    uri: 'bolt://localhost:7687',
    user: 'neo4j',
    password: 'test-password',
    database: 'home'
  },
  embedding: {
    provider: 'openai-compatible' as const,
    providerName: 'local',
    baseUrl: 'http://localhost:8080/v1',
    model: 'custom-embedding',
    dimensions: 768
  },
  llm: {
    provider: 'openai-compatible' as const,
    baseUrl: 'http://localhost:8080/v1',
    model: 'custom-model',
    temperature: 0.2
  }
};

/** Parsed config sized for the keyword embedding stub */
export function createTestConfig(): Config {
  return configSchema.parse({
    ...VALID_MINIMAL_CONFIG,
    embedding: { ...VALID_MINIMAL_CONFIG.embedding, dimensions: 6 },
    enrichment: { workers: 1, queueSize: 4, summarizerTimeoutMs: 200 }
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entity Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stored entity whose embedding is the keyword vector of its text.
 */
export function makeEntity(entityId: string, overrides: Partial<StoredEntity> = {}): StoredEntity {
  const [domain = 'sensor'] = entityId.split('.');
  const text = overrides.text ?? entityId.replace(/[._]/g, ' ');
  return {
    entityId,
    domain,
    area: null,
    state: null,
    deviceClass: null,
    friendlyName: null,
    text,
    attributes: {},
    embedding: keywordVector(text),
    ...overrides
  };
}

export const LIVING_ROOM_LIGHT = makeEntity('light.nappali_lampa', {
  area: 'nappali',
  state: 'on',
  friendlyName: 'Nappali lámpa',
  text: 'Nappali lámpa'
});

export const KITCHEN_LIGHT = makeEntity('light.konyha_lampa', {
  area: 'konyha',
  state: 'off',
  friendlyName: 'Konyha lámpa',
  text: 'Konyha lámpa'
});

export const LIVING_ROOM_TEMPERATURE = makeEntity('sensor.nappali_homerseklet', {
  area: 'nappali',
  state: '22.5',
  deviceClass: 'temperature',
  friendlyName: 'Nappali hőmérséklet',
  text: 'Nappali hőmérséklet',
  attributes: { unit_of_measurement: '°C' }
});

export const KITCHEN_TEMPERATURE = makeEntity('sensor.konyha_homerseklet', {
  area: 'konyha',
  state: 'unavailable',
  deviceClass: 'temperature',
  friendlyName: 'Konyha hőmérséklet',
  text: 'Konyha hőmérséklet',
  attributes: { unit_of_measurement: '°C' }
});

export const POWER_METER = makeEntity('sensor.energia_fogyasztas', {
  state: '1250',
  deviceClass: 'energy',
  friendlyName: 'Energia fogyasztás',
  text: 'Energia fogyasztás',
  attributes: { unit_of_measurement: 'W' }
});

export const FRONT_DOOR_LOCK = makeEntity('lock.bejarati_ajto', {
  area: 'előszoba',
  state: 'locked',
  friendlyName: 'Bejárati ajtó zár',
  text: 'Bejárati ajtó zár'
});

export const HOME_ENTITIES: StoredEntity[] = [
  LIVING_ROOM_LIGHT,
  KITCHEN_LIGHT,
  LIVING_ROOM_TEMPERATURE,
  KITCHEN_TEMPERATURE,
  POWER_METER,
  FRONT_DOOR_LOCK
];

/**
 * Retrieval candidate built from a stored entity.
 */
export function toCandidate(
  entity: StoredEntity,
  similarity: number,
  overrides: Partial<CandidateInit> = {}
): EntityCandidate {
  return createCandidate({
    entityId: entity.entityId,
    domain: entity.domain,
    area: entity.area,
    state: entity.state,
    deviceClass: entity.deviceClass,
    friendlyName: entity.friendlyName,
    text: entity.text,
    attributes: entity.attributes,
    similarity,
    source: 'vector',
    ...overrides
  });
}
