/**
 * Neo4j Entity Operations
 *
 * Read-only access to indexed entities: vector search and lookups.
 */

import neo4j from 'neo4j-driver';
import type { EntityFilter, SearchResult, StoredEntity } from '../../types';
import { type Neo4jContext, runCommandWithRetry } from '../errors';
import { recordToEntity } from '../mapping';
import { FIND_ENTITIES, GET_ENTITIES_BY_IDS, SEARCH_ENTITIES } from '../queries';

/** Over-fetch factor for filtered vector searches */
const FILTERED_FETCH_FACTOR = 4;

function filterParams(filter?: EntityFilter): { domains: string[] | null; areas: string[] | null } {
  return {
    domains: filter?.domains && filter.domains.length > 0 ? filter.domains : null,
    areas: filter?.areas && filter.areas.length > 0 ? filter.areas : null
  };
}

// ============================================================
// VECTOR SEARCH
// ============================================================

/**
 * Top entities by cosine similarity.
 *
 * @param vector - Query vector (must be L2 normalized)
 */
export async function searchEntities(
  ctx: Neo4jContext,
  vector: number[],
  limit: number,
  filter?: EntityFilter
): Promise<SearchResult<StoredEntity>[]> {
  if (limit <= 0) return [];
  const params = filterParams(filter);
  const filtered = params.domains !== null || params.areas !== null;
  const fetch = filtered ? limit * FILTERED_FETCH_FACTOR : limit;

  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(SEARCH_ENTITIES, {
        vector,
        limit: neo4j.int(limit),
        fetch: neo4j.int(fetch),
        ...params
      });

      return result.records.map((r) => {
        const score: unknown = r.get('score');
        return {
          node: recordToEntity(r.get('node')),
          score: typeof score === 'number' ? score : 0
        };
      });
    },
    'searchEntities'
  );
}

// ============================================================
// LOOKUPS
// ============================================================

export async function getEntitiesByIds(
  ctx: Neo4jContext,
  ids: string[]
): Promise<StoredEntity[]> {
  if (ids.length === 0) return [];

  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(GET_ENTITIES_BY_IDS, { ids });
      return result.records.map((r) => recordToEntity(r.get('node')));
    },
    'getEntitiesByIds'
  );
}

export async function findEntities(
  ctx: Neo4jContext,
  filter: EntityFilter,
  limit: number
): Promise<StoredEntity[]> {
  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(FIND_ENTITIES, {
        ...filterParams(filter),
        limit: neo4j.int(limit)
      });
      return result.records.map((r) => recordToEntity(r.get('node')));
    },
    'findEntities'
  );
}
