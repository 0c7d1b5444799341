/**
 * Neo4j Schema Management
 *
 * Idempotent creation of constraints and indexes at startup.
 */

import type { Session } from 'neo4j-driver';
import { INDEXES, LABELS } from './constants';
import { isSchemaAlreadyExistsError, type Neo4jContext, runCommandWithRetry } from './errors';
import { CONSTRAINTS, createVectorIndexQuery, RANGE_INDEXES } from './queries';

/**
 * Statements in creation order: constraints (which bring their own
 * indexes), range indexes, then the entity vector index.
 */
export function schemaStatements(dimensions: number): string[] {
  return [
    ...Object.values(CONSTRAINTS),
    ...Object.values(RANGE_INDEXES),
    createVectorIndexQuery(INDEXES.ENTITY_VECTOR, LABELS.ENTITY, dimensions)
  ];
}

export async function initializeSchema(ctx: Neo4jContext, dimensions: number): Promise<void> {
  await runCommandWithRetry(
    ctx,
    'write',
    async (session) => {
      for (const statement of schemaStatements(dimensions)) {
        await runIfMissing(session, statement);
      }
    },
    'initializeSchema'
  );
}

// Another instance may have created the element concurrently
async function runIfMissing(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (!isSchemaAlreadyExistsError(error)) throw error;
  }
}
