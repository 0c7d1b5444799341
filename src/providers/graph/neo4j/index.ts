/**
 * Neo4j Graph Provider Module
 */

export type { Neo4jConfig } from './client';
export { Neo4jGraphClient } from './client';
export type { CommandMode, Neo4jContext } from './errors';
export { classifyNeo4jError, runCommand, runCommandWithRetry, withRetry } from './errors';
