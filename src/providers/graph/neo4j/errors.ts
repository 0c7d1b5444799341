/**
 * Neo4j Error Handling & Session Management
 *
 * Driver failures are classified into GraphErrorType, transient ones are
 * retried with backoff, and every operation runs inside a session that
 * runCommand opens and closes.
 */

import type { Driver, Session } from 'neo4j-driver';
import type { GraphErrorType } from '../types';
import { GraphClientError } from '../types';
import { RETRY } from './constants';

/**
 * What every operation needs to open a session.
 */
export interface Neo4jContext {
  driver: Driver;
  database: string;
}

export type CommandMode = 'read' | 'write';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

interface ClassificationRule {
  type: GraphErrorType;
  /** Lowercase fragments looked for in the message */
  message: readonly string[];
  /** Lowercase fragments looked for in the driver's status code */
  code: readonly string[];
}

// First match wins
const RULES: readonly ClassificationRule[] = [
  { type: 'CONNECTION_ERROR', message: ['connection', 'unavailable', 'failed to connect'], code: [] },
  { type: 'CONSTRAINT_VIOLATION', message: ['constraint', 'unique'], code: ['constraint'] },
  { type: 'TRANSIENT_ERROR', message: ['deadlock', 'timeout', 'transient'], code: ['transient', 'deadlock'] }
];

const SCHEMA_EXISTS_FRAGMENTS = ['equivalent', 'already exists', 'constraintalreadyexists', 'indexalreadyexists'];

function statusCode(error: Error): string {
  const code: unknown = 'code' in error ? error.code : undefined;
  return typeof code === 'string' ? code.toLowerCase() : '';
}

function mentions(text: string, fragments: readonly string[]): boolean {
  return fragments.some((fragment) => text.includes(fragment));
}

export function classifyNeo4jError(error: unknown): GraphErrorType {
  if (error instanceof GraphClientError) return error.type;
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = statusCode(error);
  const rule = RULES.find((r) => mentions(message, r.message) || mentions(code, r.code));
  return rule?.type ?? 'QUERY_ERROR';
}

/**
 * A schema statement that failed only because the element exists.
 */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  return error instanceof Error && mentions(error.message.toLowerCase(), SCHEMA_EXISTS_FRAGMENTS);
}

/**
 * Wrap a driver failure, keeping an existing GraphClientError as it is.
 */
function toGraphError(error: unknown, prefix: string, type = classifyNeo4jError(error)): GraphClientError {
  if (error instanceof GraphClientError) return error;
  const cause = error instanceof Error ? error : undefined;
  return new GraphClientError(`${prefix}: ${cause?.message ?? String(error)}`, type, cause);
}

// ============================================================
// RETRY
// ============================================================

function backoff(attempt: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, RETRY.BASE_DELAY_MS * 2 ** attempt));
}

/**
 * Run an operation, retrying TRANSIENT_ERROR with exponential backoff.
 * Constraint violations and missing records fail on the first attempt;
 * anything else gives up after it.
 */
export async function withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const type = classifyNeo4jError(error);
      if (type === 'CONSTRAINT_VIOLATION' || type === 'NOT_FOUND') {
        throw toGraphError(error, `${operationName} failed`, type);
      }
      if (type !== 'TRANSIENT_ERROR' || attempt >= RETRY.MAX_ATTEMPTS - 1) {
        throw toGraphError(error, `Operation ${operationName} failed`, type);
      }
      await backoff(attempt);
    }
  }
}

// ============================================================
// SESSIONS
// ============================================================

/**
 * Run an operation in a session of the given access mode. The session
 * is closed whatever happens; failures surface as GraphClientError.
 */
export async function runCommand<T>(
  ctx: Neo4jContext,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  const session = ctx.driver.session({
    database: ctx.database,
    defaultAccessMode: mode === 'read' ? 'READ' : 'WRITE'
  });
  try {
    return await operation(session);
  } catch (error) {
    throw toGraphError(error, `${operationName} failed`);
  } finally {
    await session.close();
  }
}

export async function runCommandWithRetry<T>(
  ctx: Neo4jContext,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  return withRetry(() => runCommand(ctx, mode, operation, operationName), operationName);
}
