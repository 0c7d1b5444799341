/**
 * Neo4j Document Operations
 *
 * Key/value JSON documents with an expiry timestamp.
 */

import type { StoredDocument } from '../../types';
import { type Neo4jContext, runCommandWithRetry } from '../errors';
import { recordToDocument, toCount, toStoreTimestamp } from '../mapping';
import {
  DELETE_DOCUMENT,
  DELETE_EXPIRED_DOCUMENTS,
  GET_DOCUMENT,
  PUT_DOCUMENT
} from '../queries';

export async function getDocument(
  ctx: Neo4jContext,
  key: string
): Promise<StoredDocument | null> {
  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(GET_DOCUMENT, { key });
      const [record] = result.records;
      return record ? recordToDocument(record.get('node')) : null;
    },
    'getDocument'
  );
}

export async function putDocument(
  ctx: Neo4jContext,
  document: StoredDocument
): Promise<void> {
  await runCommandWithRetry(
    ctx,
    'write',
    async (session) => {
      await session.executeWrite((tx) =>
        tx.run(PUT_DOCUMENT, {
          key: document.key,
          body: document.body,
          expires_at: document.expiresAt,
          timestamp: toStoreTimestamp()
        })
      );
    },
    'putDocument'
  );
}

export async function deleteDocument(
  ctx: Neo4jContext,
  key: string
): Promise<boolean> {
  return runCommandWithRetry(
    ctx,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) => tx.run(DELETE_DOCUMENT, { key }));
      return toCount(result.records[0]?.get('deleted')) > 0;
    },
    'deleteDocument'
  );
}

export async function deleteExpiredDocuments(
  ctx: Neo4jContext,
  prefix: string,
  at: string
): Promise<number> {
  return runCommandWithRetry(
    ctx,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(DELETE_EXPIRED_DOCUMENTS, { prefix, now: at })
      );
      return toCount(result.records[0]?.get('deleted'));
    },
    'deleteExpiredDocuments'
  );
}
