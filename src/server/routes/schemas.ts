/**
 * Request Body Schemas
 */

import { z } from 'zod';
import { CLUSTER_ROLES } from '@/core/entities/types';

const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string()
});

export const RetrieveRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  conversation_id: z.string().min(1).optional(),
  history: z.array(ChatMessageSchema).default([]),
  debug: z.boolean().default(false)
});
export type RetrieveRequest = z.infer<typeof RetrieveRequestSchema>;

export const ScopeRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  history: z.array(ChatMessageSchema).default([])
});

export const AddMemberRequestSchema = z.object({
  entity_id: z.string().min(1),
  role: z.enum(CLUSTER_ROLES).default('primary'),
  weight: z.number().min(0).default(1.0),
  context_boost: z.number().min(0).default(1.0)
});

export const TracesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50)
});
