import { z } from 'zod';

// Provider types
export const llmProviders = [
  'openai',
  'anthropic',
  'google',
  'ollama',
  'openai-compatible'
] as const;
export type LLMProvider = (typeof llmProviders)[number];

export const embeddingProviders = ['openai', 'google', 'ollama', 'openai-compatible'] as const;
export type EmbeddingProvider = (typeof embeddingProviders)[number];

const CLOUD_PROVIDERS: readonly string[] = ['openai', 'anthropic', 'google'];

/**
 * Shared provider checks for the embedding and LLM sections.
 * Cloud providers need an apiKey and take no baseUrl; openai-compatible needs a baseUrl.
 */
function refineProvider(
  data: { provider: string; apiKey?: string; baseUrl?: string; providerName?: string },
  ctx: z.RefinementCtx
): void {
  if (CLOUD_PROVIDERS.includes(data.provider)) {
    if (!data.apiKey)
      ctx.addIssue({
        code: 'custom',
        path: ['apiKey'],
        message: `apiKey required for provider '${data.provider}'`
      });
    if (data.baseUrl)
      ctx.addIssue({
        code: 'custom',
        path: ['baseUrl'],
        message: `baseUrl not allowed for provider '${data.provider}'`
      });
  }
  if (data.provider === 'openai-compatible' && !data.baseUrl) {
    ctx.addIssue({
      code: 'custom',
      path: ['baseUrl'],
      message: "baseUrl required for provider 'openai-compatible'"
    });
  }
  if (data.provider !== 'openai-compatible' && data.providerName) {
    ctx.addIssue({
      code: 'custom',
      path: ['providerName'],
      message: "providerName only allowed for provider 'openai-compatible'"
    });
  }
}

// An empty string is what an unset {env:VAR} resolves to, so treat it as absent.
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const graphSchema = z.object({
  uri: z.string().min(1, 'graph.uri is required'),
  user: z.string().min(1, 'graph.user is required'),
  password: z.string().min(1, 'graph.password is required'),
  database: z.string().min(1).default('neo4j')
});

const embeddingSchema = z
  .object({
    provider: z.enum(embeddingProviders),
    providerName: z.string().min(1).optional(),
    model: z.string().min(1),
    dimensions: z.number().int().positive(),
    apiKey: optionalSecret,
    baseUrl: z.string().url().optional()
  })
  .superRefine(refineProvider);

const llmSchema = z
  .object({
    provider: z.enum(llmProviders),
    providerName: z.string().min(1).optional(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    apiKey: optionalSecret,
    baseUrl: z.string().url().optional()
  })
  .superRefine(refineProvider);
export type LLMConfig = z.infer<typeof llmSchema>;

const timeoutsSchema = z.object({
  embeddingMs: z.number().int().positive().default(4000),
  clusterSearchMs: z.number().int().positive().default(2000),
  vectorSearchMs: z.number().int().positive().default(2000),
  memoryMs: z.number().int().positive().default(1500)
});
export type StageTimeouts = z.infer<typeof timeoutsSchema>;

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),

    server: z
      .object({
        port: z.number().int().min(1).max(65535).default(6377)
      })
      .optional(),

    graph: graphSchema,
    embedding: embeddingSchema,
    llm: llmSchema.optional(),

    memory: z
      .object({
        ttlMinutes: z.number().positive().default(15),
        maxEntities: z.number().int().positive().default(20)
      })
      .optional(),

    retrieval: z
      .object({
        timeouts: timeoutsSchema.optional()
      })
      .optional(),

    enrichment: z
      .object({
        workers: z.number().int().min(1).max(16).default(2),
        queueSize: z.number().int().min(1).default(32),
        summarizerTimeoutMs: z.number().int().positive().default(8000)
      })
      .optional()
  })
  .transform((data) => {
    // Apply section defaults so consumers never deal with optional sections
    const server = { port: data.server?.port ?? 6377 };
    const memory = {
      ttlMinutes: data.memory?.ttlMinutes ?? 15,
      maxEntities: data.memory?.maxEntities ?? 20
    };
    const retrieval = {
      timeouts: timeoutsSchema.parse(data.retrieval?.timeouts ?? {})
    };
    const enrichment = {
      workers: data.enrichment?.workers ?? 2,
      queueSize: data.enrichment?.queueSize ?? 32,
      summarizerTimeoutMs: data.enrichment?.summarizerTimeoutMs ?? 8000
    };

    return { ...data, server, memory, retrieval, enrichment };
  });

export type Config = z.infer<typeof configSchema>;
