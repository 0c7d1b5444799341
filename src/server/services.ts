/**
 * Service Composition
 *
 * Builds every client and service once from the validated config. No
 * module-level state: the entry point builds one set, tests build their
 * own with in-process clients swapped in.
 */

import type { Config } from '@/config/schema';
import {
  ClusterManager,
  ContextReranker,
  ConversationAnalyzer,
  ConversationEnricher,
  ConversationMemoryService,
  ConversationSummarizer,
  createLanguagePack,
  createRetrievalConfig,
  EntityContextTracker,
  type LanguagePack,
  QueryExpansionMemory,
  QueryScopeDetector,
  type RetrievalConfig,
  type RetrievalDependencies,
  SearchDebugger,
  TurnProcessor,
  WorkflowTracer
} from '@/core';
import { createMemoryConfig } from '@/core/memory';
import { rankingDefaults } from '@/core/ranking';
import { createEmbeddingClient } from '@/providers/embedding/factory';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { Neo4jGraphClient } from '@/providers/graph';
import type { GraphClient } from '@/providers/graph/types';
import { createLLMClient } from '@/providers/llm/factory';
import type { LLMClient } from '@/providers/llm/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServiceClients {
  graphClient: GraphClient;
  embeddingClient: EmbeddingClient;
  /** Absent when no llm section is configured */
  llmClient: LLMClient | null;
}

export interface Services extends ServiceClients {
  config: Config;
  pack: LanguagePack;
  scopeDetector: QueryScopeDetector;
  clusterManager: ClusterManager;
  memoryService: ConversationMemoryService;
  tracker: EntityContextTracker;
  enricher: ConversationEnricher;
  tracer: WorkflowTracer;
  retrieval: RetrievalDependencies;
  retrievalConfig: RetrievalConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Construction
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create the provider clients described by the config.
 * Nothing connects here; see startServices().
 */
export function createClients(config: Config): ServiceClients {
  const graphClient = new Neo4jGraphClient({
    uri: config.graph.uri,
    user: config.graph.user,
    password: config.graph.password,
    database: config.graph.database
  });

  const embeddingClient = createEmbeddingClient(
    config.embedding.provider,
    config.embedding.model,
    config.embedding.dimensions,
    {
      apiKey: config.embedding.apiKey,
      baseUrl: config.embedding.baseUrl,
      providerName: config.embedding.providerName
    }
  );

  const llmClient = config.llm
    ? createLLMClient(config.llm.provider, config.llm.model, {
        apiKey: config.llm.apiKey,
        baseUrl: config.llm.baseUrl,
        providerName: config.llm.providerName
      })
    : null;

  return { graphClient, embeddingClient, llmClient };
}

/**
 * Wire every service. Clients given in `clients` replace the configured ones.
 */
export function createServices(config: Config, clients: Partial<ServiceClients> = {}): Services {
  const { graphClient, embeddingClient, llmClient } = resolveClients(config, clients);

  const pack = createLanguagePack();
  const memoryConfig = createMemoryConfig({
    ttlMinutes: config.memory.ttlMinutes,
    maxEntities: config.memory.maxEntities
  });

  const analyzer = new ConversationAnalyzer(pack, rankingDefaults.context);
  const scopeDetector = new QueryScopeDetector(pack, analyzer);
  const clusterManager = new ClusterManager(graphClient, embeddingClient);
  const reranker = new ContextReranker(pack, rankingDefaults, analyzer);

  const memoryService = new ConversationMemoryService(graphClient, pack, { config: memoryConfig });
  const tracker = new EntityContextTracker(memoryConfig);
  const expansion = new QueryExpansionMemory(memoryConfig);

  const summarizer = new ConversationSummarizer(pack, llmClient, {
    timeoutMs: config.enrichment.summarizerTimeoutMs,
    ...(config.llm?.temperature !== undefined ? { temperature: config.llm.temperature } : {}),
    ...(config.llm?.maxTokens !== undefined ? { maxTokens: config.llm.maxTokens } : {})
  });
  const enricher = new ConversationEnricher(summarizer, memoryService, {
    workers: config.enrichment.workers,
    queueSize: config.enrichment.queueSize
  });
  const turns = new TurnProcessor(memoryService, tracker, expansion, enricher, memoryConfig);
  const tracer = new WorkflowTracer();

  const retrieval: RetrievalDependencies = {
    graphClient,
    embeddingClient,
    analyzer,
    scopeDetector,
    clusterManager,
    reranker,
    memoryService,
    tracker,
    turns,
    tracer,
    createDebugger: () => new SearchDebugger()
  };

  return {
    config,
    graphClient,
    embeddingClient,
    llmClient,
    pack,
    scopeDetector,
    clusterManager,
    memoryService,
    tracker,
    enricher,
    tracer,
    retrieval,
    retrievalConfig: createRetrievalConfig({ timeouts: config.retrieval.timeouts })
  };
}

/**
 * Connect to the store and make sure its schema exists.
 */
export async function startServices(services: Services): Promise<void> {
  await services.graphClient.connect();
  await services.graphClient.initializeSchema(services.config.embedding.dimensions);
}

/**
 * Let queued enrichment finish, then close the store connection.
 */
export async function stopServices(services: Services): Promise<void> {
  await services.enricher.drain();
  await services.graphClient.disconnect();
}

function resolveClients(config: Config, given: Partial<ServiceClients>): ServiceClients {
  if (given.graphClient && given.embeddingClient) {
    return {
      graphClient: given.graphClient,
      embeddingClient: given.embeddingClient,
      llmClient: given.llmClient ?? null
    };
  }

  const built = createClients(config);
  return {
    graphClient: given.graphClient ?? built.graphClient,
    embeddingClient: given.embeddingClient ?? built.embeddingClient,
    llmClient: given.llmClient !== undefined ? given.llmClient : built.llmClient
  };
}
