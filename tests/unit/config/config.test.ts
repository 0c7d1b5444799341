/**
 * Configuration System Tests
 *
 * Schema validation, section defaults and {env:VAR} resolution.
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import { ConfigurationError, loadConfig, parseConfig, resolveEnvVars } from '@/config/config';
import { configSchema } from '@/config/schema';
import { VALID_COMPATIBLE_CONFIG, VALID_MINIMAL_CONFIG } from '../../helpers/fixtures';

function issueMessages(data: unknown): string[] {
  const result = configSchema.safeParse(data);
  return result.success ? [] : result.error.issues.map((issue) => issue.message);
}

describe('configSchema', () => {
  describe('valid configurations', () => {
    test('accepts a minimal config and fills section defaults', () => {
      const config = configSchema.parse(VALID_MINIMAL_CONFIG);

      expect(config.server.port).toBe(6377);
      expect(config.graph.database).toBe('neo4j');
      expect(config.memory).toEqual({ ttlMinutes: 15, maxEntities: 20 });
      expect(config.retrieval.timeouts).toEqual({
        embeddingMs: 4000,
        clusterSearchMs: 2000,
        vectorSearchMs: 2000,
        memoryMs: 1500
      });
      expect(config.enrichment).toEqual({ workers: 2, queueSize: 32, summarizerTimeoutMs: 8000 });
      expect(config.llm).toBeUndefined();
    });

    test('accepts openai-compatible providers with a base URL', () => {
      const config = configSchema.parse(VALID_COMPATIBLE_CONFIG);
      expect(config.embedding.providerName).toBe('local');
      expect(config.llm?.model).toBe('custom-model');
    });

    test('merges partial stage timeouts with defaults', () => {
      const config = configSchema.parse({
        ...VALID_MINIMAL_CONFIG,
        retrieval: { timeouts: { embeddingMs: 900 } }
      });
      expect(config.retrieval.timeouts.embeddingMs).toBe(900);
      expect(config.retrieval.timeouts.memoryMs).toBe(1500);
    });

    test('treats an empty apiKey from an unset variable as absent', () => {
      const config = configSchema.parse({
        ...VALID_MINIMAL_CONFIG,
        embedding: { provider: 'ollama', model: 'nomic-embed-text', dimensions: 768, apiKey: '' }
      });
      expect(config.embedding.apiKey).toBeUndefined();
    });
  });

  describe('provider validation', () => {
    test('requires an apiKey for cloud providers', () => {
      const messages = issueMessages({
        ...VALID_MINIMAL_CONFIG,
        embedding: { provider: 'openai', model: 'text-embedding-3-small', dimensions: 1536 }
      });
      expect(messages).toContain("apiKey required for provider 'openai'");
    });

    test('rejects a baseUrl for cloud providers', () => {
      const messages = issueMessages({
        ...VALID_MINIMAL_CONFIG,
        llm: {
          provider: 'anthropic',
          model: 'claude-test',
          apiKey: 'test-key',
          baseUrl: 'https://example.com'
        }
      });
      expect(messages).toContain("baseUrl not allowed for provider 'anthropic'");
    });

    test('requires a baseUrl for openai-compatible', () => {
      const messages = issueMessages({
        ...VALID_MINIMAL_CONFIG,
        embedding: { provider: 'openai-compatible', model: 'm', dimensions: 8 }
      });
      expect(messages).toContain("baseUrl required for provider 'openai-compatible'");
    });

    test('only allows providerName for openai-compatible', () => {
      const messages = issueMessages({
        ...VALID_MINIMAL_CONFIG,
        embedding: { ...VALID_MINIMAL_CONFIG.embedding, providerName: 'x' }
      });
      expect(messages).toContain("providerName only allowed for provider 'openai-compatible'");
    });
  });

  describe('structural validation', () => {
    test('requires the graph connection', () => {
      const result = configSchema.safeParse({ embedding: VALID_MINIMAL_CONFIG.embedding });
      expect(result.success).toBe(false);
    });

    test('rejects an out-of-range port', () => {
      const result = configSchema.safeParse({ ...VALID_MINIMAL_CONFIG, server: { port: 70000 } });
      expect(result.success).toBe(false);
    });

    test('rejects more than 16 enrichment workers', () => {
      const result = configSchema.safeParse({ ...VALID_MINIMAL_CONFIG, enrichment: { workers: 17 } });
      expect(result.success).toBe(false);
    });
  });
});

describe('resolveEnvVars', () => {
  test('substitutes set variables', () => {
    expect(resolveEnvVars('{"password":"{env:N4J_PASSWORD}"}', { N4J_PASSWORD: 'test-password' })).toBe(
      '{"password":"test-password"}'
    );
  });

  test('substitutes unset variables with an empty string', () => {
    expect(resolveEnvVars('key={env:MISSING_KEY}', {})).toBe('key=');
  });

  test('ignores lowercase placeholders', () => {
    expect(resolveEnvVars('{env:lower}', { lower: 'x' })).toBe('{env:lower}');
  });
});

describe('parseConfig', () => {
  test('parses JSON after env resolution', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      graph: { ...VALID_MINIMAL_CONFIG.graph, password: '{env:GRAPH_PASSWORD}' }
    });
    const config = parseConfig(text, { GRAPH_PASSWORD: 'test-secret' });
    expect(config.graph.password).toBe('test-secret');
  });

  test('throws ConfigurationError listing the issues', () => {
    const text = JSON.stringify({
      ...VALID_MINIMAL_CONFIG,
      graph: { ...VALID_MINIMAL_CONFIG.graph, password: '{env:GRAPH_PASSWORD}' }
    });

    expect(() => parseConfig(text, {})).toThrow(ConfigurationError);
    try {
      parseConfig(text, {});
    } catch (error) {
      expect(error instanceof ConfigurationError && error.issues).toEqual([
        'graph.password: graph.password is required'
      ]);
    }
  });

  test('rejects invalid JSON', () => {
    expect(() => parseConfig('{ not json', {})).toThrow('Invalid JSON in config file');
  });
});

describe('loadConfig', () => {
  test('reads and validates a file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'home-rag-config-'));
    const path = join(dir, 'home-rag.json');
    writeFileSync(path, JSON.stringify(VALID_MINIMAL_CONFIG));

    expect(loadConfig(path).embedding.model).toBe('text-embedding-3-small');
  });

  test('reports a missing file', () => {
    expect(() => loadConfig('/nonexistent/home-rag.json')).toThrow(
      'Config file not found: /nonexistent/home-rag.json'
    );
  });
});
