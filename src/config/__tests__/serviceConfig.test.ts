// src/config/__tests__/serviceConfig.test.ts

import { describe, it, expect } from 'vitest';
import { ConfigError, buildMem0Config, loadServiceConfig } from '../serviceConfig.js';

describe('loadServiceConfig', () => {
  it('should apply deployment defaults to an empty environment', () => {
    const config = loadServiceConfig({});

    expect(config.port).toBe(8000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.apiKey).toBeUndefined();
    expect(config.postgres).toEqual({
      host: 'postgres',
      port: 5432,
      database: 'postgres',
      user: 'postgres',
      password: 'postgres',
      collectionName: 'memories',
    });
    expect(config.graph).toEqual({
      enabled: true,
      url: 'bolt://neo4j:7687',
      username: 'neo4j',
      password: 'mem0graph',
      labelHeuristic: 'multi-colon',
    });
    expect(config.llm.model).toBe('gpt-4o');
    expect(config.embedder).toEqual({
      apiKey: undefined,
      baseURL: undefined,
      model: 'nvidia_embed',
      dimensions: 4096,
    });
    expect(config.historyDbPath).toBe('/app/history/history.db');
  });

  it('should read overrides and treat empty strings as unset', () => {
    const config = loadServiceConfig({
      PORT: '9100',
      API_KEY: '',
      GRAPH_STORE_ENABLED: 'False',
      GRAPH_LABEL_HEURISTIC: 'Any-Colon',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://llm.local/v1',
      EMBEDDING_MODEL_DIMS: '1536',
    });

    expect(config.port).toBe(9100);
    expect(config.apiKey).toBeUndefined();
    expect(config.graph.enabled).toBe(false);
    expect(config.graph.labelHeuristic).toBe('any-colon');
    expect(config.embedder.dimensions).toBe(1536);
  });

  it('should fall back to the LLM endpoint for the embedder', () => {
    const shared = loadServiceConfig({ OPENAI_API_KEY: 'test-secret', OPENAI_BASE_URL: 'http://llm.local/v1' });
    const separate = loadServiceConfig({
      OPENAI_API_KEY: 'test-secret',
      EMBEDDER_API_KEY: 'embed-secret',
      EMBEDDER_BASE_URL: 'http://embed.local/v1',
    });

    expect(shared.embedder.apiKey).toBe('test-secret');
    expect(shared.embedder.baseURL).toBe('http://llm.local/v1');
    expect(separate.embedder.apiKey).toBe('embed-secret');
    expect(separate.embedder.baseURL).toBe('http://embed.local/v1');
  });

  it('should reject invalid values with a ConfigError', () => {
    expect(() => loadServiceConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadServiceConfig({ GRAPH_LABEL_HEURISTIC: 'sometimes' })).toThrow(/GRAPH_LABEL_HEURISTIC/);
  });
});

describe('buildMem0Config', () => {
  it('should configure pgvector without ANN indexes and keep the graph out of mem0', () => {
    const mem0Config = buildMem0Config(
      loadServiceConfig({ OPENAI_API_KEY: 'test-secret', POSTGRES_HOST: 'db.local' })
    );

    expect(mem0Config.vectorStore).toEqual({
      provider: 'pgvector',
      config: {
        host: 'db.local',
        port: 5432,
        dbname: 'postgres',
        user: 'postgres',
        password: 'postgres',
        collectionName: 'memories',
        embeddingModelDims: 4096,
        hnsw: false,
        diskann: false,
      },
    });
    expect(mem0Config.llm).toEqual({
      provider: 'openai',
      config: { apiKey: 'test-secret', model: 'gpt-4o', temperature: 0.2 },
    });
    expect(mem0Config.embedder).toEqual({
      provider: 'openai',
      config: { apiKey: 'test-secret', model: 'nvidia_embed' },
    });
    expect(mem0Config.enableGraph).toBe(false);
    expect(mem0Config).not.toHaveProperty('graphStore');
  });
});
