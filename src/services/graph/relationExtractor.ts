// src/services/graph/relationExtractor.ts
import OpenAI from 'openai';
import type { GraphFilters, GraphPayload } from '../../types/graph.js';
import type { MemoryMessage } from '../../types/memory.js';

export interface RelationExtractor {
  extract(messages: MemoryMessage[], filters: GraphFilters): Promise<GraphPayload>;
}

export interface OpenAIRelationExtractorOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature?: number;
}

const EXTRACTION_PROMPT = `You build a knowledge graph from a conversation.
Extract the entities and the relationships between them.

Rules:
- Refer to the speaker as "USER_ID" when they talk about themselves.
- Use lowercase snake_case for relationship types, e.g. "works_at", "lives_in".
- Only extract facts that are explicitly stated.

Answer with JSON only:
{"entities": [{"name": "...", "type": "..."}],
 "relations": [{"source": "...", "relationship": "...", "destination": "..."}]}`;

/**
 * Asks an OpenAI-compatible chat model for entities and relations.
 * The returned payload is not validated here; it goes through the graph
 * sanitizer and GraphMemory's schema first.
 */
export class OpenAIRelationExtractor implements RelationExtractor {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIRelationExtractorOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async extract(messages: MemoryMessage[], filters: GraphFilters): Promise<GraphPayload> {
    const conversation = messages.map((m) => `${m.role}: ${m.content}`).join('\n');

    const resp = await this.client.chat.completions.create({
      model: this.options.model,
      temperature: this.options.temperature ?? 0,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: EXTRACTION_PROMPT.replace('USER_ID', () => filters.user_id) },
        { role: 'user', content: conversation },
      ],
    });

    const content = (resp.choices[0]?.message?.content ?? '').trim();
    if (!content) {
      return { entities: [], relations: [] };
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      console.warn('[RelationExtractor] Model returned invalid JSON:', content.slice(0, 200), error);
      return { entities: [], relations: [] };
    }
  }
}
