/**
 * Memory Engine Types
 *
 * Request shapes use the snake_case field names of the REST API.
 */

export interface MemoryMessage {
  role: string;
  content: string;
}

/** At least one identifier must be present for scoped operations */
export interface MemoryScope {
  user_id?: string;
  agent_id?: string;
  run_id?: string;
}

export interface AddMemoryInput extends MemoryScope {
  messages: MemoryMessage[];
  metadata?: Record<string, unknown>;
  memory_type?: string;
  prompt?: string;
}

export interface SearchMemoryInput extends MemoryScope {
  query: string;
  filters?: Record<string, unknown>;
  threshold?: number;
  limit: number;
}

/**
 * The collaborator the HTTP routes forward to.
 * Results are JSON-shaped values produced by the underlying stores.
 */
export interface MemoryEngine {
  add(input: AddMemoryInput): Promise<unknown>;
  getAll(scope: MemoryScope): Promise<unknown>;
  /** Resolves to null when the memory does not exist */
  get(memoryId: string): Promise<unknown>;
  search(input: SearchMemoryInput): Promise<unknown>;
  update(memoryId: string, text: string): Promise<unknown>;
  history(memoryId: string): Promise<unknown>;
  delete(memoryId: string): Promise<void>;
  deleteAll(scope: MemoryScope): Promise<void>;
  reset(): Promise<void>;
  /** Whether a graph store is attached */
  readonly graphEnabled: boolean;
}
