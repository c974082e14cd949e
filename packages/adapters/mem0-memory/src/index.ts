/**
 * Mem0 Memory Adapter
 *
 * Implements the MemoryPort interface over the Mem0 platform REST API.
 * Annotations from every session are filed under one user scope so they can
 * be searched together later.
 */

import { z } from 'zod';
import {
  MemoryPort,
  MemoryConfig,
  MemoryRecord,
  MemoryMetadataValue,
} from '@streamlens/domain';

export interface Mem0Config {
  /** API key; add() fails and search() returns nothing without it */
  apiKey?: string;

  /** API base URL */
  endpoint?: string;

  requestTimeoutMs?: number;
}

const memoryItemSchema = z.object({
  id: z.string(),
  memory: z.string().default(''),
  score: z.number().nullable().optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
  created_at: z.string().nullable().optional(),
});

const searchResponseSchema = z.union([
  z.array(memoryItemSchema),
  z.object({ results: z.array(memoryItemSchema) }),
]);

interface Mem0Client {
  baseUrl: string;
  headers: Record<string, string>;
}

export class MemoryNotConfiguredError extends Error {
  constructor() {
    super('MEM0_API_KEY not configured');
    this.name = 'MemoryNotConfiguredError';
  }
}

/**
 * Mem0 adapter for long-term memory
 */
export class Mem0MemoryAdapter implements MemoryPort {
  private readonly config: Mem0Config;
  private client: Mem0Client | null = null;
  private initAttempted = false;

  constructor(config: Mem0Config) {
    this.config = {
      endpoint: 'https://api.mem0.ai',
      requestTimeoutMs: 30000,
      ...config,
    };
  }

  /**
   * Build the client on first use; only one attempt is made
   */
  private getClient(): Mem0Client | null {
    if (this.client) {
      return this.client;
    }
    if (this.initAttempted) {
      return null;
    }
    this.initAttempted = true;

    if (!this.config.apiKey) {
      console.warn('[Mem0] MEM0_API_KEY not set; memory persistence disabled');
      return null;
    }

    this.client = {
      baseUrl: (this.config.endpoint ?? 'https://api.mem0.ai').replace(/\/+$/, ''),
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Token ${this.config.apiKey}`,
      },
    };
    console.log(`[Mem0] Client initialized for ${this.client.baseUrl}`);
    return this.client;
  }

  // ==================== Memory Operations ====================

  async add(
    content: string,
    userScope: string,
    metadata: Record<string, MemoryMetadataValue>
  ): Promise<void> {
    const client = this.getClient();
    if (!client) {
      throw new MemoryNotConfiguredError();
    }

    const response = await fetch(`${client.baseUrl}/v1/memories/`, {
      method: 'POST',
      headers: client.headers,
      body: JSON.stringify({
        messages: [{ role: 'user', content }],
        user_id: userScope,
        metadata,
      }),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? 30000),
    });

    if (!response.ok) {
      throw new Error(`Mem0 API error: ${response.status} ${response.statusText}`);
    }

    console.log(`[Mem0] Stored memory: ${content.slice(0, 50)}...`);
  }

  async search(query: string, userScope: string, limit: number): Promise<MemoryRecord[]> {
    const client = this.getClient();
    if (!client) {
      console.warn('[Mem0] Client not available; returning no memories');
      return [];
    }

    const response = await fetch(`${client.baseUrl}/v2/memories/search/`, {
      method: 'POST',
      headers: client.headers,
      body: JSON.stringify({
        query,
        filters: { AND: [{ user_id: userScope }] },
        top_k: limit,
      }),
      signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? 30000),
    });

    if (!response.ok) {
      throw new Error(`Mem0 API error: ${response.status} ${response.statusText}`);
    }

    const parsed = searchResponseSchema.parse(await response.json());
    const items = Array.isArray(parsed) ? parsed : parsed.results;
    console.log(`[Mem0] Search returned ${items.length} results`);

    return items.slice(0, limit).map((item) => ({
      id: item.id,
      content: item.memory,
      score: item.score ?? null,
      metadata: item.metadata ?? {},
      created_at: item.created_at ?? null,
    }));
  }

  // ==================== Health & Cleanup ====================

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async healthCheck(): Promise<boolean> {
    return this.isConfigured();
  }

  async close(): Promise<void> {
    this.client = null;
  }
}

/**
 * Create Mem0 adapter from the memory section of the configuration
 */
export function createMem0MemoryAdapter(config: MemoryConfig): Mem0MemoryAdapter {
  return new Mem0MemoryAdapter({
    apiKey: config.apiKey,
    endpoint: config.endpoint,
  });
}
