import { MemoryRecord } from '../types/entities.js';

export type MemoryMetadataValue = string | number | boolean | null;

/**
 * Long-term memory port
 *
 * Production: Mem0 platform API
 */
export interface MemoryPort {
  /**
   * Store one memory
   * @param content Natural-language memory text
   * @param userScope Memory owner
   * @param metadata Flat key/value metadata stored with the memory
   */
  add(
    content: string,
    userScope: string,
    metadata: Record<string, MemoryMetadataValue>
  ): Promise<void>;

  /**
   * Semantic search within a scope
   */
  search(query: string, userScope: string, limit: number): Promise<MemoryRecord[]>;

  isConfigured(): boolean;

  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}

export const DEFAULT_MEMORY_SEARCH_LIMIT = 10;
