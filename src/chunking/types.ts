import type { Chunk } from "../types/translation";

export const DEFAULT_MAX_CHUNK_CHARS = 1000;

export interface ChunkingOptions {
  maxChunkChars?: number; // Maximum characters per chunk
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(content: string, options?: ChunkingOptions): Chunk[];
}
