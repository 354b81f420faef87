/**
 * Embedding Service
 * OpenAI embeddings when a key is configured, a local hashing embedder otherwise
 */

import OpenAI from 'openai';
import { env } from '../env.js';
import { childLogger } from '../utils/logger.js';

const log = childLogger('embeddings');

export interface Embedder {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Uses text-embedding-3-small. Batches to stay under the per-request input cap.
 */
export class OpenAIEmbedder implements Embedder {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model = 'text-embedding-3-small',
    private batchSize = 100,
    baseURL?: string,
  ) {
    this.client = new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch,
        encoding_format: 'float',
      });
      vectors.push(...response.data.map(d => d.embedding));
    }

    return vectors;
  }
}

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'how', 'i', 'in', 'is', 'it',
  'me', 'my', 'of', 'on', 'or', 'our', 'the', 'to', 'what', 'when', 'which', 'who', 'with', 'you',
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 1 && !STOP_WORDS.has(token));
}

// FNV-1a, 32 bit
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words feature hashing with a crude plural fold. Deterministic and
 * offline; quality is lexical, not semantic.
 */
export class HashingEmbedder implements Embedder {
  readonly name = 'local';

  constructor(private dimensions = 512) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(text => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const raw of tokenize(text)) {
      const token = raw.length > 3 && raw.endsWith('s') ? raw.slice(0, -1) : raw;
      vector[hashToken(token) % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map(v => v / norm);
  }
}

export function createEmbedder(): Embedder {
  if (env.EMBEDDING_PROVIDER === 'openai') {
    if (env.OPENAI_API_KEY) {
      return new OpenAIEmbedder(env.OPENAI_API_KEY, undefined, undefined, env.OPENAI_BASE_URL || undefined);
    }
    log.warn('EMBEDDING_PROVIDER=openai but OPENAI_API_KEY is not set; using local hashing embedder');
  }
  return new HashingEmbedder();
}
