/**
 * Retrieval Service
 * In-memory policy index searched by cosine similarity
 */

import { readdir, readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { fileURLToPath } from 'url';
import { chunkPolicyDocument } from './chunking.js';
import type { PolicyChunk } from './chunking.js';
import type { Embedder } from './embeddings.js';
import { childLogger } from '../utils/logger.js';

const log = childLogger('retrieval');

export const DEFAULT_POLICY_DIR = fileURLToPath(new URL('../../data/policies', import.meta.url));

export interface PolicyDocument {
  id: string;
  title: string;
  content: string;
}

export interface RetrievalResult {
  text: string;
  origin: string; // chunk id, "<docId>#<n>"
  score: number;
  title: string;
  heading?: string;
}

export interface PolicySearch {
  search(query: string, topK: number, minSimilarity: number): Promise<RetrievalResult[]>;
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

function titleOf(id: string, content: string): string {
  const heading = content.match(/^#\s+(.+)$/m);
  return heading ? heading[1].trim() : id;
}

export async function loadPolicyDocuments(dir: string = DEFAULT_POLICY_DIR): Promise<PolicyDocument[]> {
  const files = (await readdir(dir)).filter(file => extname(file) === '.md').sort();

  const docs: PolicyDocument[] = [];
  for (const file of files) {
    const content = await readFile(join(dir, file), 'utf8');
    const id = basename(file, '.md');
    docs.push({ id, title: titleOf(id, content), content });
  }
  return docs;
}

interface IndexedChunk {
  chunk: PolicyChunk;
  title: string;
  vector: number[];
}

export class PolicyIndex implements PolicySearch {
  private constructor(
    private entries: IndexedChunk[],
    private embedder: Embedder,
  ) {}

  static async build(docs: PolicyDocument[], embedder: Embedder): Promise<PolicyIndex> {
    const pending = docs.flatMap(doc =>
      chunkPolicyDocument(doc.id, doc.content).map(chunk => ({ chunk, title: doc.title })),
    );
    const vectors = await embedder.embed(pending.map(p => p.chunk.text));

    const entries = pending.map((p, i) => ({ ...p, vector: vectors[i] }));
    log.info({ documents: docs.length, chunks: entries.length, embedder: embedder.name }, 'Policy index built');
    return new PolicyIndex(entries, embedder);
  }

  static async fromDirectory(dir: string, embedder: Embedder): Promise<PolicyIndex> {
    return PolicyIndex.build(await loadPolicyDocuments(dir), embedder);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Ranked by score, ties keep index order. */
  async search(query: string, topK: number, minSimilarity: number): Promise<RetrievalResult[]> {
    if (this.entries.length === 0 || query.trim().length === 0) {
      return [];
    }

    const [queryVector] = await this.embedder.embed([query]);
    const results: RetrievalResult[] = [];

    for (const entry of this.entries) {
      const score = cosineSimilarity(queryVector, entry.vector);
      if (score >= minSimilarity) {
        results.push({
          text: entry.chunk.text,
          origin: entry.chunk.id,
          score,
          title: entry.title,
          heading: entry.chunk.heading,
        });
      }
    }

    results.sort((a, b) => b.score - a.score);
    return results.slice(0, Math.max(0, topK));
  }
}
