// Policy Search Tool
// Wraps the policy index as a retrieval tool

import type { RetrievalTool, ToolResult } from './types.js';
import type { PolicySearch, RetrievalResult } from '../retrieval.js';
import { entityNotFound, invalidParameter, readInteger, readString } from './failures.js';

export interface PolicySearchOptions {
  topK: number;
  minSimilarity: number;
}

function formatHit(hit: RetrievalResult): string {
  const label = hit.heading && hit.heading !== hit.title ? `${hit.title} › ${hit.heading}` : hit.title;
  const body = hit.text.replace(/^#{1,6}\s+.*$/gm, '').replace(/\s+/g, ' ').trim();
  return `[${label}] ${body}`;
}

export function createPolicySearchTool(index: PolicySearch, options: PolicySearchOptions): RetrievalTool {
  const defaultTopK = Math.max(1, Math.min(10, options.topK));

  return {
    name: 'policy_search',
    description: 'Search company finance policy documents (travel, meals, office supplies, approvals).',
    kind: 'retrieval',
    category: 'policy',
    effect: 'read',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'What to look up in the policies',
        required: true,
      },
      {
        name: 'top_k',
        type: 'number',
        description: 'Number of passages to return (1-10)',
        required: false,
        default: defaultTopK,
      },
    ],
    exports: ['policy_excerpt'],
    invoke: async (args): Promise<ToolResult> => {
      const query = readString(args, 'query');
      if (!query) {
        return invalidParameter('query', 'query is required');
      }
      const topK = readInteger(args, 'top_k', 1, 10);
      if (!topK.ok) return topK.failure;

      const hits = await index.search(query, topK.value ?? defaultTopK, options.minSimilarity);
      if (hits.length === 0) {
        return entityNotFound(`No policy passage matched "${query}"`, { query });
      }

      const passages = hits.map(formatHit);
      const best = hits[0];
      return {
        success: true,
        content: passages.join('\n'),
        data: hits,
        exports: { policy_excerpt: passages.join('\n') },
        source: { origin: best.origin, excerpt: passages[0], score: Math.round(best.score * 1000) / 1000 },
      };
    },
  };
}
