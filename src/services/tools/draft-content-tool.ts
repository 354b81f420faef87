// Draft Content Tool
// Asks the language-generation collaborator for a short business text

import type { GenerationTool, ToolResult } from './types.js';
import type { TextGenerator } from '../generation.js';
import { invalidParameter, readEnum, readString, transient } from './failures.js';

const TONES = ['formal', 'friendly', 'concise'] as const;

const SYSTEM_PROMPT =
  'You write short internal finance communications for employees. ' +
  'Use only the facts you are given. Do not invent amounts, dates or policy rules. ' +
  'Return the message body only, without a subject line.';

export function createDraftContentTool(generator: TextGenerator): GenerationTool {
  return {
    name: 'draft_content',
    description: 'Draft a message or notice about a topic, optionally grounded in policy excerpts.',
    kind: 'generation',
    category: 'generation',
    effect: 'read',
    parameters: [
      { name: 'topic', type: 'string', description: 'What the text is about', required: true },
      {
        name: 'context',
        type: 'string',
        description: 'Reference material, usually policy passages',
        required: false,
        imports: 'policy_excerpt',
      },
      { name: 'tone', type: 'string', description: 'Writing tone', required: false, enum: [...TONES], default: 'formal' },
    ],
    exports: ['draft_body'],
    invoke: async (args, { signal }): Promise<ToolResult> => {
      const topic = readString(args, 'topic');
      if (!topic) return invalidParameter('topic', 'topic is required');
      const tone = readEnum(args, 'tone', TONES);
      if (!tone.ok) return tone.failure;
      const context = readString(args, 'context');

      const prompt = [
        `Topic: ${topic}`,
        `Tone: ${tone.value ?? 'formal'}`,
        context ? `Reference material:\n${context}` : 'No reference material was provided.',
      ].join('\n\n');

      const draft = await generator.generate({ system: SYSTEM_PROMPT, prompt, maxTokens: 600, signal });
      if (!draft) {
        return transient('The generator returned an empty draft');
      }

      return {
        success: true,
        content: draft,
        data: { topic, tone: tone.value ?? 'formal', draft },
        exports: { draft_body: draft },
        source: { origin: 'generated:draft_content', excerpt: draft.slice(0, 200) },
      };
    },
  };
}
