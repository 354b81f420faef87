import { describe, it, expect } from 'vitest';
import { chunkMarkdown, chunkPolicyDocument, estimateTokens } from '../chunking.js';

const POLICY = '# Travel Policy\nApplies to all staff.\n## Lodging\nHotel cap.\n## Meals\nMeal cap.';

describe('Chunking Service', () => {
  it('should estimate four characters per token', () => {
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('abcde')).toBe(2);
  });

  it('should start a new chunk at each heading', () => {
    const chunks = chunkMarkdown(POLICY);

    expect(chunks.map(c => [c.heading, c.text])).toEqual([
      ['Travel Policy', '# Travel Policy\nApplies to all staff.'],
      ['Lodging', '## Lodging\nHotel cap.'],
      ['Meals', '## Meals\nMeal cap.'],
    ]);
  });

  it('should split an oversized line at word boundaries', () => {
    const chunks = chunkMarkdown('alpha beta gamma delta epsilon zeta', 5);

    expect(chunks.map(c => c.text)).toEqual(['alpha beta gamma', 'delta epsilon zeta']);
    expect(chunks[0].heading).toBeUndefined();
  });

  it('should number policy chunks per document', () => {
    const chunks = chunkPolicyDocument('travel', POLICY);

    expect(chunks.map(c => c.id)).toEqual(['travel#1', 'travel#2', 'travel#3']);
    expect(chunks.every(c => c.docId === 'travel')).toBe(true);
  });

  it('should return nothing for blank content', () => {
    expect(chunkMarkdown('\n\n')).toEqual([]);
  });
});
