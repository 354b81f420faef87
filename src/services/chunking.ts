/**
 * Chunking Service
 * Splits policy markdown into heading-scoped chunks for embedding
 */

export interface Chunk {
  text: string;
  heading?: string;
  tokens: number;
}

export interface PolicyChunk extends Chunk {
  id: string; // "<docId>#<n>"
  docId: string;
}

// Rough estimate: 1 token ≈ 4 characters
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function splitAtWordBoundary(text: string, maxTokens: number): string[] {
  const maxChars = Math.max(1, maxTokens * 4);
  const parts: string[] = [];
  let remaining = text.trim();

  while (remaining.length > maxChars) {
    let cut = remaining.lastIndexOf(' ', maxChars);
    if (cut <= 0) cut = maxChars;
    parts.push(remaining.slice(0, cut).trim());
    remaining = remaining.slice(cut).trim();
  }
  if (remaining.length > 0) parts.push(remaining);

  return parts;
}

/**
 * Groups lines under their nearest heading. A section is closed when the next
 * heading starts or when it would grow past maxTokens.
 */
export function chunkMarkdown(content: string, maxTokens = 300): Chunk[] {
  const chunks: Chunk[] = [];
  let lines: string[] = [];
  let heading: string | undefined;
  let tokens = 0;

  const flush = () => {
    const text = lines.join('\n').trim();
    if (text.length > 0) {
      chunks.push({ text, heading, tokens: estimateTokens(text) });
    }
    lines = [];
    tokens = 0;
  };

  for (const line of content.split('\n')) {
    const headingMatch = line.match(/^#{1,6}\s+(.+)$/);
    if (headingMatch) {
      flush();
      heading = headingMatch[1].trim();
      lines.push(line);
      tokens = estimateTokens(line);
      continue;
    }

    const lineTokens = estimateTokens(line);
    if (lineTokens > maxTokens) {
      flush();
      for (const part of splitAtWordBoundary(line, maxTokens)) {
        chunks.push({ text: part, heading, tokens: estimateTokens(part) });
      }
      continue;
    }

    if (tokens + lineTokens > maxTokens && lines.length > 0) {
      flush();
    }
    lines.push(line);
    tokens += lineTokens;
  }

  flush();
  return chunks;
}

export function chunkPolicyDocument(docId: string, content: string, maxTokens = 300): PolicyChunk[] {
  return chunkMarkdown(content, maxTokens).map((chunk, index) => ({
    ...chunk,
    id: `${docId}#${index + 1}`,
    docId,
  }));
}
