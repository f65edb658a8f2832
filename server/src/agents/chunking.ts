/**
 * Splits text into word-aligned chunks whose concatenation is exactly the
 * input.
 */
export function chunkText(text: string, minChunk = 30, maxChunk = 80): string[] {
  if (!text) {
    return [];
  }

  const chunks: string[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    const remaining = text.length - cursor;
    const target = Math.max(1, Math.min(remaining, randomBetween(minChunk, maxChunk)));

    let end = cursor + target;
    if (end < text.length) {
      const breakpoint = text.lastIndexOf(" ", end);
      if (breakpoint > cursor + Math.floor(minChunk / 2)) {
        end = breakpoint + 1;
      }
    }

    chunks.push(text.slice(cursor, end));
    cursor = end;
  }

  return chunks;
}

export async function* streamFromChunks(
  chunks: string[],
  delayMs: number,
  signal?: AbortSignal,
): AsyncIterable<string> {
  for (const chunk of chunks) {
    if (signal?.aborted) {
      return;
    }
    yield chunk;
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}

function randomBetween(min: number, max: number): number {
  const lower = Math.min(min, max);
  const upper = Math.max(min, max);
  return Math.floor(Math.random() * (upper - lower + 1)) + lower;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
