import { TextDecoder } from 'util';

export const DONE_SENTINEL = '[DONE]';

const DATA_PREFIX = 'data:';

function dataPayload(line: string): string | undefined {
  if (line.endsWith('\r')) line = line.slice(0, -1);
  if (!line.startsWith(DATA_PREFIX)) return undefined;
  const payload = line.slice(DATA_PREFIX.length);
  return payload.startsWith(' ') ? payload.slice(1) : payload;
}

/**
 * Turn raw SSE bytes into `data:` payloads.
 *
 * Partial lines are buffered across chunks. The sequence stops at the
 * `[DONE]` sentinel without pulling another chunk; returning early (by the
 * sentinel or by the consumer breaking out) closes `chunks`.
 */
export async function* readSseData(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });
    if (!buffer.includes('\n')) continue;

    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const payload = dataPayload(line);
      if (payload === undefined || !payload.trim()) continue;
      if (payload.trim() === DONE_SENTINEL) return;
      yield payload;
    }
  }

  // Trailing line without a newline
  buffer += decoder.decode();
  const payload = dataPayload(buffer);
  if (payload === undefined || !payload.trim() || payload.trim() === DONE_SENTINEL) return;
  yield payload;
}
