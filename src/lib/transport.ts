import type { ReadableStream } from 'stream/web';

export interface TransportRequest {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

export interface TransportResponse {
  status: number;
  text(): Promise<string>;
  /** Response body as raw chunks. Ending iteration early releases the connection. */
  body: AsyncIterable<Uint8Array>;
}

export type Transport = (url: string, request: TransportRequest) => Promise<TransportResponse>;

/** Chunks of a web stream; stopping early cancels it, and the lock is always released. */
export async function* readStream(stream: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let finished = false;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    try {
      if (!finished) await reader.cancel();
    } finally {
      reader.releaseLock();
    }
  }
}

async function* noChunks(): AsyncGenerator<Uint8Array> {}

/** Transport over Node's global fetch. */
export const fetchTransport: Transport = async (url, request) => {
  const response = await fetch(url, request);
  const stream: ReadableStream<Uint8Array> | null = response.body;
  return {
    status: response.status,
    text: () => response.text(),
    body: stream ? readStream(stream) : noChunks(),
  };
};
