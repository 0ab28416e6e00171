import type { Readable } from "stream";

export interface BoundedBody {
  buffer: Buffer;
  truncated: boolean;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk));
}

/**
 * Collect a stream into memory, stopping after `maxBytes`.
 * A truncated stream is destroyed so the underlying socket is released.
 */
export async function readBounded(stream: Readable, maxBytes: number): Promise<BoundedBody> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = toBuffer(chunk);
    if (size + buffer.length > maxBytes) {
      chunks.push(buffer.subarray(0, maxBytes - size));
      stream.destroy();
      return { buffer: Buffer.concat(chunks), truncated: true };
    }
    chunks.push(buffer);
    size += buffer.length;
  }

  return { buffer: Buffer.concat(chunks), truncated: false };
}
