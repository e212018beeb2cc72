/**
 * @fileoverview Conversions between the content shapes callers pass to storage
 * providers and the Node.js streams the backends consume and produce.
 * @module src/utils/internal/encoding
 */
import { Readable } from 'stream';

/**
 * Content accepted by `add`: a readable stream, raw bytes, or UTF-8 text.
 */
export type StorageContent = Readable | Uint8Array | string;

/**
 * Wraps bytes or text in a single-chunk stream. Streams pass through untouched.
 */
export function toReadable(content: StorageContent): Readable {
  if (content instanceof Readable) {
    return content;
  }
  const buffer =
    typeof content === 'string'
      ? Buffer.from(content, 'utf-8')
      : Buffer.from(content.buffer, content.byteOffset, content.byteLength);
  return Readable.from([buffer]);
}

/**
 * Collects a stream into a single Buffer.
 */
export async function streamToBuffer(
  stream: NodeJS.ReadableStream,
): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Reads any accepted content shape into a Buffer.
 */
export async function contentToBuffer(content: StorageContent): Promise<Buffer> {
  if (content instanceof Readable) {
    return streamToBuffer(content);
  }
  return typeof content === 'string'
    ? Buffer.from(content, 'utf-8')
    : Buffer.from(content);
}
