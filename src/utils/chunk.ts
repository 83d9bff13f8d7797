import { MAX_MESSAGE_LENGTH, MESSAGE_CHUNK_SIZE } from "../constants/limits.js";

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Split an outbound reply for the platform message limit.
 * Text within `maxLength` is returned whole; longer text is cut into
 * consecutive slices of at most `chunkSize` UTF-16 units. A cut never
 * separates the two halves of a surrogate pair.
 */
export function splitMessage(
  text: string,
  chunkSize: number = MESSAGE_CHUNK_SIZE,
  maxLength: number = MAX_MESSAGE_LENGTH
): string[] {
  if (chunkSize <= 0) {
    throw new RangeError(`chunkSize must be positive, got ${chunkSize}`);
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);
    if (
      end < text.length &&
      isHighSurrogate(text.charCodeAt(end - 1)) &&
      isLowSurrogate(text.charCodeAt(end))
    ) {
      // chunkSize 1 cannot hold a pair; give it the whole pair instead
      end = end - 1 > start ? end - 1 : end + 1;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

/** Send chunks one after another, in order */
export async function sendChunked(
  send: (chunk: string) => Promise<void>,
  text: string,
  chunkSize?: number,
  maxLength?: number
): Promise<number> {
  const chunks = splitMessage(text, chunkSize, maxLength);
  for (const chunk of chunks) {
    await send(chunk);
  }
  return chunks.length;
}
