/**
 * Response Body Reader
 * Reads a response body up to a byte limit and decodes textual content
 */

import { TextDecoder } from 'util';
import type { HttpResponse } from './crawling.types';

export interface ResponseBody {
  /**
   * Bytes received (cut at the limit)
   */
  bytes: Uint8Array;

  /**
   * Full body size: the declared content-length when the read stopped early, otherwise the bytes received
   */
  byteSize: number;
  truncated: boolean;

  /**
   * Decoded text, null for binary content types
   */
  text: string | null;
}

const TEXTUAL_TYPE = /^(text\/|application\/(xhtml\+xml|xml|json|ld\+json|javascript|ecmascript|manifest\+json))|\+xml$|\+json$/;

/**
 * Whether a body of this content type is decoded to text. A missing type is decoded so it can be sniffed.
 */
export function isTextualContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  const mediaType = contentType.split(';')[0].trim().toLowerCase();
  return mediaType.length === 0 || TEXTUAL_TYPE.test(mediaType);
}

/**
 * Charset label from a content-type header, utf-8 when absent
 */
export function charsetOf(contentType: string | null): string {
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? '');
  return match ? match[1].toLowerCase() : 'utf-8';
}

function decoderFor(contentType: string | null): TextDecoder {
  try {
    return new TextDecoder(charsetOf(contentType));
  } catch (error) {
    if (error instanceof RangeError) {
      // Unknown charset label
      return new TextDecoder('utf-8');
    }
    throw error;
  }
}

function declaredLength(response: HttpResponse): number | null {
  const header = response.headers.get('content-length');
  if (header === null || !/^\d+$/.test(header.trim())) return null;
  return parseInt(header, 10);
}

/**
 * Read at most `maxBytes` of the body. Reading stops (and the stream is released) once the limit is hit.
 */
export async function readResponseBody(response: HttpResponse, maxBytes: number): Promise<ResponseBody> {
  const chunks: Uint8Array[] = [];
  let received = 0;
  let truncated = false;

  if (response.body) {
    for await (const chunk of response.body) {
      const remaining = maxBytes - received;
      if (chunk.byteLength > remaining) {
        if (remaining > 0) chunks.push(chunk.subarray(0, remaining));
        received += remaining;
        truncated = true;
        break;
      }
      chunks.push(chunk);
      received += chunk.byteLength;
    }
  }

  const bytes = Buffer.concat(chunks, received);
  const declared = declaredLength(response);
  const byteSize = truncated && declared !== null && declared > received ? declared : received;

  const contentType = response.headers.get('content-type');
  let text: string | null = null;
  if (isTextualContentType(contentType)) {
    // Streaming decode drops a multi-byte sequence cut by truncation
    text = decoderFor(contentType).decode(bytes, { stream: truncated });
  }

  return { bytes, byteSize, truncated, text };
}
