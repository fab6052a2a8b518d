/** Bytes returned for an open-ended `bytes=N-` request. */
export const RANGE_CHUNK_BYTES = 16 * 1024;

export type ByteRange = {
  start: number;
  /** Inclusive. */
  end: number;
};

/**
 * Parses a single `bytes=start-end` range against a file of `size` bytes.
 *
 * A missing start means 0; a missing end means one chunk past start. The end is
 * clamped to the last byte. Returns null for malformed or unsatisfiable ranges.
 */
export function parseByteRange(
  header: string,
  size: number,
  chunkBytes: number = RANGE_CHUNK_BYTES,
): ByteRange | null {
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match) {
    return null;
  }
  const start = match[1] ? Number(match[1]) : 0;
  const requestedEnd = match[2] ? Number(match[2]) : start + chunkBytes - 1;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(requestedEnd)) {
    return null;
  }
  if (size <= 0 || start >= size) {
    return null;
  }
  const end = Math.min(requestedEnd, size - 1);
  if (end < start) {
    return null;
  }
  return { start, end };
}
