/**
 * Byte-budget truncation for tool output fed back to a model.
 *
 * Keeps the first and last halves of the payload and inserts a marker
 * `[···TRUNCATED N bytes···]` where content was removed.
 */

// Worst-case marker: [···TRUNCATED 9999999999 bytes···] ≈ 34 bytes
const MARKER_OVERHEAD = 50;

const MIDDLE_DOT = '·';

export function buildTruncationMarker(omittedBytes: number): string {
  return `[${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}TRUNCATED ${String(omittedBytes)} bytes${MIDDLE_DOT}${MIDDLE_DOT}${MIDDLE_DOT}]`;
}

/**
 * Find a safe UTF-8 byte boundary at or before the given byte offset.
 */
function findSafeUtf8Boundary(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  // UTF-8 continuation bytes start with 10xxxxxx (0x80-0xBF)
  // eslint-disable-next-line functional/no-loop-statements -- iterative byte scanning
  while (offset > 0 && (buffer[offset] & 0xc0) === 0x80) {
    offset--;
  }
  return offset;
}

function findSafeUtf8BoundaryAfter(buffer: Buffer, targetOffset: number): number {
  if (targetOffset >= buffer.length) return buffer.length;
  if (targetOffset <= 0) return 0;

  let offset = targetOffset;
  // eslint-disable-next-line functional/no-loop-statements -- iterative byte scanning
  while (offset < buffer.length && (buffer[offset] & 0xc0) === 0x80) {
    offset++;
  }
  return offset;
}

/**
 * Truncate a string to at most `maxBytes` UTF-8 bytes.
 * Returns the payload unchanged when it fits. When the budget cannot hold the
 * marker, the head of the payload is returned without one.
 */
export function truncateToBytes(payload: string, maxBytes: number): string {
  const buffer = Buffer.from(payload, 'utf8');
  const inputBytes = buffer.length;
  if (inputBytes <= maxBytes) {
    return payload;
  }

  const contentBudget = maxBytes - MARKER_OVERHEAD;
  if (contentBudget <= 0) {
    const end = findSafeUtf8Boundary(buffer, Math.max(0, maxBytes));
    return buffer.subarray(0, end).toString('utf8');
  }

  const firstHalfBudget = Math.floor(contentBudget / 2);
  const lastHalfBudget = contentBudget - firstHalfBudget;
  const firstEnd = findSafeUtf8Boundary(buffer, firstHalfBudget);
  const lastStart = findSafeUtf8BoundaryAfter(buffer, inputBytes - lastHalfBudget);

  const firstPart = buffer.subarray(0, firstEnd).toString('utf8');
  const lastPart = buffer.subarray(lastStart).toString('utf8');
  const omittedBytes = lastStart - firstEnd;
  return firstPart + buildTruncationMarker(omittedBytes) + lastPart;
}
