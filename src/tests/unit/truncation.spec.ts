import { describe, expect, it } from 'vitest';

import { buildTruncationMarker, truncateToBytes } from '../../truncation.js';

describe('truncateToBytes', () => {
  it('returns payloads within budget unchanged', () => {
    expect(truncateToBytes('short', 10)).toBe('short');
  });

  it('keeps head and tail around a marker', () => {
    const result = truncateToBytes('x'.repeat(200), 120);
    expect(result).toBe(`${'x'.repeat(35)}${buildTruncationMarker(130)}${'x'.repeat(35)}`);
    expect(buildTruncationMarker(130)).toBe('[···TRUNCATED 130 bytes···]');
  });

  it('drops the marker when the budget cannot hold it', () => {
    expect(truncateToBytes('abcdefghij'.repeat(10), 20)).toBe('abcdefghijabcdefghij');
  });

  it('never splits a multi-byte character', () => {
    // each "é" is two bytes; a cut at byte 3 backs off to byte 2
    expect(truncateToBytes('éééééé', 3)).toBe('é');
  });
});
