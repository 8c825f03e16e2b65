import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import type { TranscriptRecord } from '../../transcript-store.js';

import { createTranscriptStore, JsonlTranscriptStore, MemoryTranscriptStore } from '../../transcript-store.js';

const record = (content: string): TranscriptRecord => ({
  sessionId: 's1',
  turnId: 't1',
  timestamp: 1,
  message: { role: 'user', content },
});

describe('transcript stores', () => {
  const dirs: string[] = [];

  afterEach(() => {
    dirs.splice(0).forEach((dir) => {
      fs.rmSync(dir, { recursive: true, force: true });
    });
  });

  it('selects the store from the configured file', () => {
    expect(createTranscriptStore()).toBeInstanceOf(MemoryTranscriptStore);
    expect(createTranscriptStore('  ')).toBeInstanceOf(MemoryTranscriptStore);
    expect(createTranscriptStore('/tmp/transcript.jsonl')).toBeInstanceOf(JsonlTranscriptStore);
  });

  it('writes one line per record in append order', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'transcript-'));
    dirs.push(dir);
    const file = path.join(dir, 'nested', 'session.jsonl');
    const store = new JsonlTranscriptStore(file);
    store.append(record('first'));
    store.append(record('second'));
    await store.flush();

    const lines = fs.readFileSync(file, 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(record('first'));
    expect(JSON.parse(lines[1])).toEqual(record('second'));
  });
});
