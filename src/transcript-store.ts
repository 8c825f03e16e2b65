import fs from 'node:fs';
import path from 'node:path';

import type { ConversationMessage } from './types.js';

import { errorMessage, warn } from './utils.js';

export interface TranscriptRecord {
  sessionId: string;
  turnId: string;
  timestamp: number;
  message: ConversationMessage;
}

/** Append-only; the session is the single writer. */
export interface TranscriptStore {
  append: (record: TranscriptRecord) => void;
  flush: () => Promise<void>;
}

export class MemoryTranscriptStore implements TranscriptStore {
  readonly records: TranscriptRecord[] = [];

  append(record: TranscriptRecord): void {
    this.records.push(record);
  }

  async flush(): Promise<void> {
    // nothing buffered
  }
}

/**
 * One JSON line per message. Writes are chained so lines land in append
 * order; failures are reported through `warn` and never reach the caller.
 */
export class JsonlTranscriptStore implements TranscriptStore {
  private readonly file: string;
  private chain: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(file: string) {
    this.file = path.resolve(file);
  }

  append(record: TranscriptRecord): void {
    const line = `${JSON.stringify(record)}\n`;
    this.chain = this.chain.then(async () => {
      try {
        if (!this.dirReady) {
          await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
          this.dirReady = true;
        }
        await fs.promises.appendFile(this.file, line, 'utf8');
      } catch (error: unknown) {
        warn(`transcript persistence failed: ${errorMessage(error)}`);
      }
    });
  }

  async flush(): Promise<void> {
    await this.chain;
  }
}

export function createTranscriptStore(file?: string): TranscriptStore {
  if (typeof file === 'string' && file.trim().length > 0) return new JsonlTranscriptStore(file);
  return new MemoryTranscriptStore();
}
