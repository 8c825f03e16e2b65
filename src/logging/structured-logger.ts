import type { LoggingConfig } from '../config.js';
import type { LogEntry } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = 'logfmt' | 'json' | 'console' | 'none';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly verbose: boolean;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.verbose = options.verbose ?? false;
    const color = options.color ?? false;
    const writer = options.writer ?? defaultWriter;
    const format = options.format ?? 'logfmt';

    if (format === 'logfmt') {
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color })}\n`);
      });
    }
    if (format === 'json') {
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (format === 'console') {
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (!this.verbose && (entry.severity === 'VRB' || entry.severity === 'TRC')) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

/** `onLog` callback for a session, configured from the logging section. */
export function createLogCallbacks(config: LoggingConfig, writer?: (line: string) => void): { onLog: (entry: LogEntry) => void } {
  const logger = new StructuredLogger({
    format: config.format,
    color: config.color,
    verbose: config.verbose,
    writer,
  });
  return {
    onLog: (entry: LogEntry) => {
      logger.emit(entry);
    },
  };
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr gone; nothing left to report to
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('turn', event.turn);
  push('subturn', event.subturn);
  push('turn_id', event.turnId);
  push('call_id', event.callId);
  push('remote', event.remoteIdentifier);
  push('fatal', event.fatal);
  push('labels', Object.keys(event.labels).length > 0 ? event.labels : undefined);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
