import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

// HH:MM:SS SEV [turn.subturn] remote: message
export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const date = new Date(event.timestamp);
  const clock = `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())}`;
  const position = `[${String(event.turn)}.${String(event.subturn)}]`;
  let line = `${clock} ${event.severity} ${position} ${event.remoteIdentifier}: ${event.message}`;
  if (options.verbose === true) {
    const extras = Object.entries(event.labels).map(([key, value]) => `${key}=${value}`);
    if (event.callId !== undefined) extras.unshift(`call_id=${event.callId}`);
    if (extras.length > 0) line += ` (${extras.join(' ')})`;
  }
  if (options.color === true) {
    const ansi = COLOR_BY_SEVERITY[event.severity];
    if (ansi !== undefined) line = `${ansi}${line}${ANSI_RESET}`;
  }
  return line;
}
