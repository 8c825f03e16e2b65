import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  turn: number;
  subturn: number;
  turnId?: string;
  callId?: string;
  remoteIdentifier: string;
  fatal: boolean;
  labels: Record<string, string>;
}

const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  FIN: 5,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'type',
  'direction',
  'turn',
  'subturn',
  'turn_id',
  'call_id',
  'remote',
  'fatal',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

const labelValue = (value: string | number | boolean): string | undefined => {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return value ? 'true' : 'false';
};

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0 && !RESERVED_LABEL_KEYS.has(key)) labels[key] = value;
  });
  // details never override static labels
  Object.entries(entry.details ?? {}).forEach(([key, value]) => {
    if (RESERVED_LABEL_KEYS.has(key) || Object.prototype.hasOwnProperty.call(labels, key)) return;
    const rendered = labelValue(value);
    if (rendered !== undefined) labels[key] = rendered;
  });

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    turn: entry.turn,
    subturn: entry.subturn,
    turnId: entry.turnId,
    callId: entry.callId,
    remoteIdentifier: entry.remoteIdentifier,
    fatal: entry.fatal,
    labels,
  };
}
