import { metrics as otelMetrics, trace as otelTrace, SpanStatusCode } from '@opentelemetry/api';

import type { Attributes, Counter, Histogram, Span, SpanKind } from '@opentelemetry/api';

const INSTRUMENTATION_NAME = 'agent-turn-engine';

export interface ToolMetricsRecord {
  toolName: string;
  route: 'standard' | 'batch' | 'delegation';
  status: 'success' | 'error';
  latencyMs: number;
  outputBytes?: number;
}

export interface TurnMetricsRecord {
  model: string;
  status: 'complete' | 'failed' | 'cancelled';
  iterations: number;
}

interface Instruments {
  toolLatency: Histogram;
  toolInvocations: Counter;
  toolErrors: Counter;
  toolBytesOut: Counter;
  turns: Counter;
  turnIterations: Histogram;
}

// Created lazily so a meter provider registered after import is picked up
let instruments: Instruments | undefined;

function getInstruments(): Instruments {
  if (instruments !== undefined) return instruments;
  const meter = otelMetrics.getMeter(INSTRUMENTATION_NAME);
  instruments = {
    toolLatency: meter.createHistogram('turn_engine_tool_latency_ms', { description: 'Latency of tool tasks (milliseconds)' }),
    toolInvocations: meter.createCounter('turn_engine_tool_invocations_total', { description: 'Total number of tool tasks' }),
    toolErrors: meter.createCounter('turn_engine_tool_errors_total', { description: 'Total number of failed tool tasks' }),
    toolBytesOut: meter.createCounter('turn_engine_tool_bytes_out_total', { description: 'Output bytes produced by tools' }),
    turns: meter.createCounter('turn_engine_turns_total', { description: 'Total number of finished turns' }),
    turnIterations: meter.createHistogram('turn_engine_turn_iterations', { description: 'Model requests per turn' }),
  };
  return instruments;
}

export function recordToolMetrics(record: ToolMetricsRecord): void {
  const inst = getInstruments();
  const labels = { tool: record.toolName, route: record.route, status: record.status };
  const latency = Number.isFinite(record.latencyMs) ? Math.max(0, record.latencyMs) : 0;
  inst.toolLatency.record(latency, labels);
  inst.toolInvocations.add(1, labels);
  if (record.outputBytes !== undefined && record.outputBytes > 0) inst.toolBytesOut.add(record.outputBytes, labels);
  if (record.status === 'error') inst.toolErrors.add(1, labels);
}

export function recordTurnMetrics(record: TurnMetricsRecord): void {
  const inst = getInstruments();
  const labels = { model: record.model, status: record.status };
  inst.turns.add(1, labels);
  inst.turnIterations.record(record.iterations, labels);
}

export interface RunWithSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

export function runWithSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(name: string, options: RunWithSpanOptions, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(
  name: string,
  optionsOrFn: RunWithSpanOptions | ((span: Span) => Promise<T> | T),
  maybeFn?: (span: Span) => Promise<T> | T,
): Promise<T> {
  const options: RunWithSpanOptions = typeof optionsOrFn === 'function' ? {} : optionsOrFn;
  const handler: (span: Span) => Promise<T> | T = typeof optionsOrFn === 'function'
    ? optionsOrFn
    : (() => {
        if (maybeFn === undefined) {
          throw new Error('runWithSpan requires a callback');
        }
        return maybeFn;
      })();
  const tracer = otelTrace.getTracer(INSTRUMENTATION_NAME);
  return tracer.startActiveSpan(name, {
    kind: options.kind,
    attributes: options.attributes,
  }, async (span) => {
    try {
      return await handler(span);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function addSpanAttributes(attributes: Attributes): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.setAttributes(attributes);
}

export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = otelTrace.getActiveSpan();
  if (span === undefined) return;
  span.addEvent(name, attributes);
}
