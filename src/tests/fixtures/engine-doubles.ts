import type { EngineConfigInput } from '../../config.js';
import type { RiskLevel, SafetyAssessment, SafetyClassifier } from '../../safety-classifier.js';
import type { ToolExecutionContext, ToolExecutor, ToolOutcome } from '../../tools/types.js';
import type {
  CompletionRequest,
  ModelClient,
  ModelEvent,
  SessionEvent,
  ToolCall,
  ToolDefinition,
  ToolEvent,
} from '../../types.js';

import { AgentSession } from '../../agent-session.js';
import { EventChannel } from '../../event-channel.js';
import { ToolExecutionError } from '../../tools/tool-errors.js';
import { MemoryTranscriptStore } from '../../transcript-store.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const callEvent = (id: string, name: string, parameters: Record<string, unknown> = {}): ModelEvent => (
  { type: 'tool_call', call: { id, name, parameters } }
);

export const textResponse = (text: string): ModelEvent[] => [{ type: 'delta', text }, { type: 'done' }];

export type ScriptedResponse = ModelEvent[] | ((request: CompletionRequest, index: number) => ModelEvent[]);

/**
 * Replays one scripted response per request, in order. Requests beyond the
 * script get an empty completed response. Every request is recorded.
 */
export class ScriptedModelClient implements ModelClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly script: ScriptedResponse[]) {}

  async *stream(request: CompletionRequest, _signal: AbortSignal): AsyncIterable<ModelEvent> {
    const index = this.requests.length;
    this.requests.push(request);
    const entry: ScriptedResponse | undefined = index < this.script.length ? this.script[index] : undefined;
    let events: ModelEvent[] = [{ type: 'done' }];
    if (typeof entry === 'function') events = entry(request, index);
    else if (entry !== undefined) events = entry;
    // eslint-disable-next-line functional/no-loop-statements
    for (const event of events) {
      await Promise.resolve();
      yield event;
    }
  }
}

export interface ExecutorCall {
  name: string;
  parameters: Record<string, unknown>;
  callId: string;
}

export type ToolHandler = (parameters: Record<string, unknown>, ctx: ToolExecutionContext) => Promise<ToolOutcome>;

/** Executor whose tools are plain async handlers; unknown names reject. */
export class ProgrammableExecutor implements ToolExecutor {
  readonly calls: ExecutorCall[] = [];
  private readonly handlers = new Map<string, ToolHandler>();

  on(name: string, handler: ToolHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  async execute(name: string, parameters: Record<string, unknown>, ctx: ToolExecutionContext): Promise<ToolOutcome> {
    this.calls.push({ name, parameters, callId: ctx.callId });
    const handler = this.handlers.get(name);
    if (handler === undefined) throw new ToolExecutionError('unknown_tool', `unknown tool: ${name}`);
    return await handler(parameters, ctx);
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.handlers.keys()).map((name) => ({
      name,
      description: `${name} test tool`,
      inputSchema: { type: 'object', properties: {} },
    }));
  }
}

export class FixedClassifier implements SafetyClassifier {
  readonly analyzed: string[][] = [];

  constructor(private readonly risk: RiskLevel) {}

  analyze(command: readonly string[], _cwd: string): SafetyAssessment {
    this.analyzed.push([...command]);
    return { risk: this.risk, reasons: ['fixed'] };
  }
}

/** Throws from `send` for the listed terminal events, once each. */
export class FailingChannel extends EventChannel<ToolEvent> {
  private readonly trips: Set<string>;

  constructor(failCompletedFor: readonly string[]) {
    super();
    this.trips = new Set(failCompletedFor);
  }

  override send(item: ToolEvent): boolean {
    if (item.type === 'completed' && this.trips.delete(item.id)) {
      throw new Error('channel write failed');
    }
    return super.send(item);
  }
}

export interface TestSessionOptions {
  model: ModelClient;
  executor: ToolExecutor;
  classifier?: SafetyClassifier;
  config?: EngineConfigInput;
  channel?: EventChannel<ToolEvent>;
  onEvent?: (event: SessionEvent) => void;
}

export interface TestSession {
  session: AgentSession;
  events: SessionEvent[];
  transcript: MemoryTranscriptStore;
}

export function createTestSession(options: TestSessionOptions): TestSession {
  const events: SessionEvent[] = [];
  const transcript = new MemoryTranscriptStore();
  const session = new AgentSession({
    config: {
      cwd: '/work',
      tokenizer: 'approximate',
      sentinel: { tickMs: 10 },
      logging: { format: 'none' },
      ...options.config,
    },
    model: options.model,
    executor: options.executor,
    classifier: options.classifier ?? new FixedClassifier('low'),
    transcript,
    observer: {
      onEvent: (event) => {
        events.push(event);
        options.onEvent?.(event);
      },
    },
    sessionId: 'test-session',
    channel: options.channel,
  });
  return { session, events, transcript };
}

export const toolEvents = (events: readonly SessionEvent[]): ToolEvent[] => events.flatMap((event) => (
  event.type === 'tool_event' ? [event.event] : []
));

export const ok = (output: string): ToolOutcome => ({ success: true, output });

export const call = (id: string, name: string, parameters: Record<string, unknown> = {}): ToolCall => ({ id, name, parameters });
