import type { CancellationFlag } from './cancellation.js';
import type { EngineConfig } from './config.js';
import type { TranscriptStore } from './transcript-store.js';
import type { ConversationMessage, LogEntry, PendingToolResult, SessionEvent, ToolCall, TurnPhase } from './types.js';

/** Assistant message of the response whose tool calls are in flight. */
export interface AssistantAnchor {
  content: string;
  toolCalls: ToolCall[];
  persisted: boolean;
}

/**
 * Conversation history and per-turn bookkeeping. Mutated only by the turn
 * runner and the continuation controller, both under the session mutex.
 */
export class TurnState {
  readonly history: ConversationMessage[] = [];
  readonly messageQueue: string[] = [];
  readonly pendingResults = new Map<string, PendingToolResult>();
  turnId = '';
  active = false;
  phase: TurnPhase = 'idle';
  iteration = 0;
  subturn = 0;
  // Call ids of the current response in the order the model issued them
  issuedOrder: string[] = [];
  // Calls of the current response parked behind a deferred approval
  heldCalls: ToolCall[] = [];
  anchor?: AssistantAnchor;
  lastAssistantMessage?: string;
  private idleWaiters: (() => void)[] = [];

  constructor(
    private readonly sessionId: string,
    private readonly transcript: TranscriptStore,
  ) {}

  public beginTurn(turnId: string): void {
    this.turnId = turnId;
    this.active = true;
    this.phase = 'streaming';
    this.iteration = 0;
    this.subturn = 0;
    this.issuedOrder = [];
    this.heldCalls = [];
    this.pendingResults.clear();
    this.anchor = undefined;
    this.lastAssistantMessage = undefined;
  }

  public append(message: ConversationMessage): void {
    this.history.push(message);
    this.transcript.append({ sessionId: this.sessionId, turnId: this.turnId, timestamp: Date.now(), message });
  }

  public waitForIdle(): Promise<void> {
    if (!this.active) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  public markIdle(): void {
    this.active = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => {
      resolve();
    });
  }
}

export interface TurnLogOptions {
  direction?: LogEntry['direction'];
  fatal?: boolean;
  callId?: string;
  details?: LogEntry['details'];
}

/** Shared by the runner, the supervisor callbacks and the controller. */
export interface TurnContext {
  readonly config: EngineConfig;
  readonly state: TurnState;
  readonly cancel: CancellationFlag;
  readonly emit: (event: SessionEvent) => void;
  readonly log: (
    severity: LogEntry['severity'],
    type: LogEntry['type'],
    remoteIdentifier: string,
    message: string,
    options?: TurnLogOptions,
  ) => void;
}

export function createTurnLogger(
  state: TurnState,
  onLog: ((entry: LogEntry) => void) | undefined,
): TurnContext['log'] {
  return (severity, type, remoteIdentifier, message, options = {}) => {
    if (onLog === undefined) return;
    onLog({
      timestamp: Date.now(),
      severity,
      turn: state.iteration,
      subturn: state.subturn,
      direction: options.direction ?? 'response',
      type,
      remoteIdentifier,
      fatal: options.fatal ?? false,
      message,
      turnId: state.turnId.length > 0 ? state.turnId : undefined,
      callId: options.callId,
      details: options.details,
    });
  };
}
