import { randomUUID } from 'node:crypto';

import { Mutex } from 'async-mutex';

import type { EngineConfig, EngineConfigInput } from './config.js';
import type { IterationOutcome } from './session-turn-runner.js';
import type { SafetyClassifier } from './safety-classifier.js';
import type { TokenCounter } from './tokenizer-registry.js';
import type { TranscriptStore } from './transcript-store.js';
import type { ToolExecutor } from './tools/types.js';
import type { TurnContext } from './turn-state.js';
import type {
  ConversationMessage,
  LogEntry,
  ModelClient,
  PendingApproval,
  SessionEvent,
  SessionObserver,
  ToolEvent,
  TurnPhase,
} from './types.js';

import { ApprovalGate } from './approval-gate.js';
import { CancellationFlag } from './cancellation.js';
import { resolveEngineConfig } from './config.js';
import { ContinuationController } from './continuation-controller.js';
import { CrashSentinel } from './crash-sentinel.js';
import { EventChannel } from './event-channel.js';
import { APPROVAL_DENIED_MESSAGE } from './llm-messages.js';
import { createLogCallbacks } from './logging/structured-logger.js';
import { RunningTaskTable } from './running-tasks.js';
import { RuleSafetyClassifier } from './safety-classifier.js';
import { TurnRunner } from './session-turn-runner.js';
import { SubagentRegistry } from './subagent-registry.js';
import { SubagentRunner } from './subagent-runner.js';
import { TaskSupervisor } from './task-supervisor.js';
import { TokenizerCounter } from './tokenizer-registry.js';
import { ToolQueue } from './tools/queue-manager.js';
import { ToolCatalog } from './tools/tool-catalog.js';
import { ToolExecutionError } from './tools/tool-errors.js';
import { createTranscriptStore } from './transcript-store.js';
import { createTurnLogger, TurnState } from './turn-state.js';
import { errorMessage, warn } from './utils.js';

export type ApprovalDecision = 'approve' | 'deny';

export interface AgentSessionOptions {
  // A parsed EngineConfig is accepted as well
  config?: EngineConfigInput;
  model: ModelClient;
  executor: ToolExecutor;
  classifier?: SafetyClassifier;
  tokenCounter?: TokenCounter;
  transcript?: TranscriptStore;
  observer?: SessionObserver;
  sessionId?: string;
  // Replaces the tool event channel; used by tests to observe or disturb delivery
  channel?: EventChannel<ToolEvent>;
}

/**
 * One conversational session: owns the history, the turn state and the event
 * pump. Every mutation (submissions, approval resolutions, tool events,
 * sentinel ticks) runs under a single mutex, so the turn loop and the
 * continuation controller never interleave.
 *
 * The pump's tick timer does not hold the process open; `close()` still stops
 * the pump and flushes the transcript.
 */
export class AgentSession {
  readonly sessionId: string;
  readonly config: EngineConfig;
  private readonly mutex = new Mutex();
  private readonly channel: EventChannel<ToolEvent>;
  private readonly cancelFlag = new CancellationFlag();
  private readonly state: TurnState;
  private readonly running = new RunningTaskTable();
  private readonly subagents = new SubagentRegistry();
  private readonly gate: ApprovalGate;
  private readonly supervisor: TaskSupervisor;
  private readonly runner: TurnRunner;
  private readonly controller: ContinuationController;
  private readonly sentinel: CrashSentinel;
  private readonly transcript: TranscriptStore;
  private readonly ctx: TurnContext;
  private readonly observer: SessionObserver;
  private pumpDone?: Promise<void>;
  private closed = false;

  constructor(options: AgentSessionOptions) {
    this.config = resolveEngineConfig(options.config);
    this.sessionId = options.sessionId ?? randomUUID();
    this.observer = options.observer ?? {};
    this.channel = options.channel ?? new EventChannel<ToolEvent>();
    this.transcript = options.transcript ?? createTranscriptStore(this.config.transcriptFile);
    this.state = new TurnState(this.sessionId, this.transcript);

    const onLog: (entry: LogEntry) => void = this.observer.onLog ?? createLogCallbacks(this.config.logging).onLog;
    this.ctx = {
      config: this.config,
      state: this.state,
      cancel: this.cancelFlag,
      emit: (event) => {
        this.emit(event);
      },
      log: createTurnLogger(this.state, onLog),
    };

    const { config } = this;
    const catalog = new ToolCatalog(options.executor, config.tools, config.limits.batchMaxCalls);
    this.gate = new ApprovalGate({
      policy: config.approval.policy,
      executionTools: config.approval.executionTools,
      cwd: config.cwd,
      classifier: options.classifier ?? new RuleSafetyClassifier(),
    });
    this.supervisor = new TaskSupervisor({
      executor: options.executor,
      channel: this.channel,
      running: this.running,
      subagents: this.subagents,
      subagentRunner: new SubagentRunner({ config, model: options.model, executor: options.executor, catalog }),
      queue: new ToolQueue(config.limits.maxConcurrentTools),
      names: config.tools,
      batchMaxCalls: config.limits.batchMaxCalls,
      cwd: config.cwd,
      log: this.ctx.log,
    });
    this.runner = new TurnRunner(this.ctx, {
      model: options.model,
      catalog,
      gate: this.gate,
      supervisor: this.supervisor,
      tokenCounter: options.tokenCounter ?? new TokenizerCounter(config.tokenizer),
    });
    this.controller = new ContinuationController(this.ctx, {
      runner: this.runner,
      gate: this.gate,
      running: this.running,
      subagents: this.subagents,
    });
    this.sentinel = new CrashSentinel({
      running: this.running,
      subagents: this.subagents,
      channel: this.channel,
      log: this.ctx.log,
    });
  }

  get history(): readonly ConversationMessage[] {
    return this.state.history;
  }

  get phase(): TurnPhase {
    return this.state.phase;
  }

  get isActive(): boolean {
    return this.state.active;
  }

  get pendingApprovals(): PendingApproval[] {
    return this.gate.list();
  }

  get queuedMessages(): readonly string[] {
    return this.state.messageQueue;
  }

  get runningCallIds(): string[] {
    return [...this.running.ids(), ...this.subagents.list().map((handle) => handle.callId)];
  }

  /** Starts the event pump. Called implicitly by `submit`. */
  start(): void {
    if (this.pumpDone !== undefined || this.closed) return;
    this.pumpDone = this.pump().catch((error: unknown) => {
      warn(`event pump stopped: ${errorMessage(error)}`);
    });
  }

  async submit(text: string): Promise<void> {
    if (this.closed) throw new Error('session is closed');
    this.start();
    if (this.state.active) {
      this.state.messageQueue.push(text);
      this.ctx.log('VRB', 'llm', this.config.model, `message queued (${String(this.state.messageQueue.length)} waiting)`);
      return;
    }
    // Claimed before the mutex so a second submit queues instead of racing,
    // and so a cancel issued before the turn body runs still applies to it
    this.cancelFlag.reset();
    this.state.active = true;
    await this.mutex.runExclusive(() => this.controller.startTurn(text));
  }

  /** Returns true when this call set the flag. */
  async cancel(): Promise<boolean> {
    if (!this.state.active) return false;
    const flipped = this.cancelFlag.cancel();
    if (flipped) this.ctx.log('VRB', 'llm', this.config.model, 'cancellation requested');
    await this.mutex.runExclusive(() => this.controller.checkContinuation());
    return flipped;
  }

  async resolveApproval(callId: string, decision: ApprovalDecision): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const approval = this.gate.take(callId);
      if (approval === undefined) throw new Error(`no pending approval for call ${callId}`);
      this.ctx.log('VRB', 'tool', approval.toolName, `approval ${decision === 'approve' ? 'granted' : 'denied'}`, { callId });
      if (decision === 'approve') {
        this.state.subturn += 1;
        this.supervisor.spawn(approval.callId, approval.toolName, approval.parameters);
      } else {
        this.supervisor.reject(approval.callId, approval.toolName, new ToolExecutionError('not_permitted', APPROVAL_DENIED_MESSAGE));
      }
      const held = this.state.heldCalls;
      this.state.heldCalls = [];
      const outcome: IterationOutcome = this.runner.dispatchCalls(held);
      await this.controller.drive(outcome);
    });
  }

  waitForIdle(): Promise<void> {
    return this.state.waitForIdle();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.cancelFlag.cancel();
    this.supervisor.abortAll();
    this.channel.close();
    if (this.pumpDone !== undefined) await this.pumpDone;
    await this.transcript.flush();
    this.state.markIdle();
  }

  private async pump(): Promise<void> {
    const tickMs = this.config.sentinel.tickMs;
    let lastSweep = Date.now();
    // eslint-disable-next-line functional/no-loop-statements
    while (true) {
      const next = await this.channel.receive(tickMs);
      if (next.kind === 'closed') return;
      await this.mutex.runExclusive(async () => {
        try {
          if (next.kind === 'item') await this.controller.handleToolEvent(next.item);
          // A busy channel must not starve the sweep
          if (next.kind === 'tick' || Date.now() - lastSweep >= tickMs) {
            lastSweep = Date.now();
            await this.sentinel.sweep();
            await this.controller.checkContinuation();
          }
        } catch (error) {
          this.ctx.log('ERR', 'tool', 'session', `event handling failed: ${errorMessage(error)}`);
        }
      });
    }
  }

  private emit(event: SessionEvent): void {
    const onEvent = this.observer.onEvent;
    if (onEvent === undefined) return;
    try {
      onEvent(event);
    } catch (error) {
      warn(`session observer failed on ${event.type}: ${errorMessage(error)}`);
    }
  }
}
