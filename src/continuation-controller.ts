import { randomUUID } from 'node:crypto';

import type { ApprovalGate } from './approval-gate.js';
import type { RunningTaskTable } from './running-tasks.js';
import type { IterationOutcome, TurnRunner } from './session-turn-runner.js';
import type { SubagentRegistry } from './subagent-registry.js';
import type { TurnContext } from './turn-state.js';
import type { PendingToolResult, ToolEvent } from './types.js';

import { modelErrorMessage, NO_TOOL_OUTPUT } from './llm-messages.js';
import { recordTurnMetrics } from './telemetry/index.js';
import { isTerminalToolEvent } from './types.js';
import { errorMessage } from './utils.js';

export interface ContinuationDeps {
  runner: TurnRunner;
  gate: ApprovalGate;
  running: RunningTaskTable;
  subagents: SubagentRegistry;
}

type FinishStatus = 'complete' | 'failed' | 'cancelled';

/**
 * Consumes tool events, collects results and decides when the turn loop runs
 * again. Also owns turn start and turn end, including the hand-off to the
 * next queued message.
 */
export class ContinuationController {
  constructor(
    private readonly ctx: TurnContext,
    private readonly deps: ContinuationDeps,
  ) {}

  async startTurn(text: string): Promise<void> {
    const { ctx } = this;
    const { state, config } = ctx;
    state.beginTurn(randomUUID());
    if (config.systemPrompt !== undefined && !state.history.some((message) => message.role === 'system')) {
      state.append({ role: 'system', content: config.systemPrompt });
    }
    state.append({ role: 'user', content: text });
    ctx.emit({ type: 'turn_started', turnId: state.turnId });
    ctx.log('VRB', 'llm', config.model, 'turn started', { direction: 'request' });
    await this.iterate();
  }

  async handleToolEvent(event: ToolEvent): Promise<void> {
    const { ctx, deps } = this;
    const { state } = ctx;
    if (!isTerminalToolEvent(event)) {
      if (!deps.running.has(event.id) && !deps.subagents.has(event.id)) {
        ctx.log('TRC', 'tool', event.type, 'dropping progress event for a call that is no longer tracked', { callId: event.id });
        return;
      }
      ctx.emit({ type: 'tool_event', turnId: state.turnId, event });
      return;
    }

    // Removal happens exactly once; a second terminal event for the id is stale
    const handle = deps.running.remove(event.id) ?? deps.subagents.remove(event.id);
    if (handle === undefined) {
      ctx.log('WRN', 'tool', event.name, `ignoring ${event.type} event for unknown call`, { callId: event.id });
      return;
    }
    this.ensureAssistantAnchored();

    const result: PendingToolResult = event.type === 'completed'
      ? { callId: event.id, toolName: event.name, output: event.output, success: event.success }
      : { callId: event.id, toolName: event.name, output: event.error, success: false };
    ctx.emit({ type: 'tool_event', turnId: state.turnId, event });
    ctx.emit({ type: 'tool_result', turnId: state.turnId, result });
    ctx.log(result.success ? 'VRB' : 'WRN', 'tool', event.name, `${event.type} in ${String(event.durationMs)}ms`, {
      callId: event.id,
      details: { success: result.success, output_bytes: Buffer.byteLength(result.output, 'utf8') },
    });

    if (ctx.cancel.isCancelled()) {
      ctx.log('VRB', 'tool', event.name, 'turn cancelled, result discarded', { callId: event.id });
    } else {
      state.pendingResults.set(result.callId, result);
    }
    await this.checkContinuation();
  }

  /** Runs after every processed event and on every sentinel tick. */
  async checkContinuation(): Promise<void> {
    const { ctx, deps } = this;
    const { state } = ctx;
    if (!state.active) {
      const next = state.messageQueue.shift();
      if (next !== undefined) await this.startTurn(next);
      return;
    }
    if (!deps.running.isEmpty || !deps.subagents.isEmpty) return;
    if (ctx.cancel.isCancelled()) {
      this.finalizeCancelled();
      return;
    }
    if (deps.gate.list().length > 0 || state.heldCalls.length > 0) return;
    if (state.phase !== 'executing_tools' || state.pendingResults.size === 0) return;

    this.appendResults();
    await this.iterate();
  }

  async drive(outcome: IterationOutcome): Promise<void> {
    const { ctx, deps } = this;
    const { state } = ctx;
    switch (outcome) {
      case 'complete':
        ctx.emit({ type: 'turn_complete', turnId: state.turnId, lastAssistantMessage: state.lastAssistantMessage });
        await this.finish('complete');
        return;
      case 'failed':
        await this.finish('failed');
        return;
      case 'cancelled':
        // In-flight tasks drain first; the last one to report finalizes
        if (deps.running.isEmpty && deps.subagents.isEmpty) this.finalizeCancelled();
        return;
      case 'dispatched':
      case 'suspended':
        return;
    }
  }

  private async iterate(): Promise<void> {
    let outcome: IterationOutcome;
    try {
      outcome = await this.deps.runner.runIteration();
    } catch (error) {
      const message = errorMessage(error);
      this.ctx.log('ERR', 'llm', this.ctx.config.model, `iteration failed: ${message}`, { fatal: true });
      this.ctx.emit({ type: 'turn_error', turnId: this.ctx.state.turnId, message: modelErrorMessage(message) });
      outcome = 'failed';
    }
    await this.drive(outcome);
  }

  // A result must never reach history before the assistant message that issued its call
  private ensureAssistantAnchored(): void {
    const { state } = this.ctx;
    const anchor = state.anchor;
    if (anchor === undefined || anchor.persisted) return;
    state.append({ role: 'assistant', content: anchor.content, toolCalls: anchor.toolCalls });
    anchor.persisted = true;
  }

  private appendResults(): void {
    const { state } = this.ctx;
    const ordered = state.issuedOrder
      .map((callId) => state.pendingResults.get(callId))
      .filter((result): result is PendingToolResult => result !== undefined);
    const issued = new Set(state.issuedOrder);
    const extras = Array.from(state.pendingResults.values()).filter((result) => !issued.has(result.callId));
    state.pendingResults.clear();
    [...ordered, ...extras].forEach((result) => {
      state.append({
        role: 'tool',
        toolCallId: result.callId,
        content: result.output.length > 0 ? result.output : NO_TOOL_OUTPUT,
        metadata: { success: result.success, timestamp: Date.now() },
      });
    });
  }

  private async finish(status: FinishStatus): Promise<void> {
    const { ctx } = this;
    const { state } = ctx;
    recordTurnMetrics({ model: ctx.config.model, status, iterations: state.iteration });
    state.phase = status;
    ctx.log('FIN', 'llm', ctx.config.model, `turn ${status} after ${String(state.iteration)} iteration(s)`);
    const next = state.messageQueue.shift();
    if (next !== undefined) {
      await this.startTurn(next);
      return;
    }
    state.markIdle();
  }

  private finalizeCancelled(): void {
    const { ctx, deps } = this;
    const { state } = ctx;
    deps.gate.clear();
    state.heldCalls = [];
    state.pendingResults.clear();
    const dropped = state.messageQueue.splice(0, state.messageQueue.length);
    ctx.emit({ type: 'turn_cancelled', turnId: state.turnId });
    ctx.log('FIN', 'llm', ctx.config.model, `turn cancelled, ${String(dropped.length)} queued message(s) dropped`);
    recordTurnMetrics({ model: ctx.config.model, status: 'cancelled', iterations: state.iteration });
    state.phase = 'cancelled';
    ctx.cancel.reset();
    state.markIdle();
  }
}
