import type { ApprovalGate } from './approval-gate.js';
import type { TaskSupervisor } from './task-supervisor.js';
import type { TokenCounter } from './tokenizer-registry.js';
import type { ToolCatalog } from './tools/tool-catalog.js';
import type { TurnContext } from './turn-state.js';
import type { ModelClient, ToolCall } from './types.js';

import { MAX_ITERATIONS_MESSAGE, modelErrorMessage } from './llm-messages.js';
import { consumeModelStream } from './model-stream.js';
import { addSpanAttributes, runWithSpan } from './telemetry/index.js';

export type IterationOutcome = 'complete' | 'dispatched' | 'suspended' | 'failed' | 'cancelled';

export interface TurnRunnerDeps {
  model: ModelClient;
  catalog: ToolCatalog;
  gate: ApprovalGate;
  supervisor: TaskSupervisor;
  tokenCounter: TokenCounter;
}

/**
 * One pass of the turn loop: request, stream, record the response, dispatch
 * its tool calls. Completion of the dispatched tools is observed by the
 * continuation controller, which calls `runIteration` again.
 *
 * Never called concurrently with itself or the controller; both run under
 * the session mutex.
 */
export class TurnRunner {
  constructor(
    private readonly ctx: TurnContext,
    private readonly deps: TurnRunnerDeps,
  ) {}

  async runIteration(): Promise<IterationOutcome> {
    const { ctx } = this;
    const { state, config } = ctx;
    if (ctx.cancel.isCancelled()) return 'cancelled';

    if (state.iteration >= config.limits.maxIterations) {
      ctx.log('ERR', 'llm', config.model, `${MAX_ITERATIONS_MESSAGE} (${String(config.limits.maxIterations)})`, { fatal: true });
      ctx.emit({ type: 'turn_error', turnId: state.turnId, message: MAX_ITERATIONS_MESSAGE });
      return 'failed';
    }
    state.iteration += 1;
    state.subturn = 0;
    state.phase = 'streaming';
    state.anchor = undefined;
    state.issuedOrder = [];
    state.heldCalls = [];

    const messages = [...state.history];
    const tools = this.deps.catalog.forTurn();
    const tokens = this.deps.tokenCounter.count({ model: config.model, messages, tools });
    ctx.emit({ type: 'token_count', turnId: state.turnId, tokens });
    ctx.log('VRB', 'llm', config.model, `request iteration=${String(state.iteration)} messages=${String(messages.length)} tokens=${String(tokens)}`, { direction: 'request' });

    const attributes = { 'turn.id': state.turnId, 'turn.iteration': state.iteration, 'llm.model': config.model };
    const outcome = await runWithSpan('turn.model_request', { attributes }, async () => {
      const result = await consumeModelStream(
        this.deps.model.stream({ model: config.model, messages, tools, sampling: config.sampling }, ctx.cancel.signal),
        ctx.cancel.signal,
        (text) => {
          ctx.emit({ type: 'assistant_delta', turnId: state.turnId, text });
        },
      );
      addSpanAttributes({ 'llm.outcome': result.kind });
      return result;
    });

    if (outcome.kind === 'cancelled') {
      ctx.log('VRB', 'llm', config.model, 'response stream stopped by cancellation');
      return 'cancelled';
    }
    if (outcome.kind === 'error') {
      // Tool calls of a failed response are never dispatched
      ctx.log('ERR', 'llm', config.model, `model stream error: ${outcome.message}`, { fatal: true });
      ctx.emit({ type: 'turn_error', turnId: state.turnId, message: modelErrorMessage(outcome.message) });
      return 'failed';
    }

    const usage = outcome.usage;
    ctx.log('VRB', 'llm', config.model, `response text=${String(outcome.text.length)} tool_calls=${String(outcome.toolCalls.length)}`, {
      details: usage === undefined ? undefined : { input_tokens: usage.inputTokens, output_tokens: usage.outputTokens },
    });

    if (outcome.text.length > 0) {
      ctx.emit({ type: 'assistant_message', turnId: state.turnId, content: outcome.text });
      state.lastAssistantMessage = outcome.text;
      state.append({
        role: 'assistant',
        content: outcome.text,
        ...(outcome.toolCalls.length > 0 ? { toolCalls: outcome.toolCalls } : {}),
        metadata: { model: config.model, tokens: usage, timestamp: Date.now() },
      });
      state.anchor = { content: outcome.text, toolCalls: outcome.toolCalls, persisted: true };
    } else if (outcome.toolCalls.length > 0) {
      // Persisted by the controller before the first result is recorded
      state.anchor = { content: '', toolCalls: outcome.toolCalls, persisted: false };
    }

    if (outcome.toolCalls.length === 0) return 'complete';
    state.issuedOrder = outcome.toolCalls.map((call) => call.id);
    return this.dispatchCalls(outcome.toolCalls);
  }

  /**
   * Dispatches calls in issue order. The first call the gate defers parks
   * itself and every call after it; nothing behind it runs until the
   * approval is resolved.
   */
  dispatchCalls(calls: readonly ToolCall[]): IterationOutcome {
    const { ctx } = this;
    const { state } = ctx;
    // eslint-disable-next-line functional/no-loop-statements
    for (const [index, call] of calls.entries()) {
      if (ctx.cancel.isCancelled()) {
        state.heldCalls = [];
        return 'cancelled';
      }
      const decision = this.deps.gate.evaluate(call);
      if (decision.kind === 'deferred') {
        state.heldCalls = calls.slice(index + 1);
        state.phase = 'awaiting_approval';
        ctx.log('VRB', 'tool', call.name, `approval required (risk=${decision.assessment.risk}): ${decision.approval.command.join(' ')}`, {
          callId: call.id,
          direction: 'request',
        });
        ctx.emit({
          type: 'approval_request',
          callId: call.id,
          turnId: state.turnId,
          command: decision.approval.command,
          cwd: this.deps.gate.cwd,
        });
        return 'suspended';
      }
      state.subturn += 1;
      ctx.log('VRB', 'tool', call.name, 'dispatch', { callId: call.id, direction: 'request' });
      this.deps.supervisor.spawn(call.id, call.name, call.parameters);
    }
    state.heldCalls = [];
    state.phase = 'executing_tools';
    return 'dispatched';
  }
}
