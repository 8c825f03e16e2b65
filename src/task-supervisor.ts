import type { EventChannel } from './event-channel.js';
import type { SubagentRegistry } from './subagent-registry.js';
import type { SubagentRunner } from './subagent-runner.js';
import type { ToolQueue } from './tools/queue-manager.js';
import type { ToolNames } from './tools/tool-catalog.js';
import type { ToolExecutionError } from './tools/tool-errors.js';
import type { ToolExecutor, ToolOutcome } from './tools/types.js';
import type { TurnContext } from './turn-state.js';
import type { TerminalToolEvent, ToolEvent } from './types.js';
import type { RunningTaskTable } from './running-tasks.js';

import { TaskCancelledError, TaskHandle } from './running-tasks.js';
import { parseDelegationParameters } from './subagent-registry.js';
import { recordToolMetrics, runWithSpan } from './telemetry/index.js';
import { formatBatchResult, planBatch, runBatch } from './tools/batch-tool.js';
import { toToolExecutionError } from './tools/tool-errors.js';

export type ToolRoute =
  | { kind: 'delegation' }
  | { kind: 'batch' }
  | { kind: 'standard' };

export function routeTool(name: string, names: ToolNames): ToolRoute {
  if (name === names.delegationToolName) return { kind: 'delegation' };
  if (name === names.batchToolName) return { kind: 'batch' };
  return { kind: 'standard' };
}

export interface TaskSupervisorDeps {
  executor: ToolExecutor;
  channel: EventChannel<ToolEvent>;
  running: RunningTaskTable;
  subagents: SubagentRegistry;
  subagentRunner: SubagentRunner;
  queue: ToolQueue;
  names: ToolNames;
  batchMaxCalls: number;
  cwd: string;
  log: TurnContext['log'];
}

/**
 * Spawns one background task per tool call. Each task sends `started`, any
 * number of progress events, then exactly one `completed` or `failed` as its
 * last act. Delegation tasks are tracked in the subagent registry, all
 * others in the running-task table.
 */
export class TaskSupervisor {
  constructor(private readonly deps: TaskSupervisorDeps) {}

  spawn(callId: string, toolName: string, parameters: Record<string, unknown>): void {
    const route = routeTool(toolName, this.deps.names);
    const handle = new TaskHandle(callId, toolName, (signal) => this.runTask(route, callId, toolName, parameters, signal));
    if (route.kind === 'delegation') this.deps.subagents.add(handle);
    else this.deps.running.add(handle);
  }

  /** Records a call that will never run (e.g. a denied approval) through the normal event path. */
  reject(callId: string, toolName: string, error: ToolExecutionError): void {
    this.deps.log('WRN', 'tool', toolName, `tool rejected (${error.kind}): ${error.message}`, { callId });
    const handle = new TaskHandle(callId, toolName, async () => {
      this.send({ type: 'started', id: callId, name: toolName });
      this.send({ type: 'failed', id: callId, name: toolName, error: error.message, durationMs: 0 });
    });
    this.deps.running.add(handle);
  }

  /** Used on shutdown only; turn cancellation never aborts dispatched tools. */
  abortAll(): void {
    this.deps.running.cancelAll();
    this.deps.subagents.cancelAll();
  }

  private async runTask(
    route: ToolRoute,
    callId: string,
    toolName: string,
    parameters: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<void> {
    const attributes = { 'tool.name': toolName, 'tool.call_id': callId, 'tool.route': route.kind };
    await runWithSpan('turn.tool_task', { attributes }, async () => {
      this.send({ type: 'started', id: callId, name: toolName });
      const startedAt = Date.now();
      let terminal: TerminalToolEvent;
      try {
        const outcome = await this.execute(route, callId, toolName, parameters, signal);
        terminal = { type: 'completed', id: callId, name: toolName, output: outcome.output, success: outcome.success, durationMs: Date.now() - startedAt };
      } catch (error) {
        if (signal.aborted || error instanceof TaskCancelledError) throw new TaskCancelledError();
        const toolError = toToolExecutionError(error);
        terminal = { type: 'failed', id: callId, name: toolName, error: toolError.message, durationMs: Date.now() - startedAt };
        this.deps.log('WRN', 'tool', toolName, `tool failed (${toolError.kind}): ${toolError.message}`, { callId });
      }
      recordToolMetrics({
        toolName,
        route: route.kind,
        status: terminal.type === 'completed' && terminal.success ? 'success' : 'error',
        latencyMs: terminal.durationMs,
        outputBytes: terminal.type === 'completed' ? Buffer.byteLength(terminal.output, 'utf8') : undefined,
      });
      this.send(terminal);
    });
  }

  private async execute(
    route: ToolRoute,
    callId: string,
    toolName: string,
    parameters: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    const onOutput = (chunk: string): void => {
      this.send({ type: 'output', id: callId, chunk });
    };
    switch (route.kind) {
      case 'delegation': {
        const request = parseDelegationParameters(parameters);
        this.deps.log('VRB', 'tool', toolName, `delegating to ${request.subagentType} subagent: ${request.description}`, { callId, direction: 'request' });
        const output = await this.deps.subagentRunner.run({
          callId,
          request,
          signal,
          emit: (event) => {
            this.send(event);
          },
        });
        return { success: true, output };
      }
      case 'batch': {
        const plan = planBatch(parameters, this.deps.names.batchToolName, this.deps.batchMaxCalls);
        const outcomes = await runBatch(plan, (entry, index) => this.withSlot(signal, () => this.deps.executor.execute(
          entry.tool,
          entry.parameters,
          { callId: `${callId}#${String(index)}`, cwd: this.deps.cwd, signal, onOutput },
        )));
        return formatBatchResult(outcomes);
      }
      case 'standard':
        return await this.withSlot(signal, () => this.deps.executor.execute(
          toolName,
          parameters,
          { callId, cwd: this.deps.cwd, signal, onOutput },
        ));
    }
  }

  private async withSlot<T>(signal: AbortSignal, fn: () => Promise<T>): Promise<T> {
    await this.deps.queue.acquire(signal);
    try {
      return await fn();
    } finally {
      this.deps.queue.release();
    }
  }

  private send(event: ToolEvent): void {
    this.deps.channel.send(event);
  }
}
