import type { EngineConfig } from './config.js';
import type { DelegationRequest } from './subagent-registry.js';
import type { ToolCatalog } from './tools/tool-catalog.js';
import type { ToolExecutor, ToolOutcome } from './tools/types.js';
import type { ConversationMessage, ModelClient, TodoItem, ToolEvent } from './types.js';

import {
  NO_TOOL_OUTPUT,
  SUBAGENT_EMPTY_RESULT,
  subagentErrorMessage,
  subagentMaxIterationsMessage,
  subagentSystemPrompt,
} from './llm-messages.js';
import { consumeModelStream } from './model-stream.js';
import { TaskCancelledError } from './running-tasks.js';
import { ToolExecutionError, toToolExecutionError } from './tools/tool-errors.js';
import { truncateToBytes } from './truncation.js';
import { isPlainObject } from './utils.js';

export interface SubagentRunnerDeps {
  config: EngineConfig;
  model: ModelClient;
  executor: ToolExecutor;
  catalog: ToolCatalog;
}

export interface SubagentRun {
  callId: string;
  request: DelegationRequest;
  signal: AbortSignal;
  emit: (event: ToolEvent) => void;
}

export const subagentSessionId = (callId: string): string => `subagent_${callId}`;

export function parseTodos(parameters: Record<string, unknown>): TodoItem[] {
  const raw = parameters.todos;
  if (!Array.isArray(raw)) return [];
  return raw.flatMap((item: unknown): TodoItem[] => {
    if (!isPlainObject(item) || typeof item.content !== 'string') return [];
    return [{ content: item.content, status: typeof item.status === 'string' ? item.status : 'pending' }];
  });
}

/**
 * Nested model loop for delegated work. Runs with its own history and the
 * catalog minus delegation, executes tool calls one at a time and returns the
 * final assistant text. Failures throw ToolExecutionError.
 */
export class SubagentRunner {
  constructor(private readonly deps: SubagentRunnerDeps) {}

  async run(job: SubagentRun): Promise<string> {
    const { config, model, catalog } = this.deps;
    const limit = config.limits.subagentMaxIterations;
    const messages: ConversationMessage[] = [
      { role: 'system', content: subagentSystemPrompt(job.request.subagentType) },
      { role: 'user', content: job.request.prompt },
    ];
    const tools = catalog.forSubagent();

    // eslint-disable-next-line functional/no-loop-statements
    for (let iteration = 0; iteration < limit; iteration += 1) {
      if (job.signal.aborted) throw new TaskCancelledError();
      const outcome = await consumeModelStream(
        model.stream({ model: config.model, messages: [...messages], tools, sampling: config.sampling }, job.signal),
        job.signal,
      );
      if (outcome.kind === 'cancelled') throw new TaskCancelledError();
      if (outcome.kind === 'error') {
        throw new ToolExecutionError('execution_error', subagentErrorMessage(outcome.message));
      }
      messages.push({
        role: 'assistant',
        content: outcome.text,
        ...(outcome.toolCalls.length > 0 ? { toolCalls: outcome.toolCalls } : {}),
      });
      if (outcome.toolCalls.length === 0) {
        return outcome.text.trim().length > 0 ? outcome.text : SUBAGENT_EMPTY_RESULT;
      }
      // eslint-disable-next-line functional/no-loop-statements
      for (const call of outcome.toolCalls) {
        if (job.signal.aborted) throw new TaskCancelledError();
        const result = await this.executeNested(job, call.id, call.name, call.parameters);
        const output = result.output.length > 0 ? result.output : NO_TOOL_OUTPUT;
        messages.push({
          role: 'tool',
          toolCallId: call.id,
          content: truncateToBytes(output, config.limits.subagentToolOutputMaxBytes),
          metadata: { success: result.success },
        });
      }
    }
    throw new ToolExecutionError('limit_exceeded', subagentMaxIterationsMessage(limit));
  }

  private async executeNested(
    job: SubagentRun,
    nestedId: string,
    name: string,
    parameters: Record<string, unknown>,
  ): Promise<ToolOutcome> {
    const { config, executor } = this.deps;
    if (name === config.tools.delegationToolName || name === config.tools.batchToolName) {
      return { success: false, output: `Error: ${name} is not available to subagents` };
    }
    let outcome: ToolOutcome;
    try {
      outcome = await executor.execute(name, parameters, {
        callId: `${job.callId}:${nestedId}`,
        cwd: config.cwd,
        signal: job.signal,
        onOutput: () => undefined,
      });
    } catch (error) {
      if (job.signal.aborted) throw new TaskCancelledError();
      return { success: false, output: `Error: ${toToolExecutionError(error).message}` };
    }
    if (name === config.tools.todoToolName && outcome.success) {
      job.emit({ type: 'todo_updated', id: job.callId, sessionId: subagentSessionId(job.callId), todos: parseTodos(parameters) });
    }
    if (outcome.artifact !== undefined) {
      if (outcome.success) {
        job.emit({ type: 'artifact_generated', id: job.callId, ...outcome.artifact });
      } else {
        job.emit({ type: 'artifact_generation_failed', id: job.callId, error: outcome.output });
      }
    }
    return outcome;
  }
}
