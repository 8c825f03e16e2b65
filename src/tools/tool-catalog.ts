import type { ToolDefinition } from '../types.js';
import type { ToolExecutor } from './types.js';

export interface ToolNames {
  batchToolName: string;
  delegationToolName: string;
  todoToolName: string;
}

const batchDefinition = (name: string, maxCalls: number): ToolDefinition => ({
  name,
  description: `Run up to ${String(maxCalls)} independent tool calls in parallel and report a combined result.`,
  inputSchema: {
    type: 'object',
    properties: {
      tool_calls: {
        type: 'array',
        maxItems: maxCalls,
        items: {
          type: 'object',
          properties: {
            tool: { type: 'string', description: 'Name of the tool to call' },
            parameters: { type: 'object', description: 'Parameters for the tool' },
          },
          required: ['tool'],
        },
      },
    },
    required: ['tool_calls'],
  },
});

const delegationDefinition = (name: string): ToolDefinition => ({
  name,
  description: 'Delegate a self-contained task to a subagent that works with its own conversation and tools, and returns a summary.',
  inputSchema: {
    type: 'object',
    properties: {
      prompt: { type: 'string', description: 'Instructions for the subagent' },
      description: { type: 'string', description: 'Short label for the task' },
      subagent_type: { type: 'string', description: 'Kind of subagent, e.g. code or research' },
      context: { type: 'string', description: 'Extra context appended to the instructions' },
    },
    required: ['prompt'],
  },
});

/**
 * Tool catalog offered to the model: the executor's tools plus the batch and
 * delegation pseudo-tools handled by the task supervisor.
 */
export class ToolCatalog {
  constructor(
    private readonly executor: ToolExecutor,
    private readonly names: ToolNames,
    private readonly batchMaxCalls: number,
  ) {}

  public forTurn(): ToolDefinition[] {
    return [
      ...this.forSubagent(),
      batchDefinition(this.names.batchToolName, this.batchMaxCalls),
      delegationDefinition(this.names.delegationToolName),
    ];
  }

  // Subagents get the executor's tools only: no fan-out, no further delegation
  public forSubagent(): ToolDefinition[] {
    const reserved = new Set([this.names.batchToolName, this.names.delegationToolName]);
    return this.executor.definitions().filter((def) => !reserved.has(def.name));
  }
}
