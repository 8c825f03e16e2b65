import type { ToolOutcome } from './types.js';

import { isPlainObject } from '../utils.js';

import { ToolExecutionError } from './tool-errors.js';

export interface BatchEntry {
  tool: string;
  parameters: Record<string, unknown>;
}

export interface BatchPlan {
  entries: BatchEntry[];
  // Entries rejected before execution, reported in the summary as errors
  rejected: { tool: string; error: string }[];
}

export interface BatchCallOutcome {
  tool: string;
  status: 'success' | 'failed' | 'error';
  error?: string;
}

export const UNKNOWN_BATCH_TOOL = 'unknown';

/**
 * Validates batch parameters `{ tool_calls: [{ tool, parameters }] }`.
 * Throws a ToolExecutionError (nothing is executed) when the array is missing
 * or holds more than `maxCalls` entries. Entries naming the batch tool itself
 * are dropped.
 */
export function planBatch(parameters: Record<string, unknown>, batchToolName: string, maxCalls: number): BatchPlan {
  const calls = parameters.tool_calls;
  if (!Array.isArray(calls)) {
    throw new ToolExecutionError('invalid_parameters', "Batch tool requires 'tool_calls' array parameter.");
  }
  if (calls.length > maxCalls) {
    throw new ToolExecutionError('limit_exceeded', `Batch tool allows max ${String(maxCalls)} tools, got ${String(calls.length)}.`);
  }
  const recursive = batchToolName.toLowerCase();
  return calls.reduce<BatchPlan>((plan, raw: unknown) => {
    const entry = isPlainObject(raw) ? raw : {};
    const tool = typeof entry.tool === 'string' && entry.tool.trim().length > 0 ? entry.tool.trim() : undefined;
    if (tool === undefined) {
      plan.rejected.push({ tool: UNKNOWN_BATCH_TOOL, error: 'batch entry has no tool name' });
      return plan;
    }
    if (tool.toLowerCase() === recursive) return plan;
    plan.entries.push({ tool, parameters: isPlainObject(entry.parameters) ? entry.parameters : {} });
    return plan;
  }, { entries: [], rejected: [] });
}

/** Runs every entry concurrently and waits for all of them. */
export async function runBatch(
  plan: BatchPlan,
  execute: (entry: BatchEntry, index: number) => Promise<ToolOutcome>,
): Promise<BatchCallOutcome[]> {
  const settled = await Promise.allSettled(plan.entries.map((entry, index) => execute(entry, index)));
  const executed = settled.map((result, index): BatchCallOutcome => {
    const tool = plan.entries[index].tool;
    if (result.status === 'fulfilled') {
      return { tool, status: result.value.success ? 'success' : 'failed' };
    }
    const reason: unknown = result.reason;
    return { tool, status: 'error', error: reason instanceof Error ? reason.message : String(reason) };
  });
  const rejected = plan.rejected.map((r): BatchCallOutcome => ({ tool: r.tool, status: 'error', error: r.error }));
  return [...executed, ...rejected];
}

export function formatBatchResult(outcomes: readonly BatchCallOutcome[]): { output: string; success: boolean } {
  const successful = outcomes.filter((o) => o.status === 'success').length;
  const failed = outcomes.length - successful;
  const total = successful + failed;
  const details = outcomes
    .map((o) => (o.status === 'error' ? `- ${o.tool}: error - ${o.error ?? ''}` : `- ${o.tool}: ${o.status}`))
    .join('\n');
  const output = `Batch execution completed: ${String(successful)}/${String(total)} successful\n\n${details}\n\n`
    + '<batch_metadata>\n'
    + `total_calls: ${String(total)}\n`
    + `successful: ${String(successful)}\n`
    + `failed: ${String(failed)}\n`
    + '</batch_metadata>';
  return { output, success: failed === 0 };
}
