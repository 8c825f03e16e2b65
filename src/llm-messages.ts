/**
 * Messages the engine itself puts into the conversation or into terminal
 * notifications. Tool output text comes from the executor and is not here.
 *
 * Categories:
 * - TURN_CONTROL: turn-terminal error messages
 * - TOOL_RESULTS: synthesized tool results (denials, crashes, empty output)
 * - SUBAGENT: prompts and results of delegated work
 */

// =============================================================================
// TURN CONTROL
// =============================================================================

/** Surfaced as turn_error when the iteration guard trips. */
export const MAX_ITERATIONS_MESSAGE = 'Maximum iterations reached';

export const modelErrorMessage = (message: string): string => `Model error: ${message}`;

// =============================================================================
// TOOL RESULTS
// =============================================================================

/** Result recorded for an execution call the user rejected. */
export const APPROVAL_DENIED_MESSAGE = 'Command denied by user';

export const TOOL_TASK_CANCELLED_MESSAGE = 'Tool task was cancelled';
export const toolTaskPanickedMessage = (message: string): string => `Tool task panicked: ${message}`;

export const SUBAGENT_TASK_CANCELLED_MESSAGE = 'Subagent task was cancelled';
export const subagentPanickedMessage = (message: string): string => `Subagent panicked: ${message}`;

/** Sent to the model in place of an empty tool output. */
export const NO_TOOL_OUTPUT = '(no output)';

// =============================================================================
// SUBAGENT
// =============================================================================

export const DELEGATION_PROMPT_REQUIRED_MESSAGE =
  "Task tool requires a 'task' or 'prompt' parameter with instructions for the subagent.";

export const SUBAGENT_EMPTY_RESULT = 'Subagent completed without a response.';

export const subagentErrorMessage = (message: string): string => `Subagent error: ${message}`;

export const subagentMaxIterationsMessage = (limit: number): string =>
  `Subagent reached maximum iterations (${String(limit)})`;

export const subagentSystemPrompt = (subagentType: string): string =>
  `You are a ${subagentType} subagent working on a task delegated by another agent. `
  + 'Use the available tools to complete the task, then reply with a concise summary of what you did and what you found. '
  + 'Your final reply is returned to the delegating agent as the result of the task.';
