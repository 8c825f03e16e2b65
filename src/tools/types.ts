import type { ToolDefinition } from '../types.js';

export interface ToolArtifact {
  name: string;
  path: string;
  location: string;
}

export interface ToolOutcome {
  success: boolean;
  output: string;
  // Set by tools that generate a file the user should know about
  artifact?: ToolArtifact;
}

export interface ToolExecutionContext {
  callId: string;
  cwd: string;
  signal: AbortSignal;
  onOutput: (chunk: string) => void;
}

/**
 * Performs the effect of a tool. A rejected promise is an execution error;
 * timeouts, sandboxing and retries are the executor's business.
 */
export interface ToolExecutor {
  execute: (name: string, parameters: Record<string, unknown>, ctx: ToolExecutionContext) => Promise<ToolOutcome>;
  definitions: () => ToolDefinition[];
}
