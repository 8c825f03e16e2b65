// Shared types for the turn engine

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ToolCall {
  id: string;
  name: string;
  parameters: Record<string, unknown>;
}

export interface ConversationMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
  metadata?: {
    model?: string;
    tokens?: TokenUsage;
    timestamp?: number;
    // Set on tool messages: false when the call failed
    success?: boolean;
  };
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface SamplingConfig {
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
}

export interface CompletionRequest {
  model: string;
  messages: ConversationMessage[];
  tools: ToolDefinition[];
  sampling: SamplingConfig;
}

export type ModelEvent =
  | { type: 'delta'; text: string }
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'done'; usage?: TokenUsage }
  | { type: 'error'; message: string };

/** Lazy, finite and non-restartable stream of response events for one request. */
export interface ModelClient {
  stream: (request: CompletionRequest, signal: AbortSignal) => AsyncIterable<ModelEvent>;
}

export interface TodoItem {
  content: string;
  status: string;
}

export type ToolEvent =
  | { type: 'started'; id: string; name: string }
  | { type: 'output'; id: string; chunk: string }
  | { type: 'completed'; id: string; name: string; output: string; success: boolean; durationMs: number }
  | { type: 'failed'; id: string; name: string; error: string; durationMs: number }
  | { type: 'todo_updated'; id: string; sessionId: string; todos: TodoItem[] }
  | { type: 'artifact_generated'; id: string; name: string; path: string; location: string }
  | { type: 'artifact_generation_failed'; id: string; error: string };

export type TerminalToolEvent = Extract<ToolEvent, { type: 'completed' | 'failed' }>;

export const isTerminalToolEvent = (event: ToolEvent): event is TerminalToolEvent =>
  event.type === 'completed' || event.type === 'failed';

export interface PendingToolResult {
  callId: string;
  toolName: string;
  output: string;
  success: boolean;
}

export interface PendingApproval {
  callId: string;
  toolName: string;
  parameters: Record<string, unknown>;
  command: string[];
}

export type TurnPhase =
  | 'idle'
  | 'streaming'
  | 'awaiting_approval'
  | 'executing_tools'
  | 'complete'
  | 'cancelled'
  | 'failed';

export type SessionEvent =
  | { type: 'turn_started'; turnId: string }
  | { type: 'assistant_delta'; turnId: string; text: string }
  | { type: 'assistant_message'; turnId: string; content: string }
  | { type: 'token_count'; turnId: string; tokens: number }
  | { type: 'approval_request'; callId: string; turnId: string; command: string[]; cwd: string }
  | { type: 'tool_event'; turnId: string; event: ToolEvent }
  | { type: 'tool_result'; turnId: string; result: PendingToolResult }
  | { type: 'turn_complete'; turnId: string; lastAssistantMessage?: string }
  | { type: 'turn_error'; turnId: string; message: string }
  | { type: 'turn_cancelled'; turnId: string };

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN';
  turn: number;                         // Iteration counter within the turn
  subturn: number;                      // Dispatch index within the iteration
  direction: 'request' | 'response';
  type: 'llm' | 'tool';
  remoteIdentifier: string;             // model id or tool name
  fatal: boolean;                       // True if this ended the turn
  message: string;
  turnId?: string;
  callId?: string;
  details?: Record<string, string | number | boolean>;
}

export interface SessionObserver {
  onEvent?: (event: SessionEvent) => void;
  onLog?: (entry: LogEntry) => void;
}
