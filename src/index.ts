// Main library exports for programmatic use
export { AgentSession } from './agent-session.js';
export type { AgentSessionOptions, ApprovalDecision } from './agent-session.js';

export {
  DEFAULT_BATCH_MAX_CALLS,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_SENTINEL_TICK_MS,
  DEFAULT_SUBAGENT_MAX_ITERATIONS,
  DEFAULT_SUBAGENT_TOOL_OUTPUT_MAX_BYTES,
  EngineConfigSchema,
  loadConfiguration,
  parseConfiguration,
  resolveEngineConfig,
} from './config.js';
export type { ApprovalPolicy, EngineConfig, EngineConfigInput, LoggingConfig } from './config.js';

export { loadCommandRiskRules, requiresApproval, RuleSafetyClassifier } from './safety-classifier.js';
export type { CommandRiskRules, RiskLevel, SafetyAssessment, SafetyClassifier } from './safety-classifier.js';

export { resolveTokenizer, TokenizerCounter } from './tokenizer-registry.js';
export type { TokenCounter, TokenCountInput, Tokenizer } from './tokenizer-registry.js';

export { createTranscriptStore, JsonlTranscriptStore, MemoryTranscriptStore } from './transcript-store.js';
export type { TranscriptRecord, TranscriptStore } from './transcript-store.js';

export { createLogCallbacks, createStructuredLogger, StructuredLogger } from './logging/structured-logger.js';
export type { LogFormat, StructuredLoggerOptions } from './logging/structured-logger.js';
export { formatLogfmt } from './logging/logfmt.js';
export { setWarningSink } from './utils.js';

export { isToolExecutionError, ToolExecutionError } from './tools/tool-errors.js';
export type { ToolErrorKind } from './tools/tool-errors.js';
export type { ToolArtifact, ToolExecutionContext, ToolExecutor, ToolOutcome } from './tools/types.js';

export { AiSdkModelClient, createOpenAIModel, toModelMessages, toToolSet } from './llm-providers/ai-sdk-client.js';
export type { AiSdkModelClientOptions, OpenAIModelOptions } from './llm-providers/ai-sdk-client.js';

export type {
  CompletionRequest,
  ConversationMessage,
  LogEntry,
  ModelClient,
  ModelEvent,
  PendingApproval,
  PendingToolResult,
  SamplingConfig,
  SessionEvent,
  SessionObserver,
  TodoItem,
  TokenUsage,
  ToolCall,
  ToolDefinition,
  ToolEvent,
  TurnPhase,
} from './types.js';
