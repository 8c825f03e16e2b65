import { createOpenAI } from '@ai-sdk/openai';
import { jsonSchema } from '@ai-sdk/provider-utils';
import { streamText, tool } from 'ai';

import type { CompletionRequest, ConversationMessage, ModelClient, ModelEvent, ToolCall, ToolDefinition } from '../types.js';
import type { AssistantContent, LanguageModel, ModelMessage, ToolSet } from 'ai';

import { errorMessage, parseJsonRecord } from '../utils.js';

type AssistantPart = Exclude<AssistantContent, string>[number];

/**
 * Converts history to ai-sdk messages. A tool call whose result is not in
 * the history yet (a cancelled turn) is left out, since providers reject an
 * assistant tool call without a matching result.
 */
export function toModelMessages(messages: readonly ConversationMessage[], systemPrompt?: string): ModelMessage[] {
  const callIdToName = new Map<string, string>();
  const answered = new Set<string>();
  // eslint-disable-next-line functional/no-loop-statements
  for (const msg of messages) {
    if (msg.role === 'assistant') {
      (msg.toolCalls ?? []).forEach((tc) => callIdToName.set(tc.id, tc.name));
    }
    if (msg.role === 'tool' && msg.toolCallId !== undefined) answered.add(msg.toolCallId);
  }

  const modelMessages: ModelMessage[] = [];
  if (systemPrompt !== undefined && systemPrompt.length > 0) {
    modelMessages.push({ role: 'system', content: systemPrompt });
  }
  // eslint-disable-next-line functional/no-loop-statements
  for (const m of messages) {
    switch (m.role) {
      case 'system':
        modelMessages.push({ role: 'system', content: m.content });
        break;
      case 'user':
        modelMessages.push({ role: 'user', content: m.content });
        break;
      case 'assistant': {
        const parts: AssistantPart[] = [];
        if (m.content.trim().length > 0) parts.push({ type: 'text', text: m.content });
        (m.toolCalls ?? [])
          .filter((tc) => answered.has(tc.id))
          .forEach((tc) => {
            parts.push({ type: 'tool-call', toolCallId: tc.id, toolName: tc.name, input: tc.parameters });
          });
        modelMessages.push({ role: 'assistant', content: parts.length > 0 ? parts : '' });
        break;
      }
      case 'tool': {
        const toolCallId = m.toolCallId;
        if (toolCallId === undefined) break;
        const toolName = callIdToName.get(toolCallId);
        // Result of a call no assistant message announced
        if (toolName === undefined) break;
        const failed = m.metadata?.success === false;
        modelMessages.push({
          role: 'tool',
          content: [{
            type: 'tool-result',
            toolCallId,
            toolName,
            output: failed ? { type: 'error-text', value: m.content } : { type: 'text', value: m.content },
          }],
        });
        break;
      }
    }
  }
  return modelMessages;
}

// Definitions only; tools are executed by the engine, never by the SDK
export function toToolSet(definitions: readonly ToolDefinition[]): ToolSet {
  return Object.fromEntries(definitions.map((def) => [
    def.name,
    tool({ description: def.description, inputSchema: jsonSchema(def.inputSchema) }),
  ]));
}

export interface AiSdkModelClientOptions {
  systemPrompt?: string;
}

/** Model client over `streamText(...).fullStream`. */
export class AiSdkModelClient implements ModelClient {
  constructor(
    private readonly languageModel: LanguageModel,
    private readonly options: AiSdkModelClientOptions = {},
  ) {}

  async *stream(request: CompletionRequest, signal: AbortSignal): AsyncIterable<ModelEvent> {
    let streamError: unknown;
    try {
      const result = streamText({
        model: this.languageModel,
        messages: toModelMessages(request.messages, this.options.systemPrompt),
        ...(request.tools.length > 0 ? { tools: toToolSet(request.tools) } : {}),
        ...(request.sampling.temperature !== undefined ? { temperature: request.sampling.temperature } : {}),
        ...(request.sampling.topP !== undefined ? { topP: request.sampling.topP } : {}),
        ...(request.sampling.maxOutputTokens !== undefined ? { maxOutputTokens: request.sampling.maxOutputTokens } : {}),
        abortSignal: signal,
        onError: ({ error }) => {
          streamError = error;
        },
      });
      // eslint-disable-next-line functional/no-loop-statements
      for await (const part of result.fullStream) {
        switch (part.type) {
          case 'text-delta':
            if (part.text.length > 0) yield { type: 'delta', text: part.text };
            break;
          case 'tool-call':
            yield { type: 'tool_call', call: toToolCall(part.toolCallId, part.toolName, part.input) };
            break;
          case 'error':
            yield { type: 'error', message: errorMessage(part.error) };
            return;
          case 'finish': {
            const usage = part.totalUsage;
            const inputTokens = usage.inputTokens ?? 0;
            const outputTokens = usage.outputTokens ?? 0;
            yield { type: 'done', usage: { inputTokens, outputTokens, totalTokens: usage.totalTokens ?? inputTokens + outputTokens } };
            return;
          }
          default:
            break;
        }
      }
      if (streamError !== undefined) yield { type: 'error', message: errorMessage(streamError) };
    } catch (error) {
      yield { type: 'error', message: errorMessage(streamError ?? error) };
    }
  }
}

// Some providers hand back the raw argument string; repair it before giving up
function toToolCall(id: string, name: string, input: unknown): ToolCall {
  return { id, name, parameters: parseJsonRecord(input) ?? {} };
}

export interface OpenAIModelOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
}

export function createOpenAIModel(options: OpenAIModelOptions): LanguageModel {
  const provider = createOpenAI({
    ...(options.apiKey !== undefined ? { apiKey: options.apiKey } : {}),
    ...(options.baseUrl !== undefined ? { baseURL: options.baseUrl } : {}),
  });
  return provider.chat(options.model);
}
