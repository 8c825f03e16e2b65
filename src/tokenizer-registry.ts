import { encoding_for_model, get_encoding } from '@dqbd/tiktoken';

import type { ConversationMessage, ToolDefinition } from './types.js';
import type { TiktokenModel } from '@dqbd/tiktoken';

export interface Tokenizer {
  countText: (text: string) => number;
}

const APPROXIMATE_ID = 'approximate';
const MESSAGE_OVERHEAD_TOKENS = 4;
const TOOL_CALL_OVERHEAD_TOKENS = 2;

interface Encoding { encode: (input: string) => Uint32Array }

const tokenizerCache = new Map<string, Tokenizer>();

export const approximateTokenizer: Tokenizer = {
  countText: (text: string): number => {
    if (text.length === 0) return 0;
    // Rough heuristic: 4 characters ≈ 1 token, clamp to at least 1.
    return Math.max(1, Math.ceil(text.length / 4));
  },
};

const isEncoding = (value: unknown): value is Encoding => (
  value !== null
  && typeof value === 'object'
  && typeof (value as { encode?: unknown }).encode === 'function'
);

const getEncodingForModel = (model: string): Encoding | undefined => {
  try {
    const directCandidate: unknown = encoding_for_model(model as TiktokenModel);
    if (isEncoding(directCandidate)) {
      return directCandidate;
    }
  } catch {
    // unknown model name; fall back to the generic encoding
  }
  try {
    const fallbackCandidate: unknown = get_encoding('cl100k_base');
    if (isEncoding(fallbackCandidate)) {
      return fallbackCandidate;
    }
  } catch {
    // wasm unavailable; defer to approximation
  }
  return undefined;
};

function createTiktokenTokenizer(model: string): Tokenizer {
  const encoding = getEncodingForModel(model);
  if (encoding === undefined) {
    return approximateTokenizer;
  }
  return {
    countText: (text: string): number => {
      if (text.length === 0) return 0;
      return encoding.encode(text).length;
    },
  };
}

/**
 * `approximate` (default) or `tiktoken:<model>`; unknown ids approximate.
 */
export function resolveTokenizer(id?: string): Tokenizer {
  const normalized = id?.trim() ?? '';
  if (normalized.length === 0 || normalized.toLowerCase() === APPROXIMATE_ID) {
    return approximateTokenizer;
  }
  const cached = tokenizerCache.get(normalized);
  if (cached !== undefined) {
    return cached;
  }
  let tokenizer = approximateTokenizer;
  if (normalized.toLowerCase().startsWith('tiktoken:')) {
    const model = normalized.slice('tiktoken:'.length).trim();
    tokenizer = createTiktokenTokenizer(model.length > 0 ? model : 'gpt-4o');
  }
  tokenizerCache.set(normalized, tokenizer);
  return tokenizer;
}

function serializeMessage(message: ConversationMessage): string {
  const parts: string[] = [`role:${message.role}`];
  if (message.content.length > 0) {
    parts.push(message.content);
  }
  if (Array.isArray(message.toolCalls) && message.toolCalls.length > 0) {
    try {
      parts.push(JSON.stringify(message.toolCalls));
    } catch {
      parts.push('[toolCalls]');
    }
  }
  if (typeof message.toolCallId === 'string' && message.toolCallId.length > 0) {
    parts.push(`toolCallId:${message.toolCallId}`);
  }
  return parts.join('\n');
}

export function estimateMessageTokens(tokenizer: Tokenizer, message: ConversationMessage): number {
  const base = serializeMessage(message);
  const toolOverhead = Array.isArray(message.toolCalls) && message.toolCalls.length > 0
    ? TOOL_CALL_OVERHEAD_TOKENS * message.toolCalls.length
    : 0;
  return tokenizer.countText(base) + MESSAGE_OVERHEAD_TOKENS + toolOverhead;
}

export function estimateMessagesTokens(tokenizer: Tokenizer, messages: readonly ConversationMessage[]): number {
  return messages.reduce((total, message) => total + estimateMessageTokens(tokenizer, message), 0);
}

export function estimateToolsTokens(tokenizer: Tokenizer, tools: readonly ToolDefinition[]): number {
  return tools.reduce((total, tool) => total + tokenizer.countText(JSON.stringify(tool)), 0);
}

export interface TokenCountInput {
  model: string;
  messages: readonly ConversationMessage[];
  tools?: readonly ToolDefinition[];
}

export interface TokenCounter {
  count: (input: TokenCountInput) => number;
}

/** Never throws; a failing tokenizer counts as 0. */
export class TokenizerCounter implements TokenCounter {
  constructor(private readonly tokenizerId?: string) {}

  count(input: TokenCountInput): number {
    try {
      const tokenizer = resolveTokenizer(this.tokenizerId ?? `tiktoken:${input.model}`);
      return estimateMessagesTokens(tokenizer, input.messages) + estimateToolsTokens(tokenizer, input.tools ?? []);
    } catch {
      return 0;
    }
  }
}
