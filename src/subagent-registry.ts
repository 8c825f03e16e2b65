import Ajv from 'ajv';

import type { TaskHandle } from './running-tasks.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions } from 'ajv';

import { DELEGATION_PROMPT_REQUIRED_MESSAGE } from './llm-messages.js';
import { ToolExecutionError } from './tools/tool-errors.js';

type AjvInstance = AjvClass;
type AjvErrorObject = ErrorObject;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

export const DEFAULT_SUBAGENT_TYPE = 'code';

export interface DelegationRequest {
  prompt: string;
  description: string;
  subagentType: string;
}

const optionalText = { type: 'string' };

// Accepts both naming conventions models use for the delegation tool
const DELEGATION_SCHEMA = {
  type: 'object',
  properties: {
    prompt: optionalText,
    task: optionalText,
    description: optionalText,
    agent: optionalText,
    subagent_type: optionalText,
    context: optionalText,
  },
};

const ajv: AjvInstance = new AjvCtor({ allErrors: true, strict: false });
const validateDelegation = ajv.compile(DELEGATION_SCHEMA);

const nonEmpty = (value: unknown): string | undefined => (
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined
);

/**
 * prompt|task is required; description|agent labels the work;
 * subagent_type|agent picks the kind (default `code`); context is appended.
 */
export function parseDelegationParameters(parameters: Record<string, unknown>): DelegationRequest {
  if (!validateDelegation(parameters)) {
    const errors: AjvErrorObject[] = validateDelegation.errors ?? [];
    const errs = errors.map((error) => `${error.instancePath} ${error.message ?? ''}`.trim()).join('; ');
    throw new ToolExecutionError('invalid_parameters', `invalid_parameters: ${errs}`);
  }
  const basePrompt = nonEmpty(parameters.prompt) ?? nonEmpty(parameters.task);
  if (basePrompt === undefined) {
    throw new ToolExecutionError('invalid_parameters', DELEGATION_PROMPT_REQUIRED_MESSAGE);
  }
  const context = nonEmpty(parameters.context);
  const subagentType = nonEmpty(parameters.subagent_type) ?? nonEmpty(parameters.agent) ?? DEFAULT_SUBAGENT_TYPE;
  const description = nonEmpty(parameters.description) ?? nonEmpty(parameters.agent) ?? subagentType;
  return {
    prompt: context !== undefined ? `${basePrompt}\n\nContext: ${context}` : basePrompt,
    description,
    subagentType,
  };
}

/**
 * Delegated work in flight, keyed by the delegating call id. Tracked apart
 * from the running-task table; the continuation controller waits for both.
 */
export class SubagentRegistry {
  private readonly handles = new Map<string, TaskHandle>();

  add(handle: TaskHandle): void {
    if (this.handles.has(handle.callId)) {
      throw new Error(`duplicate subagent for call ${handle.callId}`);
    }
    this.handles.set(handle.callId, handle);
  }

  has(callId: string): boolean {
    return this.handles.has(callId);
  }

  remove(callId: string): TaskHandle | undefined {
    const handle = this.handles.get(callId);
    if (handle === undefined) return undefined;
    this.handles.delete(callId);
    handle.reported = true;
    return handle;
  }

  get isEmpty(): boolean {
    return this.handles.size === 0;
  }

  get size(): number {
    return this.handles.size;
  }

  list(): TaskHandle[] {
    return Array.from(this.handles.values());
  }

  cancelAll(): void {
    this.handles.forEach((handle) => {
      handle.cancel();
    });
  }
}
