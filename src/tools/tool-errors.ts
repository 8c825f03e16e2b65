// unknown_tool is raised by ToolExecutor implementations for names they do not serve
export type ToolErrorKind =
  | 'unknown_tool'
  | 'not_permitted'
  | 'invalid_parameters'
  | 'limit_exceeded'
  | 'execution_error';

export class ToolExecutionError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string) {
    super(message);
    this.name = 'ToolExecutionError';
    this.kind = kind;
  }
}

export const isToolExecutionError = (value: unknown): value is ToolExecutionError =>
  value instanceof ToolExecutionError;

function describeThrown(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return 'unknown error';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return 'unserializable error';
    }
  }
  return String(value);
}

/** Wraps anything a tool task threw; values that already carry a kind pass through. */
export function toToolExecutionError(value: unknown): ToolExecutionError {
  if (isToolExecutionError(value)) return value;
  return new ToolExecutionError('execution_error', describeThrown(value));
}
