import { jsonrepair } from 'jsonrepair';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

const tryParseJson = (value: string): unknown => {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
};

const stripSurroundingCodeFence = (value: string): string | undefined => {
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/iu.exec(value);
  return match !== null ? match[1] : undefined;
};

export interface JsonParseDiagnostics {
  value?: unknown;
  repairs: string[];
  error?: string;
}

/**
 * Parses tool arguments as emitted by a model. Objects pass through untouched;
 * strings are parsed as JSON, then retried without a markdown fence and through jsonrepair.
 */
export const parseJsonValueDetailed = (raw: unknown): JsonParseDiagnostics => {
  if (isPlainObject(raw) || Array.isArray(raw)) {
    return { value: raw, repairs: [] };
  }
  if (typeof raw !== 'string') {
    return { repairs: [], error: 'non_string' };
  }
  const text = raw.trim();
  if (text.length === 0) {
    return { repairs: [], error: 'empty' };
  }
  const direct = tryParseJson(text);
  if (direct !== undefined) return { value: direct, repairs: [] };

  const candidates: { text: string; steps: string[] }[] = [{ text, steps: [] }];
  const unfenced = stripSurroundingCodeFence(text);
  if (unfenced !== undefined) {
    const parsed = tryParseJson(unfenced);
    if (parsed !== undefined) return { value: parsed, repairs: ['stripCodeFence'] };
    candidates.push({ text: unfenced, steps: ['stripCodeFence'] });
  }
  // eslint-disable-next-line functional/no-loop-statements
  for (const candidate of candidates) {
    try {
      const repaired = tryParseJson(jsonrepair(candidate.text));
      if (repaired !== undefined) {
        return { value: repaired, repairs: [...candidate.steps, 'jsonrepair'] };
      }
    } catch {
      // jsonrepair could not make sense of this candidate; try the next one
      continue;
    }
  }
  return { repairs: [], error: 'parse_failed' };
};

export const parseJsonRecord = (raw: unknown): Record<string, unknown> | undefined => {
  const { value } = parseJsonValueDetailed(raw);
  return isPlainObject(value) ? value : undefined;
};

let warningSink: ((message: string) => void) | undefined;

export function setWarningSink(handler?: (message: string) => void): void {
  warningSink = handler;
}

// Library-internal warnings; silent unless a sink is installed
export function warn(message: string): void {
  const sink = warningSink;
  if (sink === undefined) {
    return;
  }
  try {
    sink(message);
  } catch {
    /* a failing sink must not break the caller */
  }
}
