import type { ModelEvent, TokenUsage, ToolCall } from './types.js';

import { errorMessage, warn } from './utils.js';

export type StreamOutcome =
  | { kind: 'done'; text: string; toolCalls: ToolCall[]; usage?: TokenUsage }
  | { kind: 'error'; text: string; message: string }
  | { kind: 'cancelled'; text: string };

type NextStep =
  | { kind: 'next'; result: IteratorResult<ModelEvent> }
  | { kind: 'thrown'; error: unknown }
  | { kind: 'aborted' };

/**
 * Drains one model response. Cancellation is checked before each element and
 * also ends a read that is blocked on the model; the iterator is then closed.
 * A stream that ends without `done` counts as done.
 */
export async function consumeModelStream(
  stream: AsyncIterable<ModelEvent>,
  signal: AbortSignal,
  onDelta?: (text: string) => void,
): Promise<StreamOutcome> {
  const iterator = stream[Symbol.asyncIterator]();
  let resolveAborted: (step: NextStep) => void = () => undefined;
  const aborted = new Promise<NextStep>((resolve) => {
    resolveAborted = resolve;
  });
  const onAbort = (): void => {
    resolveAborted({ kind: 'aborted' });
  };
  signal.addEventListener('abort', onAbort, { once: true });
  try {
    return await drain(iterator, signal, aborted, onDelta);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

async function drain(
  iterator: AsyncIterator<ModelEvent>,
  signal: AbortSignal,
  aborted: Promise<NextStep>,
  onDelta?: (text: string) => void,
): Promise<StreamOutcome> {
  let text = '';
  const toolCalls: ToolCall[] = [];

  // eslint-disable-next-line functional/no-loop-statements
  while (true) {
    if (signal.aborted) {
      closeIterator(iterator);
      return { kind: 'cancelled', text };
    }
    const step = await Promise.race([
      iterator.next().then(
        (result): NextStep => ({ kind: 'next', result }),
        (error: unknown): NextStep => ({ kind: 'thrown', error }),
      ),
      aborted,
    ]);
    if (step.kind === 'aborted') {
      closeIterator(iterator);
      return { kind: 'cancelled', text };
    }
    if (step.kind === 'thrown') {
      return { kind: 'error', text, message: errorMessage(step.error) };
    }
    if (step.result.done === true) {
      return { kind: 'done', text, toolCalls };
    }
    const event = step.result.value;
    switch (event.type) {
      case 'delta':
        if (event.text.length === 0) break;
        text += event.text;
        onDelta?.(event.text);
        break;
      case 'tool_call':
        toolCalls.push(event.call);
        break;
      case 'done':
        closeIterator(iterator);
        return { kind: 'done', text, toolCalls, usage: event.usage };
      case 'error':
        closeIterator(iterator);
        return { kind: 'error', text, message: event.message };
    }
  }
}

function closeIterator(iterator: AsyncIterator<ModelEvent>): void {
  const closing = iterator.return?.();
  if (closing === undefined) return;
  closing.then(undefined, (error: unknown) => {
    warn(`closing model stream failed: ${errorMessage(error)}`);
  });
}
