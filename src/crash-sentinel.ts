import type { EventChannel } from './event-channel.js';
import type { RunningTaskTable, TaskHandle } from './running-tasks.js';
import type { SubagentRegistry } from './subagent-registry.js';
import type { TurnContext } from './turn-state.js';
import type { ToolEvent } from './types.js';

import {
  SUBAGENT_TASK_CANCELLED_MESSAGE,
  subagentPanickedMessage,
  TOOL_TASK_CANCELLED_MESSAGE,
  toolTaskPanickedMessage,
} from './llm-messages.js';

export interface CrashSentinelDeps {
  running: RunningTaskTable;
  subagents: SubagentRegistry;
  channel: EventChannel<ToolEvent>;
  log: TurnContext['log'];
}

/**
 * Finds tasks whose handle finished without their terminal event ever being
 * processed and reports them as failed on the shared channel. A handle that
 * completed normally already has its event queued and is left alone.
 */
export class CrashSentinel {
  constructor(private readonly deps: CrashSentinelDeps) {}

  async sweep(): Promise<number> {
    const tools = this.deps.running.handles().map((handle) => ({ handle, subagent: false }));
    const delegated = this.deps.subagents.list().map((handle) => ({ handle, subagent: true }));
    let synthesized = 0;
    // eslint-disable-next-line functional/no-loop-statements
    for (const { handle, subagent } of [...tools, ...delegated]) {
      if (!handle.isFinished || handle.reported) continue;
      const status = await handle.join();
      if (status === 'completed' || handle.reported) continue;
      handle.reported = true;
      const error = this.describe(handle, subagent);
      this.deps.log('WRN', 'tool', handle.toolName, `ghost task detected (${status}): ${error}`, { callId: handle.callId });
      this.deps.channel.send({ type: 'failed', id: handle.callId, name: handle.toolName, error, durationMs: 0 });
      synthesized += 1;
    }
    return synthesized;
  }

  private describe(handle: TaskHandle, subagent: boolean): string {
    if (handle.status === 'cancelled') {
      return subagent ? SUBAGENT_TASK_CANCELLED_MESSAGE : TOOL_TASK_CANCELLED_MESSAGE;
    }
    const message = handle.panicMessage ?? 'unknown failure';
    return subagent ? subagentPanickedMessage(message) : toolTaskPanickedMessage(message);
  }
}
