import { describe, expect, it, vi } from 'vitest';

import type { EngineConfigInput } from '../../config.js';
import type { ModelClient, ToolEvent } from '../../types.js';

import { resolveEngineConfig } from '../../config.js';
import { EventChannel } from '../../event-channel.js';
import { DELEGATION_PROMPT_REQUIRED_MESSAGE } from '../../llm-messages.js';
import { RunningTaskTable } from '../../running-tasks.js';
import { SubagentRegistry } from '../../subagent-registry.js';
import { SubagentRunner } from '../../subagent-runner.js';
import { routeTool, TaskSupervisor } from '../../task-supervisor.js';
import { ToolQueue } from '../../tools/queue-manager.js';
import { ToolCatalog } from '../../tools/tool-catalog.js';
import { ToolExecutionError } from '../../tools/tool-errors.js';
import { createDeferred, ok, ProgrammableExecutor, ScriptedModelClient, textResponse } from '../fixtures/engine-doubles.js';

interface SetupOptions {
  executor: ProgrammableExecutor;
  model?: ModelClient;
  config?: EngineConfigInput;
}

function setup(options: SetupOptions) {
  const config = resolveEngineConfig({ cwd: '/work', ...options.config });
  const channel = new EventChannel<ToolEvent>();
  const running = new RunningTaskTable();
  const subagents = new SubagentRegistry();
  const log = vi.fn();
  const catalog = new ToolCatalog(options.executor, config.tools, config.limits.batchMaxCalls);
  const supervisor = new TaskSupervisor({
    executor: options.executor,
    channel,
    running,
    subagents,
    subagentRunner: new SubagentRunner({ config, model: options.model ?? new ScriptedModelClient([]), executor: options.executor, catalog }),
    queue: new ToolQueue(config.limits.maxConcurrentTools),
    names: config.tools,
    batchMaxCalls: config.limits.batchMaxCalls,
    cwd: config.cwd,
    log,
  });
  return { channel, running, subagents, log, supervisor };
}

async function drain(channel: EventChannel<ToolEvent>): Promise<ToolEvent[]> {
  const events: ToolEvent[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  while (channel.size > 0) {
    const next = await channel.receive();
    if (next.kind === 'item') events.push(next.item);
  }
  return events;
}

describe('routeTool', () => {
  it('routes by configured name', () => {
    const names = { batchToolName: 'batch', delegationToolName: 'task', todoToolName: 'todo_write' };
    expect(routeTool('task', names)).toEqual({ kind: 'delegation' });
    expect(routeTool('batch', names)).toEqual({ kind: 'batch' });
    expect(routeTool('read', names)).toEqual({ kind: 'standard' });
  });
});

describe('TaskSupervisor', () => {
  it('streams output and ends with the completed event', async () => {
    const executor = new ProgrammableExecutor().on('read', async (_params, ctx) => {
      ctx.onOutput('partial');
      return ok('contents');
    });
    const { channel, running, supervisor } = setup({ executor });

    supervisor.spawn('c1', 'read', { path: 'a.txt' });
    expect(running.ids()).toEqual(['c1']);
    expect(await running.get('c1')?.join()).toBe('completed');

    expect(await drain(channel)).toEqual([
      { type: 'started', id: 'c1', name: 'read' },
      { type: 'output', id: 'c1', chunk: 'partial' },
      { type: 'completed', id: 'c1', name: 'read', output: 'contents', success: true, durationMs: expect.any(Number) },
    ]);
    expect(executor.calls).toEqual([{ name: 'read', parameters: { path: 'a.txt' }, callId: 'c1' }]);
    // Removal is left to whoever processes the terminal event
    expect(running.has('c1')).toBe(true);
  });

  it('turns executor errors into a failed event and a warning', async () => {
    const executor = new ProgrammableExecutor().on('write', () => Promise.reject(new Error('disk full')));
    const { channel, running, log, supervisor } = setup({ executor });

    supervisor.spawn('c2', 'write', {});
    expect(await running.get('c2')?.join()).toBe('completed');

    const events = await drain(channel);
    expect(events[1]).toEqual({ type: 'failed', id: 'c2', name: 'write', error: 'disk full', durationMs: expect.any(Number) });
    expect(log).toHaveBeenCalledWith('WRN', 'tool', 'write', 'tool failed (execution_error): disk full', { callId: 'c2' });
  });

  it('runs batch entries under derived call ids', async () => {
    const executor = new ProgrammableExecutor()
      .on('read', async () => ok('a'))
      .on('write', async () => ok('b'));
    const { channel, running, supervisor } = setup({ executor });

    supervisor.spawn('b1', 'batch', { tool_calls: [{ tool: 'read' }, { tool: 'write', parameters: { path: 'x' } }] });
    await running.get('b1')?.join();

    expect(executor.calls.map((c) => c.callId).sort()).toEqual(['b1#0', 'b1#1']);
    const events = await drain(channel);
    expect(events).toHaveLength(2);
    expect(events[1]).toMatchObject({ type: 'completed', id: 'b1', success: true });
    expect(events[1].type === 'completed' ? events[1].output : '').toMatch(/^Batch execution completed: 2\/2 successful\n/);
  });

  it('fails an oversized batch without executing anything', async () => {
    const executor = new ProgrammableExecutor().on('read', async () => ok('a'));
    const { channel, running, supervisor } = setup({ executor, config: { limits: { batchMaxCalls: 2 } } });

    supervisor.spawn('b1', 'batch', { tool_calls: [{ tool: 'read' }, { tool: 'read' }, { tool: 'read' }] });
    await running.get('b1')?.join();

    expect(executor.calls).toEqual([]);
    expect((await drain(channel))[1]).toMatchObject({ type: 'failed', error: 'Batch tool allows max 2 tools, got 3.' });
  });

  it('tracks delegation in the subagent registry', async () => {
    const executor = new ProgrammableExecutor();
    const model = new ScriptedModelClient([textResponse('summary done')]);
    const { channel, running, subagents, log, supervisor } = setup({ executor, model });

    supervisor.spawn('t1', 'task', { prompt: 'summarize the repo' });
    expect(running.isEmpty).toBe(true);
    expect(subagents.has('t1')).toBe(true);
    expect(await subagents.list()[0].join()).toBe('completed');

    expect((await drain(channel))[1]).toMatchObject({ type: 'completed', id: 't1', output: 'summary done', success: true });
    expect(log).toHaveBeenCalledWith('VRB', 'tool', 'task', 'delegating to code subagent: code', { callId: 't1', direction: 'request' });
  });

  it('fails delegation without instructions', async () => {
    const { channel, subagents, supervisor } = setup({ executor: new ProgrammableExecutor() });

    supervisor.spawn('t1', 'task', { description: 'no prompt' });
    await subagents.list()[0].join();

    expect((await drain(channel))[1]).toMatchObject({ type: 'failed', id: 't1', error: DELEGATION_PROMPT_REQUIRED_MESSAGE });
  });

  it('reports a rejected call through the event path', async () => {
    const { channel, running, log, supervisor } = setup({ executor: new ProgrammableExecutor() });

    supervisor.reject('c3', 'shell', new ToolExecutionError('not_permitted', 'Command denied by user'));
    await running.get('c3')?.join();

    expect(await drain(channel)).toEqual([
      { type: 'started', id: 'c3', name: 'shell' },
      { type: 'failed', id: 'c3', name: 'shell', error: 'Command denied by user', durationMs: 0 },
    ]);
    expect(log).toHaveBeenCalledWith('WRN', 'tool', 'shell', 'tool rejected (not_permitted): Command denied by user', { callId: 'c3' });
  });

  it('limits concurrent executor calls when configured', async () => {
    const first = createDeferred();
    const executor = new ProgrammableExecutor()
      .on('slow', async () => {
        await first.promise;
        return ok('slow');
      })
      .on('fast', async () => ok('fast'));
    const { running, supervisor } = setup({ executor, config: { limits: { maxConcurrentTools: 1 } } });

    supervisor.spawn('c1', 'slow', {});
    supervisor.spawn('c2', 'fast', {});
    await vi.waitFor(() => {
      expect(executor.calls.map((c) => c.name)).toEqual(['slow']);
    });
    first.resolve();
    await running.get('c2')?.join();
    expect(executor.calls.map((c) => c.name)).toEqual(['slow', 'fast']);
  });

  it('aborts running tasks without a terminal event', async () => {
    const executor = new ProgrammableExecutor().on('hang', (_params, ctx) => new Promise((_resolve, reject) => {
      ctx.signal.addEventListener('abort', () => {
        reject(new Error('aborted'));
      }, { once: true });
    }));
    const { channel, running, supervisor } = setup({ executor });

    supervisor.spawn('c1', 'hang', {});
    await vi.waitFor(() => {
      expect(executor.calls).toHaveLength(1);
    });
    supervisor.abortAll();

    expect(await running.get('c1')?.join()).toBe('cancelled');
    expect(await drain(channel)).toEqual([{ type: 'started', id: 'c1', name: 'hang' }]);
  });
});
