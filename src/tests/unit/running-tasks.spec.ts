import { describe, expect, it } from 'vitest';

import { RunningTaskTable, TaskCancelledError, TaskHandle } from '../../running-tasks.js';
import { createDeferred } from '../fixtures/engine-doubles.js';

describe('TaskHandle', () => {
  it('is running until its body settles, then completed', async () => {
    const gate = createDeferred();
    const handle = new TaskHandle('c1', 'read', () => gate.promise);
    expect(handle.status).toBe('running');
    expect(handle.isFinished).toBe(false);
    gate.resolve();
    expect(await handle.join()).toBe('completed');
    expect(handle.isFinished).toBe(true);
  });

  it('records the message of a body that throws', async () => {
    const handle = new TaskHandle('c1', 'read', () => Promise.reject(new Error('segfault in tool')));
    expect(await handle.join()).toBe('panicked');
    expect(handle.panicMessage).toBe('segfault in tool');
  });

  it('counts a throw after cancel as cancelled', async () => {
    const handle = new TaskHandle('c1', 'read', (signal) => new Promise<void>((_resolve, reject) => {
      signal.addEventListener('abort', () => {
        reject(new Error('interrupted'));
      }, { once: true });
    }));
    handle.cancel();
    expect(await handle.join()).toBe('cancelled');
    expect(handle.panicMessage).toBeUndefined();
  });

  it('counts TaskCancelledError as cancelled', async () => {
    const handle = new TaskHandle('c1', 'read', () => Promise.reject(new TaskCancelledError()));
    expect(await handle.join()).toBe('cancelled');
  });
});

describe('RunningTaskTable', () => {
  it('rejects duplicate call ids', () => {
    const table = new RunningTaskTable();
    table.add(new TaskHandle('c1', 'read', () => Promise.resolve()));
    expect(() => {
      table.add(new TaskHandle('c1', 'read', () => Promise.resolve()));
    }).toThrow('duplicate running task for call c1');
  });

  it('removes an entry exactly once and marks it reported', () => {
    const table = new RunningTaskTable();
    const handle = new TaskHandle('c1', 'read', () => Promise.resolve());
    table.add(handle);
    expect(table.ids()).toEqual(['c1']);
    expect(table.remove('c1')).toBe(handle);
    expect(handle.reported).toBe(true);
    expect(table.remove('c1')).toBeUndefined();
    expect(table.isEmpty).toBe(true);
  });
});
