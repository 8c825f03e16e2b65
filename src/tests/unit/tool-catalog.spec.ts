import { describe, expect, it } from 'vitest';

import { ToolCatalog } from '../../tools/tool-catalog.js';
import { ok, ProgrammableExecutor } from '../fixtures/engine-doubles.js';

const names = { batchToolName: 'batch', delegationToolName: 'task', todoToolName: 'todo_write' };

describe('ToolCatalog', () => {
  it('adds batch and delegation for the main turn only', () => {
    const executor = new ProgrammableExecutor()
      .on('read', async () => ok(''))
      .on('task', async () => ok(''));
    const catalog = new ToolCatalog(executor, names, 4);

    expect(catalog.forSubagent().map((tool) => tool.name)).toEqual(['read']);
    const main = catalog.forTurn();
    expect(main.map((tool) => tool.name)).toEqual(['read', 'batch', 'task']);
    expect(main[1].inputSchema).toMatchObject({ properties: { tool_calls: { maxItems: 4 } } });
    expect(main[1].description).toBe('Run up to 4 independent tool calls in parallel and report a combined result.');
  });
});
