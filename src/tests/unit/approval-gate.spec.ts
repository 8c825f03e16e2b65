import { describe, expect, it } from 'vitest';

import type { ApprovalPolicy } from '../../config.js';
import type { RiskLevel } from '../../safety-classifier.js';

import { ApprovalGate, extractCommand } from '../../approval-gate.js';
import { call, FixedClassifier } from '../fixtures/engine-doubles.js';

const createGate = (risk: RiskLevel, policy: ApprovalPolicy = 'on-request') => {
  const classifier = new FixedClassifier(risk);
  const gate = new ApprovalGate({ policy, executionTools: ['shell', 'Execute'], cwd: '/work', classifier });
  return { gate, classifier };
};

describe('extractCommand', () => {
  it('takes arrays as argv and wraps strings in sh -c', () => {
    expect(extractCommand({ command: ['ls', '-la', 3] })).toEqual(['ls', '-la']);
    expect(extractCommand({ command: 'ls | wc -l' })).toEqual(['sh', '-c', 'ls | wc -l']);
    expect(extractCommand({ command: '  ' })).toBeUndefined();
    expect(extractCommand({})).toBeUndefined();
  });
});

describe('ApprovalGate', () => {
  it('clears non-execution tools without classifying', () => {
    const { gate, classifier } = createGate('critical');
    expect(gate.evaluate(call('c1', 'read', { path: 'a.txt' }))).toEqual({ kind: 'cleared' });
    expect(classifier.analyzed).toEqual([]);
  });

  it('matches execution tools case-insensitively', () => {
    const { gate } = createGate('low');
    expect(gate.isExecutionTool('SHELL')).toBe(true);
    expect(gate.isExecutionTool('execute')).toBe(true);
    expect(gate.isExecutionTool('read')).toBe(false);
  });

  it('clears low-risk commands with their assessment', () => {
    const { gate, classifier } = createGate('low');
    expect(gate.evaluate(call('c1', 'shell', { command: ['ls'] }))).toEqual({
      kind: 'cleared',
      assessment: { risk: 'low', reasons: ['fixed'] },
    });
    expect(classifier.analyzed).toEqual([['ls']]);
    expect(gate.list()).toEqual([]);
  });

  it('parks risky commands until taken', () => {
    const { gate } = createGate('high');
    const decision = gate.evaluate(call('c1', 'shell', { command: 'rm -rf build' }));
    expect(decision.kind).toBe('deferred');
    expect(gate.list()).toEqual([{
      callId: 'c1',
      toolName: 'shell',
      parameters: { command: 'rm -rf build' },
      command: ['sh', '-c', 'rm -rf build'],
    }]);
    expect(gate.take('c1')?.callId).toBe('c1');
    expect(gate.take('c1')).toBeUndefined();
    expect(gate.list()).toEqual([]);
  });

  it('lets the policy decide', () => {
    const { gate } = createGate('high', 'never');
    expect(gate.evaluate(call('c1', 'shell', { command: ['rm', 'x'] })).kind).toBe('cleared');
  });

  it('clears execution calls that carry no command', () => {
    const { gate, classifier } = createGate('critical');
    expect(gate.evaluate(call('c1', 'shell', {}))).toEqual({ kind: 'cleared' });
    expect(classifier.analyzed).toEqual([]);
  });

  it('drops every parked approval on clear', () => {
    const { gate } = createGate('critical');
    gate.evaluate(call('c1', 'shell', { command: ['a'] }));
    gate.evaluate(call('c2', 'shell', { command: ['b'] }));
    expect(gate.list().map((approval) => approval.callId)).toEqual(['c1', 'c2']);
    gate.clear();
    expect(gate.list()).toEqual([]);
    expect(gate.cwd).toBe('/work');
  });
});
