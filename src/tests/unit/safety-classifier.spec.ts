import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadCommandRiskRules, maxRisk, requiresApproval, RuleSafetyClassifier } from '../../safety-classifier.js';

const classifier = new RuleSafetyClassifier();
const analyze = (command: string[]) => classifier.analyze(command, '/work');

describe('RuleSafetyClassifier', () => {
  it('treats read-only programs as low', () => {
    expect(analyze(['ls'])).toEqual({ risk: 'low', reasons: ['ls is read-only'] });
  });

  it('raises read-only programs that reach outside the working directory', () => {
    expect(analyze(['cat', '/etc/passwd'])).toEqual({
      risk: 'medium',
      reasons: ['cat is read-only', 'touches /etc/passwd outside the working directory'],
    });
    expect(analyze(['cat', '/work/src/index.ts']).risk).toBe('low');
  });

  it('separates destructive programs from dangerous patterns', () => {
    expect(analyze(['rm', '-rf', 'build'])).toEqual({ risk: 'high', reasons: ['rm modifies files, processes or the network'] });
    expect(analyze(['rm', '-rf', '/']).risk).toBe('critical');
    expect(analyze(['sudo', 'ls']).risk).toBe('critical');
  });

  it('classifies git by subcommand', () => {
    expect(analyze(['git', 'status'])).toEqual({ risk: 'low', reasons: ['git status is read-only'] });
    expect(analyze(['git', 'push', 'origin', 'main']).risk).toBe('high');
    expect(analyze(['git', 'stash'])).toEqual({ risk: 'medium', reasons: ['git stash is not classified'] });
  });

  it('unwraps shell scripts and flags operators', () => {
    expect(analyze(['bash', '-lc', 'ls -la | wc -l'])).toEqual({
      risk: 'medium',
      reasons: ['ls is read-only', 'shell script uses operators'],
    });
    expect(analyze(['sh', '-c', 'pwd'])).toEqual({ risk: 'low', reasons: ['pwd is read-only'] });
  });

  it('treats unknown and empty commands as medium', () => {
    expect(analyze(['frobnicate'])).toEqual({ risk: 'medium', reasons: ['frobnicate is not classified'] });
    expect(analyze([])).toEqual({ risk: 'medium', reasons: ['empty command'] });
  });
});

describe('requiresApproval', () => {
  const at = (risk: 'low' | 'medium' | 'high' | 'critical') => ({ risk, reasons: [] });

  it('maps each policy to a risk threshold', () => {
    expect(requiresApproval(at('critical'), 'never')).toBe(false);
    expect(requiresApproval(at('low'), 'untrusted')).toBe(false);
    expect(requiresApproval(at('medium'), 'untrusted')).toBe(true);
    expect(requiresApproval(at('medium'), 'on-request')).toBe(false);
    expect(requiresApproval(at('high'), 'on-request')).toBe(true);
    expect(requiresApproval(at('high'), 'on-failure')).toBe(false);
    expect(requiresApproval(at('critical'), 'on-failure')).toBe(true);
  });

  it('orders risks', () => {
    expect(maxRisk('low', 'high')).toBe('high');
    expect(maxRisk('critical', 'medium')).toBe('critical');
  });
});

describe('loadCommandRiskRules', () => {
  it('rejects a malformed rules file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'risk-rules-'));
    const file = path.join(dir, 'rules.json');
    fs.writeFileSync(file, JSON.stringify({ shells: [] }));
    try {
      expect(() => loadCommandRiskRules(file)).toThrow(`Invalid command risk rules in ${file}:\n  programs: Required\n  shellOperators: Required`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
