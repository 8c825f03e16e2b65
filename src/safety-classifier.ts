import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { ApprovalPolicy } from './config.js';

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SafetyAssessment {
  risk: RiskLevel;
  reasons: string[];
}

export interface SafetyClassifier {
  analyze: (command: readonly string[], cwd: string) => SafetyAssessment;
}

const RISK_ORDER: Record<RiskLevel, number> = { low: 0, medium: 1, high: 2, critical: 3 };

export const maxRisk = (a: RiskLevel, b: RiskLevel): RiskLevel => (RISK_ORDER[a] >= RISK_ORDER[b] ? a : b);

/**
 * never: nothing is gated.
 * untrusted: everything above low.
 * on-request: high and critical.
 * on-failure: only critical; the rest runs and failures go back to the model.
 */
export function requiresApproval(assessment: SafetyAssessment, policy: ApprovalPolicy): boolean {
  switch (policy) {
    case 'never':
      return false;
    case 'untrusted':
      return RISK_ORDER[assessment.risk] > RISK_ORDER.low;
    case 'on-request':
      return RISK_ORDER[assessment.risk] >= RISK_ORDER.high;
    case 'on-failure':
      return assessment.risk === 'critical';
  }
}

const SubcommandRulesSchema = z.object({
  low: z.array(z.string()).default([]),
  high: z.array(z.string()).default([]),
});

const CommandRiskRulesSchema = z.object({
  shells: z.array(z.string()),
  programs: z.object({
    low: z.array(z.string()),
    high: z.array(z.string()),
    critical: z.array(z.string()),
  }),
  subcommands: z.record(z.string(), SubcommandRulesSchema).default({}),
  criticalPatterns: z.array(z.string()).default([]),
  shellOperators: z.string(),
});

export type CommandRiskRules = z.infer<typeof CommandRiskRulesSchema>;

const DEFAULT_RULES_URL = new URL('../data/command-risk.json', import.meta.url);

export function loadCommandRiskRules(file: string | URL = DEFAULT_RULES_URL): CommandRiskRules {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  const parsed = CommandRiskRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid command risk rules in ${String(file)}:\n${msgs}`);
  }
  return parsed.data;
}

/**
 * Rule-based classifier over program names. Shell wrappers (`bash -lc "..."`)
 * are unwrapped once; scripts using pipes, redirection or substitution are at
 * least medium. Unknown programs are medium.
 */
export class RuleSafetyClassifier implements SafetyClassifier {
  private readonly low: Set<string>;
  private readonly high: Set<string>;
  private readonly critical: Set<string>;
  private readonly shells: Set<string>;
  private readonly patterns: RegExp[];
  private readonly operators: RegExp;

  constructor(private readonly rules: CommandRiskRules = loadCommandRiskRules()) {
    this.low = new Set(rules.programs.low);
    this.high = new Set(rules.programs.high);
    this.critical = new Set(rules.programs.critical);
    this.shells = new Set(rules.shells);
    this.patterns = rules.criticalPatterns.map((p) => new RegExp(p));
    this.operators = new RegExp(rules.shellOperators);
  }

  analyze(command: readonly string[], cwd: string): SafetyAssessment {
    if (command.length === 0) return { risk: 'medium', reasons: ['empty command'] };
    const joined = command.join(' ');
    const pattern = this.patterns.find((p) => p.test(joined));
    if (pattern !== undefined) {
      return { risk: 'critical', reasons: [`matches dangerous pattern ${pattern.source}`] };
    }

    const program = path.basename(command[0]);
    const script = command[2];
    if (this.shells.has(program) && command.length >= 3 && /^-[a-z]*c$/.test(command[1]) && typeof script === 'string') {
      const inner = this.classifyTokens(script.trim().split(/\s+/), cwd);
      if (this.operators.test(script)) {
        return { risk: maxRisk(inner.risk, 'medium'), reasons: [...inner.reasons, 'shell script uses operators'] };
      }
      return inner;
    }
    return this.classifyTokens(command, cwd);
  }

  private classifyTokens(tokens: readonly string[], cwd: string): SafetyAssessment {
    const program = path.basename(tokens[0] ?? '');
    if (program.length === 0) return { risk: 'medium', reasons: ['empty command'] };
    if (this.critical.has(program)) return { risk: 'critical', reasons: [`${program} is a privileged or destructive program`] };
    if (this.high.has(program)) return { risk: 'high', reasons: [`${program} modifies files, processes or the network`] };

    const args = tokens.slice(1);
    const subRules = Object.prototype.hasOwnProperty.call(this.rules.subcommands, program)
      ? this.rules.subcommands[program]
      : undefined;
    let base: SafetyAssessment;
    if (subRules !== undefined) {
      const sub = args.find((arg) => !arg.startsWith('-')) ?? '';
      if (subRules.high.includes(sub)) base = { risk: 'high', reasons: [`${program} ${sub} changes repository or package state`] };
      else if (subRules.low.includes(sub)) base = { risk: 'low', reasons: [`${program} ${sub} is read-only`] };
      else base = { risk: 'medium', reasons: [`${program} ${sub} is not classified`] };
    } else if (this.low.has(program)) {
      base = { risk: 'low', reasons: [`${program} is read-only`] };
    } else {
      base = { risk: 'medium', reasons: [`${program} is not classified`] };
    }

    if (base.risk === 'low') {
      const outside = args.find((arg) => path.isAbsolute(arg) && !isInside(cwd, arg));
      if (outside !== undefined) {
        return { risk: 'medium', reasons: [...base.reasons, `touches ${outside} outside the working directory`] };
      }
    }
    return base;
  }
}

function isInside(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
