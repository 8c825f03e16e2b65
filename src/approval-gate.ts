import type { ApprovalPolicy } from './config.js';
import type { SafetyAssessment, SafetyClassifier } from './safety-classifier.js';
import type { PendingApproval, ToolCall } from './types.js';

import { requiresApproval } from './safety-classifier.js';

export type GateDecision =
  | { kind: 'cleared'; assessment?: SafetyAssessment }
  | { kind: 'deferred'; approval: PendingApproval; assessment: SafetyAssessment };

export interface ApprovalGateOptions {
  policy: ApprovalPolicy;
  executionTools: readonly string[];
  cwd: string;
  classifier: SafetyClassifier;
}

/**
 * Extracts the concrete command of an execution-class call.
 * Arrays are taken as argv; a plain string runs through `sh -c`.
 */
export function extractCommand(parameters: Record<string, unknown>): string[] | undefined {
  const raw = parameters.command;
  if (Array.isArray(raw)) {
    const argv = raw.filter((part): part is string => typeof part === 'string');
    return argv.length > 0 ? argv : undefined;
  }
  if (typeof raw === 'string' && raw.trim().length > 0) {
    return ['sh', '-c', raw];
  }
  return undefined;
}

/**
 * Decides whether a tool call may run now. Deferred calls are parked here,
 * keyed by call id, until they are resolved or the turn is cancelled.
 */
export class ApprovalGate {
  private readonly executionTools: Set<string>;
  private readonly pending = new Map<string, PendingApproval>();

  constructor(private readonly options: ApprovalGateOptions) {
    this.executionTools = new Set(options.executionTools.map((name) => name.toLowerCase()));
  }

  public isExecutionTool(name: string): boolean {
    return this.executionTools.has(name.toLowerCase());
  }

  public evaluate(call: ToolCall): GateDecision {
    if (!this.isExecutionTool(call.name)) return { kind: 'cleared' };
    const command = extractCommand(call.parameters);
    // Nothing to classify; the executor reports the missing command
    if (command === undefined) return { kind: 'cleared' };
    const assessment = this.options.classifier.analyze(command, this.options.cwd);
    if (!requiresApproval(assessment, this.options.policy)) return { kind: 'cleared', assessment };
    const approval: PendingApproval = {
      callId: call.id,
      toolName: call.name,
      parameters: call.parameters,
      command,
    };
    this.pending.set(call.id, approval);
    return { kind: 'deferred', approval, assessment };
  }

  public get cwd(): string {
    return this.options.cwd;
  }

  public take(callId: string): PendingApproval | undefined {
    const approval = this.pending.get(callId);
    if (approval !== undefined) this.pending.delete(callId);
    return approval;
  }

  public list(): PendingApproval[] {
    return Array.from(this.pending.values());
  }

  public clear(): void {
    this.pending.clear();
  }
}
