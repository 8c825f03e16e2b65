import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { z } from 'zod';

export const DEFAULT_MAX_ITERATIONS = 200;
export const DEFAULT_BATCH_MAX_CALLS = 10;
export const DEFAULT_SUBAGENT_MAX_ITERATIONS = 500;
export const DEFAULT_SUBAGENT_TOOL_OUTPUT_MAX_BYTES = 32000;
export const DEFAULT_SENTINEL_TICK_MS = 250;

const CONFIG_FILE_NAME = '.turn-engine.json';

const ApprovalPolicySchema = z.enum(['untrusted', 'on-failure', 'on-request', 'never']);

const SamplingSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

const LimitsSchema = z.object({
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  batchMaxCalls: z.number().int().positive().default(DEFAULT_BATCH_MAX_CALLS),
  maxConcurrentTools: z.number().int().positive().optional(),
  subagentMaxIterations: z.number().int().positive().default(DEFAULT_SUBAGENT_MAX_ITERATIONS),
  subagentToolOutputMaxBytes: z.number().int().positive().default(DEFAULT_SUBAGENT_TOOL_OUTPUT_MAX_BYTES),
});

const ApprovalSchema = z.object({
  policy: ApprovalPolicySchema.default('on-request'),
  executionTools: z.array(z.string().min(1)).default(['execute', 'shell']),
});

const ToolNamesSchema = z.object({
  batchToolName: z.string().min(1).default('batch'),
  delegationToolName: z.string().min(1).default('task'),
  todoToolName: z.string().min(1).default('todo_write'),
});

const SentinelSchema = z.object({
  tickMs: z.number().int().positive().default(DEFAULT_SENTINEL_TICK_MS),
});

const LoggingSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console', 'none']).default('logfmt'),
  verbose: z.boolean().default(false),
  color: z.boolean().default(false),
});

export const EngineConfigSchema = z.object({
  model: z.string().min(1).default('gpt-4o-mini'),
  systemPrompt: z.string().optional(),
  cwd: z.string().min(1).default(() => process.cwd()),
  sampling: SamplingSchema.default({}),
  limits: LimitsSchema.default({}),
  approval: ApprovalSchema.default({}),
  tools: ToolNamesSchema.default({}),
  sentinel: SentinelSchema.default({}),
  tokenizer: z.string().optional(),
  transcriptFile: z.string().optional(),
  logging: LoggingSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ApprovalPolicy = z.infer<typeof ApprovalPolicySchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;

function expandEnv(str: string): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (process.env[name] ?? ''));
}

function expandDeep(obj: unknown): unknown {
  if (typeof obj === 'string') return expandEnv(obj);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v);
      return acc;
    }, {});
  }
  return obj;
}

function resolveConfigPath(configPath?: string): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(process.cwd(), CONFIG_FILE_NAME);
  if (fs.existsSync(local)) return local;
  const home = path.join(os.homedir(), CONFIG_FILE_NAME);
  if (fs.existsSync(home)) return home;
  throw new Error(`Configuration file not found. Create ${CONFIG_FILE_NAME} or pass a path`);
}

function validate(value: unknown, source: string): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(value);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

export function parseConfiguration(value: unknown): EngineConfig {
  return validate(expandDeep(value), '<inline>');
}

export function resolveEngineConfig(partial: EngineConfigInput = {}): EngineConfig {
  return validate(partial, '<inline>');
}

export function loadConfiguration(configPath?: string): EngineConfig {
  const resolved = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return validate(expandDeep(json), resolved);
}
