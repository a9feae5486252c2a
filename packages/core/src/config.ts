// src/config.ts
// Environment-driven configuration for the engine

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  NODEFLOW_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODEFLOW_SCRIPT_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  NODEFLOW_DEFINITIONS_PATH: z.string().min(1).default('custom_nodes.json'),
});

export interface NodeflowConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  scriptTimeoutMs: number;
  definitionsPath: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeflowConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return {
    logLevel: parsed.data.NODEFLOW_LOG_LEVEL,
    scriptTimeoutMs: parsed.data.NODEFLOW_SCRIPT_TIMEOUT_MS,
    definitionsPath: parsed.data.NODEFLOW_DEFINITIONS_PATH,
  };
}

/** Defaults as if no environment variable were set. */
export const DEFAULT_CONFIG: NodeflowConfig = loadConfig({});
