// Server configuration: core settings plus the listen address
import { z } from 'zod';
import { ConfigError, formatIssues, loadConfig, type NodeflowConfig } from '@nodeflow/core';

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
});

export interface ServerConfig extends NodeflowConfig {
  port: number;
  host: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const core = loadConfig(env);
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return { ...core, port: parsed.data.PORT, host: parsed.data.HOST };
}
