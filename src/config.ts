import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { DatasourceCredentials } from './crawl.js';

const configSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  pollIntervalMs: z.number().int().nonnegative().optional(),
  maxPollAttempts: z.number().int().positive().optional(),
  defaults: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export type DatasourceConfig = z.infer<typeof configSchema>;

export async function loadConfig(configPath = 'watercrawl.config.json'): Promise<DatasourceConfig> {
  const full = path.resolve(configPath);
  if (!existsSync(full)) return {};
  const raw = await readFile(full, 'utf-8');
  const result = configSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid config ${configPath}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return result.data;
}

// WATERCRAWL_API_KEY and WATERCRAWL_BASE_URL win over the file.
export function resolveCredentials(
  config: DatasourceConfig,
  env: NodeJS.ProcessEnv = process.env,
): DatasourceCredentials {
  return {
    api_key: env.WATERCRAWL_API_KEY || config.apiKey,
    base_url: env.WATERCRAWL_BASE_URL || config.baseUrl,
  };
}

/** Flags left undefined fall back to the config's `defaults`. */
export function mergeParameters(
  defaults: DatasourceConfig['defaults'],
  flags: Record<string, unknown>,
): Record<string, unknown> {
  const parameters: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) parameters[key] = value;
  }
  return parameters;
}

export function parseIntegerOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) throw new Error(`${name} must be a number`);
  return n;
}
