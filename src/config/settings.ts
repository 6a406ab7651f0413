/**
 * @fileoverview docfacts settings
 *
 * Defaults live in the zod schema. A project may override them with
 * `docfacts.config.yaml` in the workspace; DOCFACTS_* environment variables
 * win over both.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from '../core/errors.js';
import { isErrnoException } from '../core/result.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export const DocStyleSchema = z.enum(['flat', 'fenced']);

export const GitSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  probeTimeoutMs: z.number().int().positive().default(2000),
  commandTimeoutMs: z.number().int().positive().default(10000),
  maxCommits: z.number().int().positive().default(5),
  checkIgnoreBatchSize: z.number().int().positive().default(1024),
}).strict();

export const DiscoverySettingsSchema = z.object({
  ignoreFileName: z.string().min(1).default('.docfactsignore'),
  useBuiltinIgnore: z.boolean().default(true),
  extraExcludeDirs: z.array(z.string().min(1)).default([]),
}).strict();

export const BatchSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(4),
}).strict();

export const DocfactsConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  style: DocStyleSchema.default('flat'),
  git: GitSettingsSchema.default({}),
  discovery: DiscoverySettingsSchema.default({}),
  batch: BatchSettingsSchema.default({}),
}).strict();

export type DocfactsConfig = z.infer<typeof DocfactsConfigSchema>;
export type DocfactsConfigInput = z.input<typeof DocfactsConfigSchema>;

export const CONFIG_FILE_NAMES = ['docfacts.config.yaml', 'docfacts.config.yml'] as const;

// ============================================================================
// LOADING
// ============================================================================

export function resolveConfig(input: DocfactsConfigInput = {}): DocfactsConfig {
  const parsed = DocfactsConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('inline settings', formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load settings for a workspace: config file (if any), then environment.
 */
export async function loadConfig(
  workspace: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<DocfactsConfig> {
  let config = resolveConfig();
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = path.join(workspace, fileName);
    const raw = await readOptional(filePath);
    if (raw === null) continue;
    config = parseConfigText(raw, filePath);
    break;
  }
  return applyEnvOverrides(config, env);
}

export function parseConfigText(raw: string, source: string): DocfactsConfig {
  let document: unknown;
  try {
    document = YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(source, getErrorMessage(error));
  }
  const parsed = DocfactsConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function applyEnvOverrides(config: DocfactsConfig, env: NodeJS.ProcessEnv): DocfactsConfig {
  const next: DocfactsConfig = {
    ...config,
    git: { ...config.git },
    discovery: { ...config.discovery },
    batch: { ...config.batch },
  };

  if (env.DOCFACTS_LOG_LEVEL) {
    next.logLevel = parseEnv('DOCFACTS_LOG_LEVEL', LogLevelSchema, env.DOCFACTS_LOG_LEVEL.trim().toLowerCase());
  }
  if (env.DOCFACTS_STYLE) {
    next.style = parseEnv('DOCFACTS_STYLE', DocStyleSchema, env.DOCFACTS_STYLE.trim().toLowerCase());
  }
  if (env.DOCFACTS_GIT) {
    const value = env.DOCFACTS_GIT.trim().toLowerCase();
    next.git.enabled = !(value === '0' || value === 'false' || value === 'off');
  }
  if (env.DOCFACTS_GIT_TIMEOUT_MS) {
    next.git.commandTimeoutMs = parseEnv('DOCFACTS_GIT_TIMEOUT_MS', z.coerce.number().int().positive(), env.DOCFACTS_GIT_TIMEOUT_MS);
  }
  if (env.DOCFACTS_CONCURRENCY) {
    next.batch.concurrency = parseEnv('DOCFACTS_CONCURRENCY', z.coerce.number().int().min(1).max(64), env.DOCFACTS_CONCURRENCY);
  }
  return next;
}

function parseEnv<T>(name: string, schema: z.ZodType<T>, value: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`environment variable ${name}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw new ConfigError(filePath, getErrorMessage(error));
  }
}
