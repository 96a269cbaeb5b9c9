/**
 * Application Configuration
 *
 * Loads the TOML configuration file, applies NEWSLOOKOUT_ environment overrides and validates
 * the result once at startup. Stage-specific keys are validated by each stage (see parseStageOptions).
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { getConfigOverrides } from './env.js';
import { ConfigurationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_COMPLETED_URLS_DATAFILE = 'newslookout_urls.db';
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0';

export const DEFAULT_PROMPTS = {
  summaryPart: 'Summarise the following text concisely.\n\nTEXT:\n',
  insightsPart: 'Read the following text and extract actions from it.\n\nTEXT:\n',
  summaryExec: 'Summarise the following text concisely.\n\nTEXT:\n',
  actionsSummary: 'Consolidate the following list of actions into a concise list.\n\nTEXT:\n',
  system: 'You are an expert in analysing news and documents.',
} as const;

export type StageKind = 'retriever' | 'data_processor';

const pluginEntrySchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(['retriever', 'data_processor']).default('retriever'),
    enabled: z.boolean().default(false),
    priority: z.number().int().default(99),
  })
  .passthrough();

const llmApiSchema = z
  .object({
    model_name: z.string().optional(),
    api_url: z.string().optional(),
    temperature: z.number().optional(),
    model_api_timeout: z.number().positive().optional(),
    max_context_len: z.number().int().positive().optional(),
    max_gen_tokens: z.number().int().positive().optional(),
  })
  .passthrough();

const appConfigSchema = z
  .object({
    data_dir: z.string().optional(),
    completed_urls_datafile: z.string().min(1).default(DEFAULT_COMPLETED_URLS_DATAFILE),
    fetch_timeout: z.number().positive().default(60),
    connect_timeout: z.number().positive().default(10),
    retry_count: z.number().int().min(1).default(3),
    retry_wait_fixed_sec: z.number().nonnegative().default(3),
    user_agent: z.string().default(DEFAULT_USER_AGENT),
    proxy_server_url: z.string().optional(),
    log_level: z.string().optional(),
    completion_batch_size: z.number().int().positive().default(100),
    max_context_len: z.number().int().positive().default(8192),
    max_gen_tokens: z.number().int().positive().default(8192),
    summary_part_context: z.string().optional(),
    insights_part_context: z.string().optional(),
    summary_exec_context: z.string().optional(),
    actions_summary_context: z.string().optional(),
    system_context: z.string().optional(),
    prompt_summary_part: z.string().optional(),
    prompt_summary_exec: z.string().optional(),
    plugins: z.array(pluginEntrySchema).default([]),
    llm_apis: z.record(llmApiSchema).default({}),
  })
  .passthrough();

export type PluginEntry = z.infer<typeof pluginEntrySchema>;
export type LlmApiSettings = z.infer<typeof llmApiSchema>;

export interface NetworkParameters {
  fetchTimeoutMs: number;
  connectTimeoutMs: number;
  retryCount: number;
  retryWaitFixedMs: number;
  userAgent: string;
  proxyUrl?: string;
}

export interface PromptContexts {
  summaryPart: string;
  insightsPart: string;
  summaryExec: string;
  actionsSummary: string;
  system: string;
}

export interface AppConfig {
  /** Absolute path of an existing directory */
  dataDir: string;
  completedUrlsDatafile: string;
  completionBatchSize: number;
  logLevel?: string;
  network: NetworkParameters;
  prompts: PromptContexts;
  maxContextLen: number;
  maxGenTokens: number;
  llmApis: Record<string, LlmApiSettings>;
  plugins: PluginEntry[];
  /** Validated top-level table, including keys no typed field covers */
  raw: Record<string, unknown>;
}

/**
 * Coerce an override string to the type of the value it replaces, or infer one
 */
export function coerceOverrideValue(value: string, existing: unknown): unknown {
  if (typeof existing === 'number') {
    const num = Number(value);
    return Number.isFinite(num) ? num : value;
  }
  if (typeof existing === 'boolean') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  if (typeof existing === 'string') {
    return value;
  }
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d*\.\d+$/.test(value)) return parseFloat(value);
  if (value === 'true' || value === 'false') return value === 'true';
  return value;
}

/**
 * Apply NEWSLOOKOUT_ overrides onto the top-level scalar keys of a parsed table
 */
export function applyEnvOverrides(
  table: Record<string, unknown>,
  overrides: Record<string, string>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...table };
  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    if (existing !== null && typeof existing === 'object') {
      logger.warn({ key }, 'Ignoring environment override of a non-scalar configuration key');
      continue;
    }
    result[key] = coerceOverrideValue(value, existing);
  }
  return result;
}

/**
 * Resolve the data directory: the configured path if it is an existing directory, else the cwd
 */
export function resolveDataFolder(dataDir: string | undefined, cwd: string = process.cwd()): string {
  if (!dataDir) {
    logger.warn({ cwd }, 'data_dir not configured, using current directory');
    return cwd;
  }
  const resolved = path.resolve(cwd, dataDir);
  try {
    if (fs.statSync(resolved).isDirectory()) {
      return resolved;
    }
  } catch (error) {
    logger.debug({ dataDir: resolved, error }, 'Unable to stat data_dir');
  }
  logger.warn({ dataDir: resolved, cwd }, 'data_dir is not a directory, using current directory');
  return cwd;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validate a parsed configuration table and derive the typed configuration
 *
 * @throws ConfigurationError if validation fails
 */
export function buildAppConfig(
  table: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const withOverrides = applyEnvOverrides(table, getConfigOverrides(env));
  const parsed = appConfigSchema.safeParse(withOverrides);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
  }
  const cfg = parsed.data;

  return {
    dataDir: resolveDataFolder(cfg.data_dir, cwd),
    completedUrlsDatafile: path.resolve(cwd, cfg.completed_urls_datafile),
    completionBatchSize: cfg.completion_batch_size,
    logLevel: cfg.log_level,
    network: {
      fetchTimeoutMs: cfg.fetch_timeout * 1000,
      connectTimeoutMs: cfg.connect_timeout * 1000,
      retryCount: cfg.retry_count,
      retryWaitFixedMs: cfg.retry_wait_fixed_sec * 1000,
      userAgent: cfg.user_agent,
      proxyUrl: cfg.proxy_server_url,
    },
    prompts: {
      summaryPart: cfg.summary_part_context ?? cfg.prompt_summary_part ?? DEFAULT_PROMPTS.summaryPart,
      insightsPart: cfg.insights_part_context ?? DEFAULT_PROMPTS.insightsPart,
      summaryExec: cfg.summary_exec_context ?? cfg.prompt_summary_exec ?? DEFAULT_PROMPTS.summaryExec,
      actionsSummary: cfg.actions_summary_context ?? DEFAULT_PROMPTS.actionsSummary,
      system: cfg.system_context ?? DEFAULT_PROMPTS.system,
    },
    maxContextLen: cfg.max_context_len,
    maxGenTokens: cfg.max_gen_tokens,
    llmApis: cfg.llm_apis,
    plugins: cfg.plugins,
    raw: cfg,
  };
}

/**
 * Read, parse and validate the configuration file
 *
 * @throws ConfigurationError if the file is unreadable, not TOML, or invalid
 */
export function loadAppConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration file '${configPath}'`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let table: Record<string, unknown>;
  try {
    table = parseToml(text);
  } catch (error) {
    throw new ConfigurationError(`Unable to parse configuration file '${configPath}'`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const config = buildAppConfig(table, env);
  logger.info(
    { configPath, dataDir: config.dataDir, plugins: config.plugins.length },
    'Configuration loaded'
  );
  return config;
}

/**
 * Validate the plugin-local options of one stage against its schema
 *
 * @throws ConfigurationError naming the plugin if validation fails
 */
export function parseStageOptions<S extends z.ZodTypeAny>(
  stageName: string,
  schema: S,
  options: Record<string, unknown>
): z.output<S> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid options for plugin '${stageName}'`, formatIssues(parsed.error));
  }
  return parsed.data;
}
