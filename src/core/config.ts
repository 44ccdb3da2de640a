import { homedir } from 'node:os';
import { join } from 'node:path';

import { parse, stringify } from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../utils/errors.js';
import { readFileIfExists, writeFileAtomic } from '../utils/fs.js';

export const ConfigSchema = z.object({
  trackerUrl: z.string().min(1).default('https://gitlab.com'),
  apiToken: z.string().min(1).optional(),
  defaultProjectId: z.string().min(1).optional(),
  mcpServerUrl: z.string().url().optional(),
  searchTool: z.string().min(1).default('list_issues'),
  maxStrategyDimensions: z.number().int().min(1).max(3).default(3),
  maxStrategies: z.number().int().min(1).default(8),
  contextMaxAgeMinutes: z.number().positive().default(60),
  resultLimit: z.number().int().min(1).max(50).default(20),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  autoRefresh: z.boolean().default(true),
});

export type IssueScoutConfig = z.infer<typeof ConfigSchema>;

/** Values as written in the config file, before defaults are applied. */
export type ConfigFileValues = z.input<typeof ConfigSchema>;

const CONFIG_FILENAME = 'config.yaml';

const ENV_OVERRIDES = {
  ISSUESCOUT_TRACKER_URL: 'trackerUrl',
  ISSUESCOUT_TOKEN: 'apiToken',
  ISSUESCOUT_PROJECT: 'defaultProjectId',
  ISSUESCOUT_MCP_URL: 'mcpServerUrl',
} as const satisfies Record<string, keyof ConfigFileValues>;

export interface ConfigLocation {
  dir?: string;
  env?: NodeJS.ProcessEnv;
}

export function getConfigDir(location: ConfigLocation = {}): string {
  const env = location.env ?? process.env;
  return location.dir ?? env.ISSUESCOUT_HOME ?? join(homedir(), '.issuescout');
}

export function getConfigPath(location: ConfigLocation = {}): string {
  return join(getConfigDir(location), CONFIG_FILENAME);
}

/** Adds `https://` when no protocol is given and drops trailing slashes. */
export function normalizeTrackerUrl(url: string): string {
  let normalized = url.trim();
  if (!/^https?:\/\//i.test(normalized)) {
    normalized = `https://${normalized}`;
  }
  return normalized.replace(/\/+$/, '');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  const raw = await readFileIfExists(path);
  if (raw === null) return {};

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Could not parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isObject(parsed)) {
    throw new ConfigError(`${path} must contain a mapping of settings`);
  }
  return parsed;
}

/**
 * Loads settings from the config file, then applies environment overrides and
 * defaults. A missing file yields the defaults.
 */
export async function loadConfig(location: ConfigLocation = {}): Promise<IssueScoutConfig> {
  const env = location.env ?? process.env;
  const path = getConfigPath(location);
  const values = await readConfigFile(path);

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value) values[key] = value;
  }

  const parsed = ConfigSchema.safeParse(values);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${path}: ${issues}`);
  }

  return { ...parsed.data, trackerUrl: normalizeTrackerUrl(parsed.data.trackerUrl) };
}

/**
 * Merges `patch` into the config file on disk. Environment overrides are not
 * written back.
 */
export async function updateConfigFile(
  patch: Partial<ConfigFileValues>,
  location: ConfigLocation = {},
): Promise<void> {
  const path = getConfigPath(location);
  const merged = { ...(await readConfigFile(path)), ...patch };

  const parsed = ConfigSchema.partial().safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Refusing to write invalid configuration: ${parsed.error.message}`);
  }

  await writeFileAtomic(path, stringify(merged));
}
