import 'dotenv/config';
import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import type { LogLevel } from './logger.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';

export const ENV_PREFIX = 'JIRA_';

export interface ConfigSources {
  fileName: string;
  file: Record<string, unknown>;
  env: NodeJS.ProcessEnv;
  cli: Record<string, unknown>;
}

// ── Value coercion ──────────────────────────────────────────

function toInt(value: unknown): unknown {
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return parseInt(value, 10);
  return value;
}

function toBool(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

/** Accepts `a,b`, `[a, b]` and `['a,b', 'c']` alike. */
function toList(value: unknown): unknown {
  if (typeof value === 'string') return splitList(value);
  if (Array.isArray(value)) {
    return value.flatMap((entry: unknown) => (typeof entry === 'string' ? splitList(entry) : [entry]));
  }
  return value;
}

const text = z.string().trim().min(1, 'must not be empty');
const integer = z.preprocess(toInt, z.number({ invalid_type_error: 'must be an integer' }).int('must be an integer'));
const flag = z.preprocess(toBool, z.boolean({ invalid_type_error: 'must be true or false' }));
const list = z.preprocess(toList, z.array(text));
// Transitions are named or given by id; YAML reads a bare id as a number.
const transition = z.preprocess((value) => (typeof value === 'number' ? String(value) : value), text);

const fieldName = z.enum(['components', 'labels', 'versions']);
const fieldList = z.preprocess(toList, z.array(fieldName)).default([]);

// ── Schemas ─────────────────────────────────────────────────

const connectionShape = {
  base_url: z.string().url('must be a URL, e.g. https://example.atlassian.net'),
  username: text,
  api_token: text,
  dry_run: flag.default(false),
  verbose: flag.default(false),
};

export const closeStaleSchema = z.object({
  ...connectionShape,
  project_key: text,
  stale_days: integer.pipe(z.number().positive('must be a positive number of days')),
  transition_to: transition,
  max_results: integer.pipe(z.number().positive()).default(500),
});

export const updateChildrenSchema = z.object({
  ...connectionShape,
  issue: text,
  append: fieldList,
  overwrite: fieldList,
  skip_unchanged: flag.default(false),
});

export const SPRINT_NUMBER_PLACEHOLDER = '${sprint_number}';

export const dutyRotationSchema = z.object({
  ...connectionShape,
  project_key: text,
  board_id: integer,
  epic_key: text,
  sprint_template: text.refine((value) => value.includes(SPRINT_NUMBER_PLACEHOLDER), {
    message: `must contain ${SPRINT_NUMBER_PLACEHOLDER}`,
  }),
  sprint_starting_number: integer,
  people_queue: list.pipe(z.array(z.string()).min(1, 'must name at least one person')),
  sprint_field: z.string().regex(/^customfield_\d+$/, 'must look like customfield_10020').default('customfield_10020'),
  info_url: z.string().url('must be a URL').optional(),
});

export type ConnectionConfig = z.infer<z.ZodObject<typeof connectionShape>>;
export type CloseStaleConfig = z.infer<typeof closeStaleSchema>;
export type UpdateChildrenConfig = z.infer<typeof updateChildrenSchema>;
export type DutyRotationConfig = z.infer<typeof dutyRotationSchema>;

// ── Sources ─────────────────────────────────────────────────

function camelToSnake(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function snakeToFlag(key: string): string {
  return `--${key.replace(/_/g, '-')}`;
}

export function envName(key: string): string {
  return `${ENV_PREFIX}${key.toUpperCase()}`;
}

export function readConfigFile(path: string, explicit: boolean): Record<string, unknown> {
  if (!existsSync(path)) {
    if (explicit) throw new ConfigurationError([`config file ${path} does not exist`]);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError([`config file ${path} is not valid YAML: ${errorMessage(error)}`]);
  }

  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError([`config file ${path} must contain a mapping of settings`]);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function collectSources(
  fileName: string,
  explicitFile: boolean,
  cliOptions: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): ConfigSources {
  const cli: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(cliOptions)) {
    if (key === 'config' || value === undefined) continue;
    cli[camelToSnake(key)] = value;
  }
  return { fileName, file: readConfigFile(fileName, explicitFile), env, cli };
}

/**
 * Merges file, environment and command line values (later wins) and validates
 * them against `schema`. All problems are reported together.
 */
export function resolveConfig<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  sources: ConfigSources
): z.infer<z.ZodObject<T>> {
  const merged: Record<string, unknown> = {};

  for (const key of Object.keys(schema.shape)) {
    const envValue = sources.env[envName(key)];
    if (key in sources.cli) {
      merged[key] = sources.cli[key];
    } else if (envValue !== undefined && envValue !== '') {
      merged[key] = envValue;
    } else if (sources.file[key] !== undefined && sources.file[key] !== null) {
      merged[key] = sources.file[key];
    }
  }

  const result = schema.safeParse(merged);
  if (result.success) return result.data;

  const problems = new Map<string, string>();
  for (const issue of result.error.issues) {
    const key = String(issue.path[0] ?? '');
    if (problems.has(key)) continue;
    const where = `set "${key}" in ${sources.fileName}, export ${envName(key)} or pass ${snakeToFlag(key)}`;
    const what = merged[key] === undefined ? 'is required' : issue.message;
    problems.set(key, `${key} ${what} (${where})`);
  }
  throw new ConfigurationError([...problems.values()]);
}

export function loadCloseStaleConfig(sources: ConfigSources): CloseStaleConfig {
  return resolveConfig(closeStaleSchema, sources);
}

export function loadUpdateChildrenConfig(sources: ConfigSources): UpdateChildrenConfig {
  const config = resolveConfig(updateChildrenSchema, sources);
  if (config.append.length === 0 && config.overwrite.length === 0) {
    throw new ConfigurationError([
      `no fields selected (set "append" or "overwrite" in ${sources.fileName}, or pass --append / --overwrite)`,
    ]);
  }
  return config;
}

export function loadDutyRotationConfig(sources: ConfigSources): DutyRotationConfig {
  return resolveConfig(dutyRotationSchema, sources);
}

export function logLevelFor(config: ConnectionConfig): LogLevel {
  return config.verbose ? 'debug' : 'info';
}
