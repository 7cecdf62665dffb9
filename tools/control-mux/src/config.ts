import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { PermissionMode } from './protocol-types.js';

export const CONFIG_FILE_NAME = '.control-mux.yaml';

/**
 * CLI options as received from commander (all strings/booleans).
 */
export interface CliOptions {
  cliPath?: string;
  cwd?: string;
  model?: string;
  permissionMode?: string;
  maxTurns?: string;
  allowedTools?: string;
  denyTools?: string;
  logDir?: string;
  config?: string;
  verbose?: boolean;
}

export interface CliConfig {
  cliPath?: string;
  cwd: string;
  model?: string;
  permissionMode?: PermissionMode;
  maxTurns?: number;
  allowedTools: string[];
  denyTools: string[];
  logDir?: string;
  verbose: boolean;
}

const permissionModeSchema = z.enum(['default', 'acceptEdits', 'plan', 'bypassPermissions']);

/** Shape of `.control-mux.yaml`; every key optional. */
const fileConfigSchema = z
  .object({
    cliPath: z.string(),
    model: z.string(),
    permissionMode: permissionModeSchema,
    maxTurns: z.number().int().positive(),
    allowedTools: z.array(z.string()),
    denyTools: z.array(z.string()),
    logDir: z.string(),
    verbose: z.boolean(),
  })
  .partial()
  .strict();

const cliConfigSchema = z.object({
  cliPath: z.string().min(1).optional(),
  cwd: z.string().min(1),
  model: z.string().min(1).optional(),
  permissionMode: permissionModeSchema.optional(),
  maxTurns: z.number().int().positive().optional(),
  allowedTools: z.array(z.string().min(1)),
  denyTools: z.array(z.string().min(1)),
  logDir: z.string().optional(),
  verbose: z.boolean(),
});

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Injectable dependencies for loadCliConfig.
 * Defaults to real implementations; tests can override.
 */
export interface ConfigDeps {
  env: Record<string, string | undefined>;
  cwd: () => string;
  fileExists: (filePath: string) => boolean;
  readFile: (filePath: string) => Promise<string>;
  mkdir: (dirPath: string, options: { recursive: boolean }) => Promise<void>;
}

const defaultDeps: ConfigDeps = {
  env: process.env,
  cwd: () => process.cwd(),
  fileExists: (filePath: string) => fs.existsSync(filePath),
  readFile: (filePath: string) => fsp.readFile(filePath, 'utf-8'),
  mkdir: async (dirPath: string, options: { recursive: boolean }) => {
    await fsp.mkdir(dirPath, options);
  },
};

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseInteger(value: string | undefined, source: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Invalid ${source} value: "${value}"`);
  }
  return parsed;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join(', ');
}

async function loadFileConfig(
  filePath: string,
  required: boolean,
  deps: ConfigDeps,
): Promise<FileConfig> {
  if (!deps.fileExists(filePath)) {
    if (required) throw new ConfigError(`Config file not found: ${filePath}`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(await deps.readFile(filePath));
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${filePath}: ${errorMessage(err)}`);
  }
  // An empty file parses to null.
  if (parsed === null || parsed === undefined) return {};

  const result = fileConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid config at ${filePath}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Resolve CLI configuration.
 *
 * Priority: CLI flags > CONTROL_MUX_* env vars > YAML config file > defaults.
 * The file is `--config <path>` when given, otherwise `.control-mux.yaml` in
 * the working directory if it exists. Creates the log directory when one is set.
 */
export async function loadCliConfig(cliOptions: CliOptions, deps: Partial<ConfigDeps> = {}): Promise<CliConfig> {
  const resolved: ConfigDeps = { ...defaultDeps, ...deps };
  const { env } = resolved;

  const cwd = path.resolve(cliOptions.cwd ?? resolved.cwd());
  const configPath = cliOptions.config
    ? path.resolve(cwd, cliOptions.config)
    : path.join(cwd, CONFIG_FILE_NAME);
  const file = await loadFileConfig(configPath, cliOptions.config !== undefined, resolved);

  const merged = {
    cliPath: cliOptions.cliPath ?? env['CONTROL_MUX_CLI_PATH'] ?? file.cliPath,
    cwd,
    model: cliOptions.model ?? env['CONTROL_MUX_MODEL'] ?? file.model,
    permissionMode: cliOptions.permissionMode ?? env['CONTROL_MUX_PERMISSION_MODE'] ?? file.permissionMode,
    maxTurns:
      parseInteger(cliOptions.maxTurns, 'max-turns') ??
      parseInteger(env['CONTROL_MUX_MAX_TURNS'], 'CONTROL_MUX_MAX_TURNS') ??
      file.maxTurns,
    allowedTools: splitList(cliOptions.allowedTools) ?? file.allowedTools ?? [],
    denyTools: splitList(cliOptions.denyTools) ?? file.denyTools ?? [],
    logDir: cliOptions.logDir ?? env['CONTROL_MUX_LOG_DIR'] ?? file.logDir,
    verbose: (cliOptions.verbose || undefined) ?? parseFlag(env['CONTROL_MUX_VERBOSE']) ?? file.verbose ?? false,
  };

  const result = cliConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const config = result.data;
  if (config.logDir !== undefined) {
    config.logDir = path.resolve(cwd, config.logDir);
    await resolved.mkdir(config.logDir, { recursive: true });
  }
  return config;
}
