import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CliNotFoundError, ConfigError } from './errors.js';
import type { PermissionMode } from './protocol-types.js';

/**
 * Options that shape the subprocess command line.
 */
export interface CliProcessOptions {
  cliPath?: string;
  cwd?: string;
  env?: Record<string, string>;
  model?: string;
  systemPrompt?: string;
  appendSystemPrompt?: string;
  allowedTools?: string[];
  disallowedTools?: string[];
  maxTurns?: number;
  permissionMode?: PermissionMode;
  permissionPromptToolName?: string;
  resume?: string;
  forkSession?: boolean;
  continueConversation?: boolean;
  settings?: string;
  user?: string;
  addDirs?: string[];
  includePartialMessages?: boolean;
  /** `--key value` pairs; `null` emits a bare `--key`. */
  extraArgs?: Record<string, string | null>;
}

const BASE_ARGS = ['--output-format', 'stream-json', '--verbose', '--input-format', 'stream-json'];

/**
 * Build the argument vector for a streaming control-protocol session.
 *
 * `hasPermissionCallback` routes permission prompts over stdio so the
 * session's canUseTool callback receives them.
 */
export function buildCliArgs(options: CliProcessOptions, hasPermissionCallback = false): string[] {
  const args = [...BASE_ARGS];

  if (hasPermissionCallback && options.permissionPromptToolName !== undefined) {
    throw new ConfigError(
      'canUseTool callback cannot be used with permissionPromptToolName. Please use one or the other',
    );
  }

  if (options.systemPrompt !== undefined) args.push('--system-prompt', options.systemPrompt);
  if (options.appendSystemPrompt !== undefined) {
    args.push('--append-system-prompt', options.appendSystemPrompt);
  }
  if (options.allowedTools?.length) args.push('--allowedTools', options.allowedTools.join(','));
  if (options.maxTurns !== undefined) args.push('--max-turns', String(options.maxTurns));
  if (options.disallowedTools?.length) {
    args.push('--disallowedTools', options.disallowedTools.join(','));
  }
  if (options.model !== undefined) args.push('--model', options.model);
  if (options.permissionMode !== undefined) args.push('--permission-mode', options.permissionMode);

  if (options.resume !== undefined) {
    args.push('--resume', options.resume);
    if (options.forkSession) args.push('--fork-session');
  }
  if (options.continueConversation) args.push('--continue');
  if (options.settings !== undefined) args.push('--settings', options.settings);
  if (options.user !== undefined) args.push('--user', options.user);

  for (const dir of options.addDirs ?? []) {
    args.push('--add-dir', dir);
  }

  const promptTool = hasPermissionCallback ? 'stdio' : options.permissionPromptToolName;
  if (promptTool !== undefined) args.push('--permission-prompt-tool', promptTool);

  if (options.includePartialMessages) args.push('--include-partial-messages');

  for (const [key, value] of Object.entries(options.extraArgs ?? {})) {
    const flag = key.startsWith('--') ? key : `--${key}`;
    if (value === null) {
      args.push(flag);
    } else {
      args.push(flag, value);
    }
  }

  return args;
}

/**
 * Injectable dependencies for findCli.
 */
export interface FindCliDeps {
  env: Record<string, string | undefined>;
  homeDir: () => string;
  isExecutable: (filePath: string) => boolean;
  platform: NodeJS.Platform;
}

function defaultIsExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

const defaultFindDeps: FindCliDeps = {
  env: process.env,
  homeDir: () => os.homedir(),
  isExecutable: defaultIsExecutable,
  platform: process.platform,
};

/**
 * Locate the claude executable: explicit path, then PATH, then the usual
 * global install locations.
 */
export function findCli(explicitPath?: string, deps: Partial<FindCliDeps> = {}): string {
  const { env, homeDir, isExecutable, platform } = { ...defaultFindDeps, ...deps };

  if (explicitPath) {
    if (isExecutable(explicitPath)) return explicitPath;
    throw new CliNotFoundError([explicitPath]);
  }

  const exe = platform === 'win32' ? 'claude.cmd' : 'claude';
  const pathDirs = (env['PATH'] ?? '').split(path.delimiter).filter(Boolean);
  for (const dir of pathDirs) {
    const candidate = path.join(dir, exe);
    if (isExecutable(candidate)) return candidate;
  }

  const home = homeDir();
  const locations = [
    path.join(home, '.npm-global', 'bin', 'claude'),
    '/usr/local/bin/claude',
    path.join(home, '.local', 'bin', 'claude'),
    path.join(home, 'node_modules', '.bin', 'claude'),
    path.join(home, '.yarn', 'bin', 'claude'),
  ];
  if (platform === 'win32' && env['APPDATA']) {
    locations.push(path.join(env['APPDATA'], 'npm', 'claude.cmd'));
  }

  for (const location of locations) {
    if (isExecutable(location)) return location;
  }

  throw new CliNotFoundError(locations);
}
