/**
 * gitglance configuration
 *
 * Each setting comes from the first of: command-line flag, environment,
 * ~/.gitglance/config.json, built-in default.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_POOL_DEGREE, silentLogger, type Logger } from '@gitglance/core';
import { exitCommandError } from './command-runtime.js';

/** Env var holding the folder that contains the repos */
export const REPOS_PATH_ENV_VAR = 'GITGLANCE_REPOS_PATH';

export const fileConfigSchema = z.object({
  path: z.string().min(1).optional(),
  fetch: z.boolean().optional(),
  tracking: z.boolean().optional(),
  monochrome: z.boolean().optional(),
  jobs: z.number().int().positive().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

/** Flags as commander hands them over; unset flags are undefined. */
export interface CliFlags {
  tracking?: boolean;
  fetch?: boolean;
  monochrome?: boolean;
  simple?: boolean;
  clear?: boolean;
  sequential?: boolean;
  jobs?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface Settings {
  path: string;
  tracking: boolean;
  fetch: boolean;
  monochrome: boolean;
  simple: boolean;
  clear: boolean;
  sequential: boolean;
  jobs: number;
  json: boolean;
  verbose: boolean;
}

export interface ResolveContext {
  env: NodeJS.ProcessEnv;
  fileConfig: FileConfig;
  /** Whether stdout is an interactive terminal. */
  isTTY: boolean;
  homeDir?: string;
}

function homeDirectory(env: NodeJS.ProcessEnv): string {
  return env.HOME || env.USERPROFILE || os.homedir();
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(homeDirectory(env), '.gitglance', 'config.json');
}

/**
 * Load ~/.gitglance/config.json. A missing file is an empty config; a
 * malformed one is reported and ignored.
 */
export function loadFileConfig(configPath: string, logger: Logger = silentLogger): FileConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn(`Ignoring unreadable config file ${configPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return {};
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring invalid config file ${configPath}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }
  return parsed.data;
}

/** Expand a leading `~` and make the path absolute. */
export function expandPath(p: string, homeDir: string = os.homedir()): string {
  const expanded = p === '~' || p.startsWith('~/') ? path.join(homeDir, p.slice(1)) : p;
  return path.resolve(expanded);
}

export function parseJobs(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    exitCommandError({ message: `Invalid --jobs value "${value}": expected a positive integer` });
  }
  return jobs;
}

export function resolveSettings(
  pathArg: string | undefined,
  flags: CliFlags,
  ctx: ResolveContext,
): Settings {
  const json = flags.json ?? false;
  const rawPath = pathArg || ctx.env[REPOS_PATH_ENV_VAR] || ctx.fileConfig.path;
  if (!rawPath) {
    exitCommandError({
      json,
      message: `No path specified, and none in ${REPOS_PATH_ENV_VAR} env var`,
      humanDetails: ['Run "gitglance -h" for more information'],
    });
  }

  // Redirected or piped output cannot take cursor addressing
  const simple = (flags.simple ?? false) || !ctx.isTTY;

  return {
    path: expandPath(rawPath, ctx.homeDir ?? homeDirectory(ctx.env)),
    tracking: flags.tracking ?? ctx.fileConfig.tracking ?? false,
    fetch: flags.fetch ?? ctx.fileConfig.fetch ?? false,
    monochrome: simple || (flags.monochrome ?? ctx.fileConfig.monochrome ?? false),
    simple,
    clear: flags.clear ?? false,
    sequential: flags.sequential ?? false,
    jobs: flags.jobs !== undefined ? parseJobs(flags.jobs) : ctx.fileConfig.jobs ?? DEFAULT_POOL_DEGREE,
    json,
    verbose: flags.verbose ?? false,
  };
}
