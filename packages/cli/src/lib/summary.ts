/**
 * The gitglance run: resolve settings, discover repositories, pick a
 * renderer, drive the inspection pipeline.
 */

import * as fs from 'node:fs';
import {
  DirectRenderer,
  JsonReporter,
  SequentialRenderer,
  createScheduler,
  type CursorProbe,
  type Entity,
  type FactProvider,
  type Logger,
  type StatusRenderer,
  type TextSink,
} from '@gitglance/core';
import { exitCommandError } from './command-runtime.js';
import {
  getConfigPath,
  loadFileConfig,
  resolveSettings,
  type CliFlags,
  type FileConfig,
  type Settings,
} from './config.js';
import { discoverRepos } from './discovery.js';
import { GitFactProvider } from './git-facts.js';
import type { GitRunner } from './git.js';
import { createLogger } from './logger.js';
import { createTerminalCursorProbe } from './terminal-probe.js';

export interface SummaryDeps {
  stdout: TextSink & { isTTY?: boolean };
  env: NodeJS.ProcessEnv;
  git?: GitRunner;
  provider?: FactProvider;
  probe?: CursorProbe;
  logger?: Logger;
  /** Skips reading ~/.gitglance/config.json when given. */
  fileConfig?: FileConfig;
}

export function selectRenderer(
  entities: readonly Entity[],
  settings: Settings,
  deps: Pick<SummaryDeps, 'stdout' | 'probe'>,
): StatusRenderer {
  if (settings.json) {
    return new JsonReporter(entities, deps.stdout);
  }
  if (settings.simple) {
    return new SequentialRenderer(entities, {
      sink: deps.stdout,
      path: settings.path,
      tracking: settings.tracking,
    });
  }
  return new DirectRenderer(entities, {
    sink: deps.stdout,
    path: settings.path,
    tracking: settings.tracking,
    monochrome: settings.monochrome,
    forceClear: settings.clear,
    probe: deps.probe ?? createTerminalCursorProbe(),
  });
}

function assertDirectory(dir: string, json: boolean): void {
  let isDir = false;
  try {
    isDir = fs.statSync(dir).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    exitCommandError({ json, message: `Not a folder: ${dir}` });
  }
}

export async function runSummary(
  pathArg: string | undefined,
  flags: CliFlags,
  deps: SummaryDeps,
): Promise<void> {
  const logger = deps.logger ?? createLogger({ verbose: flags.verbose });
  const fileConfig = deps.fileConfig ?? loadFileConfig(getConfigPath(deps.env), logger);
  const settings = resolveSettings(pathArg, flags, {
    env: deps.env,
    fileConfig,
    isTTY: deps.stdout.isTTY ?? false,
  });

  assertDirectory(settings.path, settings.json);

  const git = deps.git;
  const entities = await discoverRepos(settings.path, { git, logger, degree: settings.jobs });
  if (entities.length === 0) {
    exitCommandError({ json: settings.json, message: `No git repos found at path: ${settings.path}` });
  }
  logger.debug('Discovered repositories', { count: entities.length, path: settings.path });

  const renderer = selectRenderer(entities, settings, deps);
  await renderer.start();

  const scheduler = createScheduler({
    sequential: settings.sequential,
    degree: settings.jobs,
    provider: deps.provider ?? new GitFactProvider({ git }),
    listener: renderer,
    fetch: settings.fetch,
    logger,
  });
  await scheduler.run(entities);
}
