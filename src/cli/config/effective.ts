/* src/cli/config/effective.ts
 * Merge CLI flags over the config file over built-in defaults.
 */
import type { LoadedConfig } from '@/cli/config/load';
import { DEFAULT_COMMAND, DEFAULT_ENV } from '@/runner/command';
import type { RunnerConfig } from '@/runner/types';

export const RUN_BASE_DEFAULTS = {
  dir: 'examples',
  pattern: '*.rs',
  sort: false,
  stream: true,
} as const;

/** Flags that override file settings when given on the command line. */
export type RunFlagOverrides = {
  dir?: string;
  pattern?: string;
  sort?: boolean;
  stream?: boolean;
  logDir?: string;
};

export const resolveRunnerConfig = (
  loaded: LoadedConfig,
  flags: RunFlagOverrides = {},
): RunnerConfig => {
  const file = loaded.config;
  return {
    root: loaded.root,
    dir: flags.dir ?? file.dir ?? RUN_BASE_DEFAULTS.dir,
    pattern: flags.pattern ?? file.pattern ?? RUN_BASE_DEFAULTS.pattern,
    sort: flags.sort ?? file.sort ?? RUN_BASE_DEFAULTS.sort,
    command: [...(file.command ?? DEFAULT_COMMAND)],
    env: { ...DEFAULT_ENV, ...file.env },
    stream: flags.stream ?? file.stream ?? RUN_BASE_DEFAULTS.stream,
    logDir: flags.logDir ?? file.logDir,
  };
};
