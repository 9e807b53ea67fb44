// src/runner/types.ts

/** A runnable example discovered on disk. */
export type Example = {
  /** File base name without directory or extension. */
  name: string;
  /** Absolute path to the example source file. */
  path: string;
};

/**
 * Example selection:
 * - `select` keeps only the listed names,
 * - `except` drops the listed names.
 * Discovery order is preserved either way.
 */
export type Selection = {
  select?: string[];
  except?: string[];
};

/** A fully built child invocation (program + argv + environment). */
export type Invocation = {
  program: string;
  args: string[];
  env: NodeJS.ProcessEnv;
};

export type InvocationResult = {
  /** Exit status; 128 + signal number when the child was killed by a signal. */
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
};

/** Effective runner configuration (flags > config file > built-ins). */
export type RunnerConfig = {
  /** Run root: relative paths resolve here and children run here. */
  root: string;
  /** Examples directory, relative to `root` (or absolute). */
  dir: string;
  /** Glob matched inside `dir`. */
  pattern: string;
  /** When true, order examples lexically instead of glob order. */
  sort: boolean;
  /** Tokens preceding the example name (program first). */
  command: string[];
  /** Environment overrides merged over the inherited environment. */
  env: Record<string, string>;
  /** Echo child output to the console while capturing it. */
  stream: boolean;
  /** Optional directory for per-example combined output logs. */
  logDir?: string;
};
