/* src/runner/command.ts
 * Invocation construction, child environment and shell-style rendering.
 */
import type { Invocation } from '@/runner/types';

/**
 * Build tool, run subcommand, release flag, example selector.
 *
 * No `time` wrapper: elapsed time is measured in process. A wrapper or other
 * prefix can still be set through the config `command` key, e.g.
 * `command: [time, cargo, run, --release, --example]`.
 */
export const DEFAULT_COMMAND: readonly string[] = [
  'cargo',
  'run',
  '--release',
  '--example',
];

/** Ask the build tool for detailed failure diagnostics. */
export const DEFAULT_ENV: Readonly<Record<string, string>> = {
  RUST_BACKTRACE: '1',
};

/** Inherited environment with the overrides applied on top. */
export const buildChildEnv = (
  overrides: Record<string, string>,
  parentEnv: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv => ({ ...parentEnv, ...overrides });

/**
 * Build the invocation for one example:
 * `[...prefix, name, ...forwarded]`, split into program and argv.
 */
export const buildInvocation = (
  prefix: readonly string[],
  name: string,
  forwarded: readonly string[],
  overrides: Record<string, string>,
  parentEnv: NodeJS.ProcessEnv = process.env,
): Invocation => {
  const [program, ...rest] = prefix;
  if (typeof program !== 'string' || !program.length) {
    throw new Error('command must name a program');
  }
  return {
    program,
    args: [...rest, name, ...forwarded],
    env: buildChildEnv(overrides, parentEnv),
  };
};

const SAFE_TOKEN = /^[\w@%+=:,./-]+$/;

/** Quote one token for a POSIX shell (unchanged when already safe). */
export const quoteArg = (token: string): string => {
  if (!token.length) return "''";
  if (SAFE_TOKEN.test(token)) return token;
  return `'${token.replace(/'/g, `'"'"'`)}'`;
};

/** Full command line as a copy-pasteable string. */
export const renderCommandLine = (tokens: readonly string[]): string =>
  tokens.map(quoteArg).join(' ');

/** Program + argv as a flat token list. */
export const invocationTokens = (inv: Invocation): string[] => [
  inv.program,
  ...inv.args,
];
