/** Shared Commander helpers for the run-examples CLI. */
import type { Command, Option } from 'commander';

/** Where an option value came from ("cli", "default", "env", ...). */
export const getOptionSource = (
  cmd: Command,
  name: string,
): string | undefined => cmd.getOptionValueSource(name);

/** Boolean flag value only when given on the command line; else undefined. */
export const cliBoolean = (
  cmd: Command,
  name: string,
  value: unknown,
): boolean | undefined =>
  getOptionSource(cmd, name) === 'cli' ? Boolean(value) : undefined;

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Coerce env-style values (1/0, true/false). */
export const envFlag = (v: string | undefined): boolean => {
  const s = (v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true';
};
