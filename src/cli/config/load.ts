/* src/cli/config/load.ts
 * Locate, parse (YAML/JSON) and validate examples.config.*.
 */
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import YAML from 'yaml';
import { ZodError } from 'zod';

import { type FileConfig, configSchema } from '@/cli/config/schema';
import { ConfigError } from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILE_NAMES = [
  'examples.config.yml',
  'examples.config.yaml',
  'examples.config.json',
] as const;

/** Nearest config file walking up from `dir`; null when none exists. */
export const findConfigPathSync = (dir: string): string | null => {
  let cur = path.resolve(dir);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(cur, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

/** JSON when the path ends with ".json", YAML otherwise. */
export const parseText = (p: string, text: string): unknown =>
  p.endsWith('.json')
    ? (JSON.parse(text) as unknown)
    : (YAML.parse(text) as unknown);

const formatZodError = (e: ZodError): string =>
  e.issues
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('\n');

export type LoadedConfig = {
  /** Config file path, or null when running on built-ins. */
  path: string | null;
  /** Directory relative settings resolve against. */
  root: string;
  config: FileConfig;
};

/**
 * Load the config file given explicitly, else the nearest one above `cwd`.
 * An empty file counts as `{}`.
 *
 * @throws ConfigError when an explicit file is missing, or the file does not
 * parse or validate.
 */
export const loadConfig = async (
  cwd: string,
  explicit?: string,
): Promise<LoadedConfig> => {
  const p = explicit ? path.resolve(cwd, explicit) : findConfigPathSync(cwd);
  if (!p) {
    debugLog(DBG_SCOPE_CONFIG_LOAD, `no config file above ${cwd}`);
    return { path: null, root: cwd, config: {} };
  }
  if (!existsSync(p)) throw new ConfigError(`config file not found: ${p}`);

  let raw: unknown;
  try {
    raw = parseText(p, await readFile(p, 'utf8'));
  } catch (e) {
    throw new ConfigError(
      `unable to parse ${p}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
  try {
    const config = configSchema.parse(raw ?? {});
    debugLog(DBG_SCOPE_CONFIG_LOAD, `loaded ${p}`);
    return { path: p, root: path.dirname(p), config };
  } catch (e) {
    if (e instanceof ZodError) {
      throw new ConfigError(`invalid config ${p}:\n${formatZodError(e)}`);
    }
    throw e;
  }
};
