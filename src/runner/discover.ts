/* src/runner/discover.ts
 * Example discovery (glob) and selection.
 */
import { statSync } from 'node:fs';
import path from 'node:path';

import fg from 'fast-glob';

import type { Example, Selection } from '@/runner/types';
import { warn } from '@/runner/util/color';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_DISCOVER } from '@/runner/util/debug-scopes';

const isDir = (p: string): boolean => {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
};

/** Example name: base name with the extension stripped. */
export const exampleName = (file: string): string =>
  path.basename(file, path.extname(file));

/** "<dir>/<pattern>" with forward slashes, for messages. */
export const displayGlob = (dir: string, pattern: string): string =>
  path.posix.join(dir.replace(/\\/g, '/'), pattern);

const byName = (a: Example, b: Example): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Enumerate example files matching `pattern` in `dir`.
 *
 * @param root - Run root that a relative `dir` resolves against.
 * @param dir - Examples directory.
 * @param pattern - Glob matched inside `dir`.
 * @param sort - Order lexically by name; otherwise keep glob order.
 */
export const discoverExamples = async (
  root: string,
  dir: string,
  pattern: string,
  sort = false,
): Promise<Example[]> => {
  const abs = path.resolve(root, dir);
  if (!isDir(abs)) {
    debugLog(DBG_SCOPE_DISCOVER, `no such directory ${abs}`);
    return [];
  }
  const entries = await fg(pattern, {
    cwd: abs,
    absolute: true,
    onlyFiles: true,
  });
  const examples = entries.map((p) => ({
    name: exampleName(p),
    path: path.normalize(p),
  }));
  debugLog(
    DBG_SCOPE_DISCOVER,
    `${examples.length.toString()} match(es) for ${pattern} in ${abs}`,
  );
  return sort ? [...examples].sort(byName) : examples;
};

/**
 * Apply select/except to the discovered list, keeping discovery order.
 * Unknown names are reported once as a warning.
 */
export const selectExamples = (
  examples: Example[],
  selection?: Selection,
): Example[] => {
  const select = selection?.select;
  const except = selection?.except ?? [];
  const known = new Set(examples.map((e) => e.name));
  const unknown = [...(select ?? []), ...except].filter(
    (n, i, all) => !known.has(n) && all.indexOf(n) === i,
  );
  if (unknown.length) {
    console.log(warn(`examples: unknown example(s): ${unknown.join(', ')}`));
  }
  const keep = select ? new Set(select) : null;
  const drop = new Set(except);
  return examples.filter(
    (e) => (keep ? keep.has(e.name) : true) && !drop.has(e.name),
  );
};
