/* src/runner/exec/util.ts
 * Exit-status and timing helpers for child execution.
 */
import { constants } from 'node:os';

/** Shell convention: a child killed by signal N reports 128 + N. */
export const exitCodeFor = (
  code: number | null,
  signal: NodeJS.Signals | null,
): number => {
  if (typeof code === 'number') return code;
  if (signal) {
    for (const [name, num] of Object.entries(constants.signals)) {
      if (name === signal) return 128 + Number(num);
    }
  }
  return 1;
};

/** Seconds with two decimals, e.g. "1.25s". */
export const formatSeconds = (ms: number): string =>
  `${(Math.max(0, ms) / 1000).toFixed(2)}s`;
