/* src/runner/exec/run-one.ts
 * Single-example execution (direct spawn, stdout/stderr capture, optional
 * console echo and per-example log file).
 */
import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { createWriteStream, type WriteStream } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

import fse from 'fs-extra';

import { exitCodeFor } from '@/runner/exec/util';
import type { Invocation, InvocationResult } from '@/runner/types';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_EXEC } from '@/runner/util/debug-scopes';

export type RunOneOptions = {
  /** Child working directory. */
  cwd: string;
  /** Echo child output to this process's stdout/stderr as it arrives. */
  stream?: boolean;
  /** When set, combined output is also written to this file. */
  logFile?: string;
};

/** Create and open the log file; rejects (EISDIR, EACCES, ...) before any spawn. */
const openLog = async (file: string): Promise<WriteStream> => {
  await fse.ensureDir(path.dirname(file));
  const log = createWriteStream(file);
  await once(log, 'open');
  log.on('error', (e) => {
    debugLog(DBG_SCOPE_EXEC, `log write failed: ${e.message}`);
  });
  return log;
};

/**
 * Spawn one invocation without a shell and wait for it to exit.
 * Resolves with the exit status and captured output; rejects when the log
 * file cannot be opened or written, or the process could not be spawned.
 */
export const runOne = async (
  invocation: Invocation,
  opts: RunOneOptions,
): Promise<InvocationResult> => {
  const log = opts.logFile ? await openLog(opts.logFile) : undefined;
  const logNote = opts.logFile ? ` (log: ${opts.logFile})` : '';
  debugLog(DBG_SCOPE_EXEC, `spawn ${invocation.program} in ${opts.cwd}${logNote}`);

  const startedAt = Date.now();
  const child = spawn(invocation.program, invocation.args, {
    cwd: opts.cwd,
    env: invocation.env,
    windowsHide: true,
    stdio: ['inherit', 'pipe', 'pipe'],
  });

  // Raw chunks; decoded once at exit so multi-byte characters split across
  // chunks survive.
  const outChunks: Buffer[] = [];
  const errChunks: Buffer[] = [];
  child.stdout.on('data', (d: Buffer) => {
    outChunks.push(d);
    log?.write(d);
    if (opts.stream) process.stdout.write(d);
  });
  child.stderr.on('data', (d: Buffer) => {
    errChunks.push(d);
    log?.write(d);
    if (opts.stream) process.stderr.write(d);
  });

  try {
    const { code, signal } = await new Promise<{
      code: number | null;
      signal: NodeJS.Signals | null;
    }>((resolveP, rejectP) => {
      child.on('error', (e) =>
        rejectP(e instanceof Error ? e : new Error(String(e))),
      );
      child.on('close', (c, s) => resolveP({ code: c, signal: s }));
    });
    return {
      exitCode: exitCodeFor(code, signal),
      signal,
      stdout: Buffer.concat(outChunks).toString('utf8'),
      stderr: Buffer.concat(errChunks).toString('utf8'),
      durationMs: Date.now() - startedAt,
    };
  } finally {
    if (log) {
      log.end();
      // settles even when the stream already errored or closed
      await finished(log);
    }
  }
};
