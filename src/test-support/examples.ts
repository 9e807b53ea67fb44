// src/test-support/examples.ts
// Temporary example workspaces driven by a fake build tool (a node script
// that records each call and fails on demand, optionally splitting a
// multi-byte character across two writes).
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { RunnerConfig } from '@/runner/types';

const FAKE_TOOL = `import { appendFileSync } from 'node:fs';
const args = process.argv.slice(2);
const name = args[args.indexOf('--example') + 1];
appendFileSync(
  process.env.FAKE_CALLS,
  JSON.stringify({
    args,
    cwd: process.cwd(),
    backtrace: process.env.RUST_BACKTRACE ?? null,
    inherited: process.env.FAKE_INHERITED ?? null,
  }) + '\\n',
);
if (name === process.env.FAKE_SPLIT) {
  // one euro sign split across two writes, then fail
  process.stdout.write(Buffer.from([0xe2, 0x82]));
  setTimeout(() => {
    process.stdout.write(Buffer.from([0xac, 0x0a]));
    process.exitCode = Number(process.env.FAKE_CODE ?? '1');
  }, 200);
} else if (name === process.env.FAKE_FAIL) {
  if (process.env.FAKE_STDOUT) process.stdout.write(process.env.FAKE_STDOUT);
  if (process.env.FAKE_STDERR) process.stderr.write(process.env.FAKE_STDERR);
  process.exit(Number(process.env.FAKE_CODE ?? '1'));
} else {
  process.stdout.write('ran ' + name + '\\n');
}
`;

export type RecordedCall = {
  args: string[];
  cwd: string;
  backtrace: string | null;
  inherited: string | null;
};

export type ExampleWorkspace = {
  root: string;
  toolPath: string;
  callsPath: string;
  /** Prefix shaped like `cargo run --release --example`. */
  command: string[];
  /** Runner config for this workspace (sorted, quiet). */
  config: (over?: Partial<RunnerConfig>) => RunnerConfig;
  /** Calls recorded by the fake tool, in order ([] when none). */
  calls: () => Promise<RecordedCall[]>;
  cleanup: () => Promise<void>;
};

export const makeExampleWorkspace = async (
  names: string[],
  ext = '.rs',
): Promise<ExampleWorkspace> => {
  const root = await mkdtemp(path.join(os.tmpdir(), 'examples-ws-'));
  await mkdir(path.join(root, 'examples'), { recursive: true });
  for (const n of names) {
    await writeFile(path.join(root, 'examples', `${n}${ext}`), '// example\n');
  }
  const toolPath = path.join(root, 'fake-tool.mjs');
  await writeFile(toolPath, FAKE_TOOL, 'utf8');
  const callsPath = path.join(root, 'calls.jsonl');
  const command = [process.execPath, toolPath, 'run', '--release', '--example'];

  const calls = async (): Promise<RecordedCall[]> => {
    if (!existsSync(callsPath)) return [];
    const body = await readFile(callsPath, 'utf8');
    return body
      .split('\n')
      .filter((l) => l.trim().length > 0)
      .map((l): RecordedCall => JSON.parse(l));
  };

  return {
    root,
    toolPath,
    callsPath,
    command,
    config: (over = {}) => ({
      root,
      dir: 'examples',
      pattern: `*${ext}`,
      sort: true,
      command,
      env: { RUST_BACKTRACE: '1', FAKE_CALLS: callsPath },
      stream: false,
      ...over,
    }),
    calls,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
};

/** Flatten console spy calls into printed lines (first argument only). */
export const printedLines = (calls: unknown[][]): string[] =>
  calls.map((c) => (typeof c[0] === 'string' ? c[0] : String(c[0])));
