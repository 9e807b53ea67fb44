/* src/runner/run.ts
 * Sequential example runner: discover, announce, invoke, stop at the first
 * failure. The failure is reported once at the top (runAndReport).
 */
import path from 'node:path';

import {
  buildInvocation,
  invocationTokens,
  renderCommandLine,
} from '@/runner/command';
import {
  discoverExamples,
  displayGlob,
  selectExamples,
} from '@/runner/discover';
import { ExampleFailedError } from '@/runner/errors';
import { runOne } from '@/runner/exec/run-one';
import { formatSeconds } from '@/runner/exec/util';
import {
  renderBanner,
  renderFailureReport,
  renderFooter,
} from '@/runner/report';
import type { Example, RunnerConfig, Selection } from '@/runner/types';
import { dim, error, ok } from '@/runner/util/color';

export type RunOptions = {
  selection?: Selection;
  /** Parent environment the overrides are merged into (default process.env). */
  parentEnv?: NodeJS.ProcessEnv;
};

export type RunSummary = {
  /** Names of the examples that ran to success, in order. */
  succeeded: string[];
};

const print = (lines: string[]): void => {
  for (const l of lines) console.log(l);
};

/** Discover and select the examples a run would visit. */
export const resolveExamples = async (
  config: RunnerConfig,
  selection?: Selection,
): Promise<Example[]> =>
  selectExamples(
    await discoverExamples(
      config.root,
      config.dir,
      config.pattern,
      config.sort,
    ),
    selection,
  );

/**
 * Run every example in order. Throws ExampleFailedError at the first
 * non-zero exit; later examples are not started.
 */
export const runExamples = async (
  config: RunnerConfig,
  forwarded: readonly string[],
  opts: RunOptions = {},
): Promise<RunSummary> => {
  const examples = await resolveExamples(config, opts.selection);
  const succeeded: string[] = [];
  if (!examples.length) {
    console.log(
      `examples: no examples matched ${displayGlob(config.dir, config.pattern)}`,
    );
    return { succeeded };
  }
  const logDir = config.logDir
    ? path.resolve(config.root, config.logDir)
    : undefined;

  for (const example of examples) {
    print(renderBanner(example.name));

    const invocation = buildInvocation(
      config.command,
      example.name,
      forwarded,
      config.env,
      opts.parentEnv,
    );
    const tokens = invocationTokens(invocation);
    console.log(`  ${renderCommandLine(tokens)}`);

    const result = await runOne(invocation, {
      cwd: config.root,
      stream: config.stream,
      logFile: logDir ? path.join(logDir, `${example.name}.txt`) : undefined,
    });

    if (result.exitCode !== 0) {
      throw new ExampleFailedError({
        example: example.name,
        command: tokens,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }

    console.log(
      ok(`examples: finished ${example.name}`) +
        dim(` in ${formatSeconds(result.durationMs)}`),
    );
    print(renderFooter());
    succeeded.push(example.name);
  }
  return { succeeded };
};

/**
 * Run all examples and report the first failure, or the number that passed.
 * @returns Process exit code: 0 on success, 1 after a reported failure.
 */
export const runAndReport = async (
  config: RunnerConfig,
  forwarded: readonly string[],
  opts: RunOptions = {},
): Promise<number> => {
  try {
    const { succeeded } = await runExamples(config, forwarded, opts);
    if (succeeded.length) {
      console.log(ok(`examples: ${succeeded.length} example(s) passed`));
    }
    return 0;
  } catch (e) {
    if (!(e instanceof ExampleFailedError)) throw e;
    const lines = renderFailureReport(e);
    const last = lines.pop();
    print(lines);
    if (typeof last === 'string') console.log(error(last));
    return 1;
  }
};
