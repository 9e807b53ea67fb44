/* Root CLI factory for the "run-examples" tool.
 * - Forwards every argument from the first positional/unknown option (or
 *   after "--") to each example invocation.
 * - Never calls process.exit; the exit code goes through setExitCode.
 */
import path from 'node:path';

import { Command, Option } from 'commander';

import { resolveRunnerConfig } from '@/cli/config/effective';
import { loadConfig } from '@/cli/config/load';
import { renderRunPlan } from '@/runner/plan';
import { resolveExamples, runAndReport } from '@/runner/run';
import { error } from '@/runner/util/color';

import { cliBoolean, envFlag, tagDefault } from './cli-utils';

export type RootOptions = {
  config?: string;
  dir?: string;
  pattern?: string;
  sort?: boolean;
  select?: string[];
  except?: string[];
  quiet?: boolean;
  logDir?: string;
  plan?: boolean;
  debug?: boolean;
  boring?: boolean;
};

export type CliDeps = {
  /** Receives the process exit code (default: assigns process.exitCode). */
  setExitCode?: (code: number) => void;
  /** Working directory used for config lookup (default: process.cwd()). */
  cwd?: () => string;
};

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (deps: CliDeps = {}): Command => {
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const getCwd = deps.cwd ?? (() => process.cwd());

  const cli = new Command();
  cli
    .name('run-examples')
    .description(
      'Build and run every example program in order; stop at the first failure.',
    )
    .argument('[args...]', 'arguments forwarded to every example')
    .allowUnknownOption()
    .passThroughOptions()
    .exitOverride();

  cli
    .option(
      '-c, --config <file>',
      'config file (default: nearest examples.config.*)',
    )
    .option('--dir <dir>', 'examples directory (default: examples)')
    .option('--pattern <glob>', 'example file glob (default: *.rs)')
    .option('-s, --select <names...>', 'run only these examples')
    .option('-x, --except <names...>', 'skip these examples')
    .option('-q, --quiet', 'capture child output without echoing it')
    .option(
      '-l, --log-dir <dir>',
      'write each example’s output to <dir>/<name>.txt',
    )
    .option('-p, --plan', 'print the run plan and exit without running');

  const optSort = new Option('--sort', 'run examples in lexical order');
  const optNoSort = new Option('--no-sort', 'run examples in glob order');
  tagDefault(optNoSort, true);
  cli.addOption(optSort).addOption(optNoSort);

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  // Apply -d/-b to the environment before the action runs.
  cli.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<RootOptions>();
    const debug = cliBoolean(thisCommand, 'debug', opts.debug);
    const boring = cliBoolean(thisCommand, 'boring', opts.boring);
    // An explicit EXAMPLES_DEBUG=1 survives unless negated on the CLI.
    const debugFinal = debug ?? envFlag(process.env.EXAMPLES_DEBUG);
    if (debugFinal) process.env.EXAMPLES_DEBUG = '1';
    else delete process.env.EXAMPLES_DEBUG;
    if (boring === true) {
      process.env.EXAMPLES_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    } else if (boring === false) {
      delete process.env.EXAMPLES_BORING;
      delete process.env.FORCE_COLOR;
      delete process.env.NO_COLOR;
    }
  });

  cli.action(async (args: string[], opts: RootOptions) => {
    const cwd = getCwd();
    try {
      const loaded = await loadConfig(cwd, opts.config);
      const config = resolveRunnerConfig(loaded, {
        dir: opts.dir ? path.resolve(cwd, opts.dir) : undefined,
        pattern: opts.pattern,
        sort: cliBoolean(cli, 'sort', opts.sort),
        stream: opts.quiet ? false : undefined,
        logDir: opts.logDir ? path.resolve(cwd, opts.logDir) : undefined,
      });
      const selection = { select: opts.select, except: opts.except };

      if (opts.plan) {
        const examples = await resolveExamples(config, selection);
        console.log(renderRunPlan(config, examples, args));
        setExitCode(0);
        return;
      }
      setExitCode(await runAndReport(config, args, { selection }));
    } catch (e) {
      console.error(
        error(`examples: error: ${e instanceof Error ? e.message : String(e)}`),
      );
      setExitCode(1);
    }
  });

  return cli;
};
