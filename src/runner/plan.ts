// src/runner/plan.ts
import { renderCommandLine } from '@/runner/command';
import { displayGlob } from '@/runner/discover';
import type { Example, RunnerConfig } from '@/runner/types';
import { bold } from '@/runner/util/color';

/**
 * Render a readable, multi‑line summary of what a run would do (pure).
 *
 * @param config - Effective runner configuration.
 * @param examples - Examples after discovery and selection.
 * @param forwarded - Arguments forwarded to every child.
 */
export const renderRunPlan = (
  config: RunnerConfig,
  examples: Example[],
  forwarded: readonly string[],
): string => {
  const command = [
    renderCommandLine(config.command),
    '<name>',
    renderCommandLine(forwarded),
  ].filter(Boolean);
  const env = Object.entries(config.env).map(([k, v]) => `${k}=${v}`);
  const names = examples.map((e) => e.name);
  const lines = [
    bold('run plan'),
    `root: ${config.root}`,
    `examples: ${displayGlob(config.dir, config.pattern)}`,
    `order: ${config.sort ? 'sorted' : 'glob'}`,
    `command: ${command.join(' ')}`,
    `env: ${env.length ? env.join(', ') : 'none'}`,
    `stream: ${config.stream ? 'yes' : 'no'}`,
    `logs: ${config.logDir ?? 'none'}`,
    `selected: ${names.length ? names.join(', ') : 'none'}`,
  ];
  return `examples:\n  ${lines.join('\n  ')}`;
};
