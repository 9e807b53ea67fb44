import { describe, expect, it } from 'vitest';

import { renderRunPlan } from './plan';
import type { RunnerConfig } from './types';

const config: RunnerConfig = {
  root: '/repo',
  dir: 'examples',
  pattern: '*.rs',
  sort: false,
  command: ['cargo', 'run', '--release', '--example'],
  env: { RUST_BACKTRACE: '1' },
  stream: true,
};

describe('renderRunPlan', () => {
  it('summarizes the resolved run', () => {
    const plan = renderRunPlan(
      config,
      [
        { name: 'simple', path: '/repo/examples/simple.rs' },
        { name: 'hier', path: '/repo/examples/hier.rs' },
      ],
      ['--samples', '4 8'],
    );
    expect(plan.split('\n')).toEqual([
      'examples:',
      '  run plan',
      '  root: /repo',
      '  examples: examples/*.rs',
      '  order: glob',
      "  command: cargo run --release --example <name> --samples '4 8'",
      '  env: RUST_BACKTRACE=1',
      '  stream: yes',
      '  logs: none',
      '  selected: simple, hier',
    ]);
  });

  it('renders empty selections and sorted order', () => {
    const plan = renderRunPlan(
      { ...config, sort: true, env: {}, stream: false, logDir: 'logs' },
      [],
      [],
    );
    expect(plan).toContain('  order: sorted');
    expect(plan).toContain('  command: cargo run --release --example <name>\n');
    expect(plan).toContain('  env: none');
    expect(plan).toContain('  stream: no');
    expect(plan).toContain('  logs: logs');
    expect(plan.endsWith('  selected: none')).toBe(true);
  });
});
