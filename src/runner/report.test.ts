import { describe, expect, it } from 'vitest';

import { ExampleFailedError } from './errors';
import {
  renderBanner,
  renderFailureReport,
  renderFooter,
  SEPARATOR,
} from './report';

const failure = (stdout: string, stderr: string, exitCode = 101) =>
  new ExampleFailedError({
    example: 'basic',
    command: ['cargo', 'run', '--release', '--example', 'basic'],
    exitCode,
    stdout,
    stderr,
  });

describe('banners', () => {
  it('announces an example after a separator and a blank line', () => {
    expect(SEPARATOR).toBe('='.repeat(45));
    expect(renderBanner('basic')).toEqual([
      SEPARATOR,
      '',
      'Running example: basic',
    ]);
    expect(renderFooter()).toEqual(['', SEPARATOR]);
  });
});

describe('renderFailureReport', () => {
  it('prints both streams under headings, then the exit status', () => {
    expect(renderFailureReport(failure('partial output\n', 'boom\n'))).toEqual([
      '===== STDOUT =====',
      'partial output',
      '===== STDERR =====',
      'boom',
      '',
      'Process returned non-zero exit status 101',
    ]);
  });

  it('omits the STDOUT heading when stdout is empty', () => {
    const lines = renderFailureReport(failure('', 'boom', 2));
    expect(lines).not.toContain('===== STDOUT =====');
    expect(lines).toEqual([
      '===== STDERR =====',
      'boom',
      '',
      'Process returned non-zero exit status 2',
    ]);
  });

  it('prints only the status when nothing was captured', () => {
    expect(renderFailureReport(failure('', '', 1))).toEqual([
      '',
      'Process returned non-zero exit status 1',
    ]);
  });
});

describe('ExampleFailedError', () => {
  it('carries the failure details', () => {
    const e = failure('out', 'err', 3);
    expect(e).toBeInstanceOf(Error);
    expect(e.name).toBe('ExampleFailedError');
    expect(e.message).toBe('example "basic" returned non-zero exit status 3');
    expect(e.command.at(-1)).toBe('basic');
  });
});
