/* src/runner/report.ts
 * Console banners and the failure report.
 */
import type { ExampleFailedError } from '@/runner/errors';

export const SEPARATOR = '='.repeat(45);

/** Lines printed before an example runs (separator, blank, announcement). */
export const renderBanner = (name: string): string[] => [
  SEPARATOR,
  '',
  `Running example: ${name}`,
];

/** Lines printed after an example succeeds. */
export const renderFooter = (): string[] => ['', SEPARATOR];

const trimTrailingNewline = (s: string): string => s.replace(/\r?\n$/, '');

/**
 * Failure report: only non-empty streams get a heading, then a blank line
 * and the exit status.
 */
export const renderFailureReport = (
  err: Pick<ExampleFailedError, 'stdout' | 'stderr' | 'exitCode'>,
): string[] => {
  const lines: string[] = [];
  if (err.stdout.length) {
    lines.push('===== STDOUT =====', trimTrailingNewline(err.stdout));
  }
  if (err.stderr.length) {
    lines.push('===== STDERR =====', trimTrailingNewline(err.stderr));
  }
  lines.push(
    '',
    `Process returned non-zero exit status ${err.exitCode.toString()}`,
  );
  return lines;
};
