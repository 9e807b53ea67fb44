/* src/runner/util/color.ts
 * Semantic colours for runner notices. Plain text under EXAMPLES_BORING,
 * NO_COLOR, FORCE_COLOR=0, or when stdout is not a terminal.
 */
import chalk from 'chalk';

export const isBoring = (): boolean =>
  process.env.EXAMPLES_BORING === '1' ||
  process.env.NO_COLOR === '1' ||
  process.env.FORCE_COLOR === '0' ||
  // checked per call: stdout may be redirected after load
  !process.stdout.isTTY;

type Paint = (s: string) => string;

const paint =
  (style: Paint): Paint =>
  (s) =>
    isBoring() ? s : style(s);

export const ok = paint(chalk.green);
export const error = paint(chalk.red);
export const warn = paint(chalk.hex('#FFA500'));
export const bold = paint(chalk.bold);
export const dim = paint(chalk.dim);
