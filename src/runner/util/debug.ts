/* src/runner/util/debug.ts
 * Opt-in debug logger. Emits only when EXAMPLES_DEBUG=1.
 */

export const debugOn = (): boolean => process.env.EXAMPLES_DEBUG === '1';

/** Log a scoped debug notice on stderr (scope: module:function). */
export const debugLog = (scope: string, message: string): void => {
  if (!debugOn()) return;
  console.error(`examples: debug: ${scope}: ${message}`);
};
