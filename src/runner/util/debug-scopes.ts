/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog notices.
 * Tests reference these exact tokens in expectations.
 */

/** config file lookup and parsing */
export const DBG_SCOPE_CONFIG_LOAD = 'cli.config:load';

/** example discovery (glob, missing directory) */
export const DBG_SCOPE_DISCOVER = 'runner.discover';

/** child invocation (resolved program, env overrides) */
export const DBG_SCOPE_EXEC = 'runner.exec:runOne';
