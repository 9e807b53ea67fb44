/* src/cli/config/schema.ts
 * Zod schema for examples.config.* (all keys optional; unknown keys rejected).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

// Env values may be written unquoted in YAML (RUST_BACKTRACE: 1).
const envValue = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((v) => String(v));

export const configSchema = z
  .object({
    dir: z
      .string()
      .min(1, { message: 'dir must be a non-empty string' })
      .optional(),
    pattern: z
      .string()
      .min(1, { message: 'pattern must be a non-empty string' })
      .optional(),
    sort: coerceBool,
    command: z
      .array(z.string().min(1, { message: 'command tokens must be non-empty' }))
      .min(1, { message: 'command must name a program' })
      .optional(),
    env: z.record(z.string(), envValue).optional(),
    stream: coerceBool,
    logDir: z
      .string()
      .min(1, { message: 'logDir must be a non-empty string' })
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof configSchema>;
