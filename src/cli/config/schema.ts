/* src/cli/config/schema.ts
 * Zod schema for script-debugger.config.* (interpreter, timeout, CLI defaults).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

export const configSchema = z
  .object({
    interpreter: z
      .string()
      .trim()
      .min(1, { message: 'interpreter must be a non-empty command' })
      .optional(),
    timeout: z.coerce.number().int().positive().optional(),
    timeoutGrace: z.coerce.number().int().positive().optional(),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type DebuggerConfig = z.infer<typeof configSchema>;
