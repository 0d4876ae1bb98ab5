import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Parse the library's environment settings.
 *
 * Unlike a server entry point this never exits the process: invalid values
 * are reported on stderr and replaced by their defaults. Variables the
 * library does not read are ignored.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    console.warn(`Environment validation failed, using defaults:\n${errors}`);
    return EnvSchema.parse({});
  }
  return result.data;
}
