import { z } from 'zod';

/**
 * Environment configuration schema using Zod for runtime validation.
 * All environment variables are validated at startup; missing or
 * malformed values cause an immediate, descriptive failure.
 */
const envSchema = z.object({
  // --- Database ---
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default('10'),

  // --- Auth ---
  JWT_PUBLIC_KEY_PATH: z.string().min(1),
  JWT_ISSUER: z.string().min(1).default('office-custody'),

  // --- Custody rules ---
  RECEIVE_SECTION_CODE: z.string().min(1).default('RCV'),

  // --- General ---
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  PORT: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive().max(65535)).default('3001'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().transform((val) => val.split(',').map((s) => s.trim())).default('http://localhost:3000'),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Returns the list of problems instead of exiting
 * so that callers other than the server entry point can inspect them.
 */
export function parseConfig(env: NodeJS.ProcessEnv): { ok: true; config: EnvConfig } | { ok: false; problems: string[] } {
  const result = envSchema.safeParse(env);

  if (result.success) {
    return { ok: true, config: result.data };
  }

  const problems: string[] = [];
  for (const [key, messages] of Object.entries(result.error.flatten().fieldErrors)) {
    if (messages && messages.length > 0) {
      problems.push(`  ${key}: ${messages.join(', ')}`);
    }
  }
  return { ok: false, problems };
}

export function loadConfig(): EnvConfig {
  const parsed = parseConfig(process.env);

  if (!parsed.ok) {
    const errorMessage = [
      '',
      '========================================',
      ' Custody Tracker: Environment Validation Failed',
      '========================================',
      '',
      'The following environment variables are missing or invalid:',
      '',
      ...parsed.problems,
      '',
      'Copy .env.example to .env and fill in the required values.',
      '========================================',
      '',
    ].join('\n');

    // eslint-disable-next-line no-console
    console.error(errorMessage);
    process.exit(1);
  }

  return parsed.config;
}
