import { z } from 'zod';

const configSchema = z.object({
  // Garmin Connect
  garminEmail: z.string().min(1).optional(),
  garminPassword: z.string().min(1).optional(),
  garthHome: z.string().min(1).default('~/.garth'),

  // App
  timezone: z.string().default('UTC'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    garminEmail: env('GARMIN_EMAIL'),
    garminPassword: env('GARMIN_PASSWORD'),
    garthHome: env('GARTH_HOME'),
    timezone: env('TIMEZONE'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new Error(`Configuration validation failed:\n${issues.join('\n')}`);
    }
    throw error;
  }
}

export const config = loadConfig();
