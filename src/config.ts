import { z } from 'zod';
import { ConfigurationError } from './errors';

const DEV_ENVIRONMENTS = ['local', 'dev', 'development'];

const schema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('production'),
});

export type LogLevel = z.infer<typeof schema>['LOG_LEVEL'];

export interface Config {
  logLevel: LogLevel;
  nodeEnv: string;
  isDev: boolean;
}

/**
 * Read settings from an environment object. Unset or empty variables take their defaults.
 *
 * @throws ConfigurationError when a variable is set to an unsupported value.
 */
export const loadConfig = (env: NodeJS.ProcessEnv): Config => {
  const parsed = schema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    NODE_ENV: env.NODE_ENV || undefined,
  });

  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    nodeEnv: parsed.data.NODE_ENV,
    isDev: DEV_ENVIRONMENTS.includes(parsed.data.NODE_ENV),
  };
};

/**
 * Settings from `process.env`, read when the package is first imported.
 * An invalid `LOG_LEVEL` makes that import throw ConfigurationError.
 */
export const config = loadConfig(process.env);
