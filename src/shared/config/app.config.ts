export type Environment = 'production' | 'test' | 'development';

export interface AppConfig {
  port: number;
  databasePath: string;
  environment: Environment;
  logLevel: 'info' | 'debug' | 'silent';
}

const DEFAULT_PORT = 5555;
const DEFAULT_DATABASE_PATH = 'app.db';

function parseEnvironment(value: string | undefined): Environment {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

function parsePort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${value}`);
  }
  return port;
}

/**
 * Reads configuration from the environment. `DATABASE_PATH` accepts
 * `:memory:` for an in-process database.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const environment = parseEnvironment(env.NODE_ENV);

  let logLevel: AppConfig['logLevel'] = 'debug';
  if (environment === 'production') logLevel = 'info';
  if (environment === 'test') logLevel = 'silent';

  return {
    port: parsePort(env.PORT),
    databasePath: env.DATABASE_PATH || DEFAULT_DATABASE_PATH,
    environment,
    logLevel,
  };
}
