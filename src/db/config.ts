import { DatabaseConfig } from './database.interface';
import { ConfigValidator } from '../utils/config-validator';
import { ConfigurationError } from '../utils/errors';
import { EnvManager } from '../utils/env';

export const DEFAULT_CHARSET = 'utf8mb4';

/**
 * What happens when a database operation fails:
 * `throw` rejects with the typed error, `exit` logs it and ends the process.
 */
export type ErrorPolicy = 'throw' | 'exit';

/**
 * Reads DB_HOST, DB_PORT, DB_USER, DB_PASSWORD, DB_NAME and DB_CHARSET.
 */
export function loadDatabaseConfig(env: EnvManager = EnvManager.getInstance()): DatabaseConfig {
  const rawPort = env.get('DB_PORT');
  const port = rawPort === undefined ? 3306 : Number(rawPort);

  const config: DatabaseConfig = {
    host: env.get('DB_HOST', 'localhost') ?? 'localhost',
    port,
    username: env.get('DB_USER', 'root') ?? 'root',
    password: env.get('DB_PASSWORD', '') ?? '',
    database: env.get('DB_NAME', '') ?? '',
    charset: env.get('DB_CHARSET', DEFAULT_CHARSET) ?? DEFAULT_CHARSET
  };

  const { valid, issues } = ConfigValidator.validate(config);
  if (!valid) {
    throw new ConfigurationError(issues, { host: config.host, database: config.database });
  }
  return config;
}

export function loadErrorPolicy(env: EnvManager = EnvManager.getInstance()): ErrorPolicy {
  const value = env.get('DB_ERROR_POLICY', 'throw')?.trim().toLowerCase();
  if (value === 'throw' || value === 'exit') return value;
  throw new ConfigurationError([`Unknown DB_ERROR_POLICY: "${value}"`]);
}
