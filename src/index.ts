import { loadEnvFile } from './utils/env';

loadEnvFile();

export { ConnectionManager } from './db/connectionManager';
export type { ConnectionManagerOptions, ErrorPolicy } from './db/connectionManager';
export { PreparedStatement } from './db/preparedStatement';
export { MysqlAdapter, toQueryResult } from './db/adapters/mysql.adapter';
export { loadDatabaseConfig, loadErrorPolicy, DEFAULT_CHARSET } from './db/config';
export {
  PARAM_TYPE_TAGS,
  inferParamKind,
  isBindParam,
  paramTypes,
  toBindParam,
  toBindParams,
  toDriverValue
} from './db/params';
export type { ParamInput } from './db/params';
export type {
  AdapterFactory,
  BindParam,
  DatabaseAdapter,
  DatabaseConfig,
  ParamKind,
  PreparedHandle,
  QueryResult,
  Row,
  ScalarValue
} from './db/database.interface';
export {
  BindError,
  ConfigurationError,
  ConnectionError,
  DatabaseError,
  ExecuteError,
  PrepareError
} from './utils/errors';
export type { ErrorStage } from './utils/errors';
export { Logger, LogLevel, loggerConfigFromEnv, parseLogLevel } from './utils/logger';
export type { LogContext, LoggerConfig } from './utils/logger';
export { EnvManager, loadEnvFile } from './utils/env';
export { ConfigValidator } from './utils/config-validator';
export { ProcessCleanup, registerConnectionCleanup } from './utils/processCleanup';
