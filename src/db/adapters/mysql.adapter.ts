import { Connection, PreparedStatementInfo, createConnection } from 'mysql2/promise';
import { BindParam, DatabaseAdapter, DatabaseConfig, PreparedHandle, QueryResult, Row } from '../database.interface';
import { toDriverValue } from '../params';
import { Logger } from '../../utils/logger';
import {
  BindError,
  ConnectionError,
  ExecuteError,
  PrepareError,
  describeDriverError,
  toError
} from '../../utils/errors';

const DEFAULT_PORT = 3306;

// Server and client errors that mean the values did not fit the placeholders
const BIND_ERROR_CODES = new Set(['ER_WRONG_ARGUMENTS', 'ER_WRONG_PARAMCOUNT_TO_PROCEDURE']);
const BIND_ERROR_MESSAGES = ['Bind parameters must not contain undefined', 'Bind parameters must be array'];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isBindFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (code && BIND_ERROR_CODES.has(code)) return true;
  const message = describeDriverError(error);
  return BIND_ERROR_MESSAGES.some(text => message.includes(text));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numericField(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint' || typeof value === 'string') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function fieldNames(fields: unknown): string[] {
  if (!Array.isArray(fields)) return [];
  const names: string[] = [];
  for (const field of fields) {
    if (isRecord(field) && typeof field.name === 'string') {
      names.push(field.name);
    }
  }
  return names;
}

/**
 * Normalizes what mysql2 returns for an executed statement: an array of rows
 * for result-set statements, a ResultSetHeader for everything else. A CALL
 * returns one row array per result set followed by a header; the first result
 * set is the one reported.
 */
export function toQueryResult(result: unknown, fields: unknown): QueryResult {
  if (Array.isArray(result) && Array.isArray(result[0])) {
    return toQueryResult(result[0], Array.isArray(fields) ? fields[0] : undefined);
  }

  if (Array.isArray(result)) {
    const rows: Row[] = result.filter(isRecord).map(row => ({ ...row }));
    const names = fieldNames(fields);
    return {
      rows,
      rowCount: rows.length,
      fields: names.length > 0 ? names : Object.keys(rows[0] ?? {}),
      affectedRows: 0,
      insertId: 0
    };
  }

  if (isRecord(result)) {
    return {
      rows: [],
      rowCount: 0,
      fields: [],
      affectedRows: numericField(result, 'affectedRows'),
      insertId: numericField(result, 'insertId')
    };
  }

  return { rows: [], rowCount: 0, fields: [], affectedRows: 0, insertId: 0 };
}

class MysqlPreparedHandle implements PreparedHandle {
  constructor(
    private readonly statement: PreparedStatementInfo,
    private readonly sql: string,
    private readonly logger: Logger
  ) {}

  async execute(params: ReadonlyArray<BindParam>): Promise<QueryResult> {
    const values = params.map(toDriverValue);
    try {
      const [result, fields] = await this.statement.execute(values);
      return toQueryResult(result, fields);
    } catch (error) {
      const message = describeDriverError(error);
      if (isBindFailure(error)) {
        throw new BindError(`Failed to bind parameters: ${message}`, { sql: this.sql, count: values.length }, toError(error));
      }
      throw new ExecuteError(`Query execution failed: ${message}`, { sql: this.sql }, toError(error), errorCode(error));
    }
  }

  async close(): Promise<void> {
    try {
      await this.statement.close();
    } catch (error) {
      // The result is already in hand; a failed unprepare only leaks a server handle
      this.logger.warn('Failed to close prepared statement', { sql: this.sql }, error);
    }
  }
}

export class MysqlAdapter implements DatabaseAdapter {
  private connection: Connection | null = null;
  private connected = false;
  private logger = Logger.getInstance().createChildLogger({ class: 'MysqlAdapter' });

  async connect(config: DatabaseConfig): Promise<void> {
    const port = config.port ?? DEFAULT_PORT;
    this.logger.info(`Connecting to MySQL database: ${config.database}`, { method: 'connect' }, {
      host: config.host,
      port,
      user: config.username
    });

    let connection: Connection;
    try {
      connection = await createConnection({
        host: config.host,
        port,
        user: config.username,
        password: config.password,
        database: config.database
      });
    } catch (error) {
      throw new ConnectionError(
        `Connection failed: ${describeDriverError(error)}`,
        { host: config.host, port, database: config.database },
        toError(error)
      );
    }

    try {
      await connection.query('SET NAMES ?', [config.charset]);
    } catch (error) {
      connection.destroy();
      throw new ConnectionError(
        `Error loading character set ${config.charset}: ${describeDriverError(error)}`,
        { charset: config.charset },
        toError(error)
      );
    }

    this.connection = connection;
    this.connected = true;
    this.logger.debug(`Character set ${config.charset} applied`, { method: 'connect' });
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.connected = false;
    if (!connection) return;

    this.logger.info('Disconnecting from MySQL', { method: 'disconnect' });
    try {
      await connection.end();
    } catch (error) {
      connection.destroy();
      throw new ConnectionError(`Failed to close connection: ${describeDriverError(error)}`, {}, toError(error));
    }
  }

  async prepare(sql: string): Promise<PreparedHandle> {
    const connection = this.requireConnection();
    try {
      const statement = await connection.prepare(sql);
      return new MysqlPreparedHandle(statement, sql, this.logger);
    } catch (error) {
      throw new PrepareError(`Failed to prepare statement: ${describeDriverError(error)}`, sql, {}, toError(error));
    }
  }

  async beginTransaction(): Promise<void> {
    await this.runControl('beginTransaction', connection => connection.beginTransaction());
  }

  async commit(): Promise<void> {
    await this.runControl('commit', connection => connection.commit());
  }

  async rollback(): Promise<void> {
    await this.runControl('rollback', connection => connection.rollback());
  }

  isConnected(): boolean {
    return this.connected;
  }

  private async runControl(operation: string, control: (connection: Connection) => Promise<void>): Promise<void> {
    const connection = this.requireConnection();
    this.logger.debug(`Transaction ${operation}`, { method: operation });
    try {
      await control(connection);
    } catch (error) {
      throw new ExecuteError(
        `Transaction ${operation} failed: ${describeDriverError(error)}`,
        { operation },
        toError(error),
        errorCode(error)
      );
    }
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new ConnectionError('Database not connected');
    }
    return this.connection;
  }
}
