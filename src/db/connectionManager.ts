import { AdapterFactory, DatabaseAdapter, DatabaseConfig, Row } from './database.interface';
import { MysqlAdapter } from './adapters/mysql.adapter';
import { PreparedStatement } from './preparedStatement';
import { PARAM_TYPE_TAGS, ParamInput, toBindParams } from './params';
import { ErrorPolicy, loadDatabaseConfig, loadErrorPolicy } from './config';
import { EnvManager } from '../utils/env';
import { Logger } from '../utils/logger';
import {
  ConnectionError,
  DatabaseError,
  ErrorStage,
  ExecuteError,
  PrepareError,
  BindError,
  toError
} from '../utils/errors';

export interface ConnectionManagerOptions {
  port?: number;
  errorPolicy?: ErrorPolicy;
  adapterFactory?: AdapterFactory;
}

export type { ErrorPolicy } from './config';

const defaultAdapterFactory: AdapterFactory = () => new MysqlAdapter();

function wrapFailure(error: unknown, stage: ErrorStage, sql?: string): DatabaseError {
  if (error instanceof DatabaseError) return error;
  const cause = toError(error);
  const context = sql === undefined ? {} : { sql };
  switch (stage) {
    case 'prepare':
      return new PrepareError(`Failed to prepare statement: ${cause.message}`, sql ?? '', {}, cause);
    case 'bind':
      return new BindError(`Failed to bind parameters: ${cause.message}`, context, cause);
    case 'execute':
      return new ExecuteError(`Query execution failed: ${cause.message}`, context, cause);
    default:
      return new ConnectionError(`Connection failed: ${cause.message}`, context, cause);
  }
}

/**
 * Owns a single MySQL connection. Use `getInstance` for the process-wide
 * shared connection, or construct one directly and call `connect()` to own
 * it explicitly.
 *
 * One logical caller is assumed: statements are sent in the order they are
 * awaited on the one connection, so a transaction started by one caller is
 * visible to every other caller of the same instance.
 */
export class ConnectionManager {
  private static instance: ConnectionManager | null = null;
  private static pending: Promise<ConnectionManager> | null = null;

  private readonly config: Readonly<DatabaseConfig>;
  private readonly errorPolicy: ErrorPolicy;
  private readonly adapterFactory: AdapterFactory;
  private adapter: DatabaseAdapter | null = null;
  private connecting: Promise<void> | null = null;
  private lastId = 0;
  private logger = Logger.getInstance().createChildLogger({ class: 'ConnectionManager' });

  constructor(config: DatabaseConfig, options: ConnectionManagerOptions = {}) {
    this.config = Object.freeze({ ...config, port: config.port ?? options.port });
    this.errorPolicy = options.errorPolicy ?? 'throw';
    this.adapterFactory = options.adapterFactory ?? defaultAdapterFactory;
  }

  /**
   * Returns the process-wide instance, connecting it on first use. Once an
   * instance exists, the arguments of later calls are ignored until `close()`.
   */
  public static async getInstance(
    host: string,
    username: string,
    password: string,
    database: string,
    charset: string,
    options: ConnectionManagerOptions = {}
  ): Promise<ConnectionManager> {
    const existing = ConnectionManager.instance;
    if (existing) {
      if (!existing.matches({ host, username, password, database, charset })) {
        existing.logger.debug('Connection already open; supplied credentials ignored', { method: 'getInstance' }, {
          host,
          username,
          database
        });
      }
      return existing;
    }

    if (ConnectionManager.pending) {
      return ConnectionManager.pending;
    }

    const manager = new ConnectionManager({ host, username, password, database, charset }, options);
    const pending = manager.connect().then(() => {
      ConnectionManager.instance = manager;
      return manager;
    });
    ConnectionManager.pending = pending;

    try {
      return await pending;
    } finally {
      if (ConnectionManager.pending === pending) {
        ConnectionManager.pending = null;
      }
    }
  }

  /** The process-wide instance, if one is open. */
  public static current(): ConnectionManager | null {
    return ConnectionManager.instance;
  }

  /**
   * Acquires the process-wide instance from `DB_*` environment settings.
   */
  public static async fromEnv(
    options: Omit<ConnectionManagerOptions, 'port'> = {},
    env: EnvManager = EnvManager.getInstance()
  ): Promise<ConnectionManager> {
    const config = loadDatabaseConfig(env);
    return ConnectionManager.getInstance(config.host, config.username, config.password, config.database, config.charset, {
      errorPolicy: loadErrorPolicy(env),
      ...options,
      port: config.port
    });
  }

  public async connect(): Promise<void> {
    if (this.adapter) return;
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<void> {
    const adapter = this.adapterFactory();
    try {
      await adapter.connect(this.config);
    } catch (error) {
      return this.fail(error, 'connection');
    }
    this.adapter = adapter;
    this.lastId = 0;
    this.logger.info(`Connected to ${this.config.database} on ${this.config.host}`, { method: 'connect' });
  }

  /**
   * Prepares, binds and executes `sql`, returning the executed statement.
   * Parameter kinds are inferred from the values (see `paramTypes`).
   */
  public async query(sql: string, params: ReadonlyArray<ParamInput> = []): Promise<PreparedStatement> {
    const traceId = this.logger.startTrace('query', { method: 'query' });
    let stage: ErrorStage = 'prepare';
    try {
      const adapter = this.requireAdapter();
      const handle = await adapter.prepare(sql);
      try {
        stage = 'bind';
        const bound = toBindParams(params);
        const types = bound.map(param => PARAM_TYPE_TAGS[param.kind]).join('');
        this.logger.debug(`Executing: ${sql}`, { method: 'query', traceId }, { types });

        stage = 'execute';
        const result = await handle.execute(bound);
        if (result.insertId !== 0) {
          this.lastId = result.insertId;
        }
        return new PreparedStatement(sql, types, result);
      } finally {
        await handle.close();
      }
    } catch (error) {
      return this.fail(error, stage, sql);
    } finally {
      this.logger.endTrace(traceId);
    }
  }

  /** Every row the query returns, in server order; empty when none match. */
  public async fetchAll(sql: string, params: ReadonlyArray<ParamInput> = []): Promise<Row[]> {
    const statement = await this.query(sql, params);
    return statement.fetchAll();
  }

  /** The first row the query returns, or `null` when none match. */
  public async fetchOne(sql: string, params: ReadonlyArray<ParamInput> = []): Promise<Row | null> {
    const statement = await this.query(sql, params);
    return statement.fetchOne();
  }

  /**
   * The key generated by the most recent INSERT on this connection,
   * 0 before any. Statements that generate no key leave it unchanged.
   */
  public lastInsertId(): number {
    return this.lastId;
  }

  public async beginTransaction(): Promise<void> {
    await this.control(adapter => adapter.beginTransaction());
  }

  public async commit(): Promise<void> {
    await this.control(adapter => adapter.commit());
  }

  public async rollback(): Promise<void> {
    await this.control(adapter => adapter.rollback());
  }

  public isConnected(): boolean {
    return this.adapter?.isConnected() ?? false;
  }

  public getConfig(): Readonly<DatabaseConfig> {
    return this.config;
  }

  /**
   * Ends the connection. The process-wide slot is released as well, so the
   * next `getInstance` builds a new instance from its own arguments.
   * A connect still in progress is waited for and then torn down.
   */
  public async close(): Promise<void> {
    if (this.connecting) {
      await this.connecting.catch((error: unknown) => {
        this.logger.debug('Pending connect failed before close', { method: 'close' }, error);
      });
    }

    const adapter = this.adapter;
    this.adapter = null;
    if (ConnectionManager.instance === this) {
      ConnectionManager.instance = null;
    }
    if (!adapter) return;

    try {
      await adapter.disconnect();
      this.logger.info('Connection closed', { method: 'close' });
    } catch (error) {
      return this.fail(error, 'connection');
    }
  }

  private async control(operation: (adapter: DatabaseAdapter) => Promise<void>): Promise<void> {
    try {
      await operation(this.requireAdapter());
    } catch (error) {
      return this.fail(error, 'execute');
    }
  }

  private requireAdapter(): DatabaseAdapter {
    if (!this.adapter) {
      throw new ConnectionError('Connection is closed', { database: this.config.database });
    }
    return this.adapter;
  }

  private matches(config: DatabaseConfig): boolean {
    return (
      this.config.host === config.host &&
      this.config.username === config.username &&
      this.config.password === config.password &&
      this.config.database === config.database &&
      this.config.charset === config.charset
    );
  }

  private fail(error: unknown, stage: ErrorStage, sql?: string): never {
    const failure = wrapFailure(error, stage, sql);
    if (this.errorPolicy === 'exit') {
      this.logger.fatal(`Fatal ${failure.stage} error: ${failure.message}`, {}, failure.context);
      process.exit(1);
    }
    this.logger.error(failure.message, { stage: failure.stage }, failure.context);
    throw failure;
  }
}
