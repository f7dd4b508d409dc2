export interface DatabaseConfig {
  host: string;
  username: string;
  password: string;
  database: string;
  charset: string;
  port?: number;
}

/** Values accepted as bind parameters and returned in rows. */
export type ScalarValue = number | bigint | string | boolean | Date | Buffer | null;

export type ParamKind = 'integer' | 'float' | 'text' | 'blob';

export type BindParam =
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'blob'; value: Buffer | Date | boolean | null };

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  rowCount: number;
  fields: string[];
  affectedRows: number;
  /** Auto-generated key of an INSERT, 0 when the statement generated none. */
  insertId: number;
}

/**
 * A statement prepared on the server, executable with positional tagged
 * values. The adapter decides how each kind is sent over the wire.
 */
export interface PreparedHandle {
  execute(params: ReadonlyArray<BindParam>): Promise<QueryResult>;
  close(): Promise<void>;
}

export interface DatabaseAdapter {
  connect(config: DatabaseConfig): Promise<void>;
  disconnect(): Promise<void>;
  prepare(sql: string): Promise<PreparedHandle>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  isConnected(): boolean;
}

export type AdapterFactory = () => DatabaseAdapter;
