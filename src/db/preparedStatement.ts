import { QueryResult, Row } from './database.interface';

/**
 * An executed statement and the result it produced.
 */
export class PreparedStatement {
  constructor(
    readonly sql: string,
    /** One tag per bound parameter, e.g. `"isd"`. */
    readonly types: string,
    private readonly result: QueryResult
  ) {}

  get rowCount(): number {
    return this.result.rowCount;
  }

  get affectedRows(): number {
    return this.result.affectedRows;
  }

  get insertId(): number {
    return this.result.insertId;
  }

  get fields(): string[] {
    return [...this.result.fields];
  }

  fetchAll(): Row[] {
    return this.result.rows.map(row => ({ ...row }));
  }

  fetchOne(): Row | null {
    const first = this.result.rows[0];
    return first ? { ...first } : null;
  }
}
