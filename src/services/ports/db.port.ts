export interface DbQueryOptions {
  /**
   * Optional label for metrics/logging to indicate logical operation (e.g., claimPersonForAudit).
   */
  operation?: string;
}

export type DbRow = Record<string, unknown>;

export interface DbTransactionPort {
  query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]>;
  queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null>;
  insert(tableFqn: string, row: DbRow, options?: DbQueryOptions): Promise<void>;
  /** Multi-row insert; all rows must share the first row's columns. */
  insertMany(tableFqn: string, rows: DbRow[], options?: DbQueryOptions): Promise<void>;
  update(tableFqn: string, id: string, patch: DbRow, idColumn?: string, options?: DbQueryOptions): Promise<void>;
}

export interface DbPort extends DbTransactionPort {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T>;
  generateId(): string;
}
