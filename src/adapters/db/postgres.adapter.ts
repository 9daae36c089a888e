import { DatabaseError, Pool, type PoolClient, type PoolConfig } from 'pg';
import { v4 as uuidv4 } from 'uuid';
import type { DbPort, DbQueryOptions, DbRow, DbTransactionPort } from '../../services/ports/db.port';
import { getAuditConfig, type AuditConfig } from '../../config/audit.config';
import { assertColumnName, normalizeTableFqn } from './fqn.utils';
import { logger } from '../../utils/logger';
import { getCounter, getHistogram } from '../../utils/metrics';

const PROVIDER_LABEL = 'postgres';

export const PG_UNIQUE_VIOLATION = '23505';

type PostgresAdapterConfig = AuditConfig['db'];

interface MetricLabels {
  provider: string;
  operation: string;
}

const attemptsCounter = getCounter(
  'device_audit_db_query_attempts_total',
  'Total database query attempts by provider and operation',
  ['provider', 'operation']
);

const failureCounter = getCounter(
  'device_audit_db_query_failures_total',
  'Total database query failures grouped by provider and error code',
  ['provider', 'code']
);

const durationHistogram = getHistogram(
  'device_audit_db_query_duration_ms',
  'Database query duration in milliseconds',
  ['provider', 'operation'],
  [5, 10, 25, 50, 100, 250, 500, 1000, 2000]
);

const longRunningCounter = getCounter(
  'device_audit_db_query_long_running_total',
  'Total number of database queries exceeding the configured warning threshold',
  ['provider', 'operation']
);

/**
 * Rewrites `?` placeholders to `$n`, skipping quoted strings, quoted
 * identifiers and comments.
 */
export function rewriteQuestionMarkPlaceholders(sql: string): string {
  let result = '';
  let paramIndex = 1;
  let inSingleQuote = false;
  let inDoubleQuote = false;
  let inLineComment = false;
  let inBlockComment = false;
  for (let i = 0; i < sql.length; i += 1) {
    const char = sql[i];
    const next = sql[i + 1];

    if (inLineComment) {
      if (char === '\n') {
        inLineComment = false;
      }
      result += char;
      continue;
    }

    if (inBlockComment) {
      if (char === '*' && next === '/') {
        inBlockComment = false;
        result += '*/';
        i += 1;
        continue;
      }
      result += char;
      continue;
    }

    if (!inSingleQuote && !inDoubleQuote) {
      if (char === '-' && next === '-') {
        inLineComment = true;
        result += '--';
        i += 1;
        continue;
      }
      if (char === '/' && next === '*') {
        inBlockComment = true;
        result += '/*';
        i += 1;
        continue;
      }
    }

    if (!inDoubleQuote && char === "'") {
      if (inSingleQuote && next === "'") {
        result += "''";
        i += 1;
        continue;
      }
      inSingleQuote = !inSingleQuote;
      result += char;
      continue;
    }

    if (!inSingleQuote && char === '"') {
      if (inDoubleQuote && next === '"') {
        result += '""';
        i += 1;
        continue;
      }
      inDoubleQuote = !inDoubleQuote;
      result += char;
      continue;
    }

    if (!inSingleQuote && !inDoubleQuote && char === '?') {
      result += `$${paramIndex}`;
      paramIndex += 1;
    } else {
      result += char;
    }
  }
  return result;
}

function inferOperation(sql: string, fallback: string): string {
  const match = sql.trim().split(/\s+/)[0];
  return match ? match.toLowerCase() : fallback;
}

function preprocessParams(params: unknown[] = []): unknown[] {
  return params.map((value) => {
    if (value === undefined) return null;
    if (value === null || value instanceof Date || Buffer.isBuffer(value)) return value;
    if (Array.isArray(value)) {
      const containsOnlyPrimitives = value.every(
        (item) => item === null || ['string', 'number', 'boolean'].includes(typeof item)
      );
      return containsOnlyPrimitives ? value : JSON.stringify(value);
    }
    if (typeof value === 'object') return JSON.stringify(value);
    return value;
  });
}

export class PostgresAdapterError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'PostgresAdapterError';
    this.code = code;
  }
}

export function mapPgError(err: unknown): PostgresAdapterError {
  if (err instanceof PostgresAdapterError) {
    return err;
  }
  const code =
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : 'unknown';
  const message = err instanceof Error ? err.message : 'Unknown Postgres error';
  return new PostgresAdapterError(message, code);
}

interface ExecuteOptions {
  params?: unknown[];
  options?: DbQueryOptions;
  client?: PoolClient;
}

class ScopedTransactionAdapter implements DbTransactionPort {
  constructor(private readonly adapter: PostgresDbAdapter, private readonly client: PoolClient) {}

  async query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    const result = await this.adapter.runQuery<T>(sql, { params, options, client: this.client });
    return result.rows;
  }

  async queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.adapter.runQuery<T>(sql, { params, options, client: this.client });
    return result.rows[0] ?? null;
  }

  insert(tableFqn: string, row: DbRow, options?: DbQueryOptions): Promise<void> {
    return this.adapter.insertInternal(tableFqn, [row], options, this.client);
  }

  insertMany(tableFqn: string, rows: DbRow[], options?: DbQueryOptions): Promise<void> {
    return this.adapter.insertInternal(tableFqn, rows, options, this.client);
  }

  update(tableFqn: string, id: string, patch: DbRow, idColumn?: string, options?: DbQueryOptions): Promise<void> {
    return this.adapter.updateInternal(tableFqn, id, patch, idColumn, options, this.client);
  }
}

export class PostgresDbAdapter implements DbPort {
  private readonly pool: Pool;

  private readonly logSql: boolean;

  private readonly longQueryWarnMs: number;

  constructor(config: PostgresAdapterConfig) {
    const poolConfig: PoolConfig = {
      connectionString: config.connectionString,
      min: config.poolMin,
      max: config.poolMax,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    };
    this.pool = new Pool(poolConfig);
    this.logSql = config.logSql;
    this.longQueryWarnMs = config.longQueryWarnMs;
  }

  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw mapPgError(error);
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await handler(new ScopedTransactionAdapter(this, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      // Domain errors thrown by the handler pass through unchanged
      throw error instanceof DatabaseError ? mapPgError(error) : error;
    } finally {
      client.release();
    }
  }

  async query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows;
  }

  async queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows[0] ?? null;
  }

  async insert(tableFqn: string, row: DbRow, options?: DbQueryOptions): Promise<void> {
    await this.insertInternal(tableFqn, [row], options);
  }

  async insertMany(tableFqn: string, rows: DbRow[], options?: DbQueryOptions): Promise<void> {
    await this.insertInternal(tableFqn, rows, options);
  }

  async update(tableFqn: string, id: string, patch: DbRow, idColumn = 'id', options?: DbQueryOptions): Promise<void> {
    await this.updateInternal(tableFqn, id, patch, idColumn, options);
  }

  generateId(): string {
    return uuidv4();
  }

  private recordLongQuery(labels: MetricLabels, startTime: number, error?: unknown): void {
    const durationMs = Date.now() - startTime;
    if (durationMs < this.longQueryWarnMs) return;
    longRunningCounter.inc({ ...labels });
    logger.warn('db-query-long-running', {
      provider: PROVIDER_LABEL,
      operation: labels.operation,
      durationMs,
      thresholdMs: this.longQueryWarnMs,
      ...(error ? { error: error instanceof Error ? error.message : String(error) } : {}),
    });
  }

  async runQuery<T extends DbRow = DbRow>(sql: string, { params = [], options, client }: ExecuteOptions): Promise<{ rows: T[] }> {
    const values = preprocessParams(params);
    const text = sql.includes('?') ? rewriteQuestionMarkPlaceholders(sql) : sql;
    const labels: MetricLabels = { provider: PROVIDER_LABEL, operation: options?.operation ?? inferOperation(sql, 'query') };
    attemptsCounter.inc({ ...labels });
    const stopTimer = durationHistogram.startTimer({ ...labels });
    const startTime = Date.now();
    try {
      if (this.logSql) {
        logger.debug('db-sql', { text, values });
      }
      const target = client ?? this.pool;
      const result = await target.query<T>(text, values);
      stopTimer();
      this.recordLongQuery(labels, startTime);
      return { rows: result.rows };
    } catch (error) {
      stopTimer();
      const mapped = mapPgError(error);
      failureCounter.inc({ provider: PROVIDER_LABEL, code: mapped.code });
      this.recordLongQuery(labels, startTime, mapped);
      throw mapped;
    }
  }

  async insertInternal(tableFqn: string, rows: DbRow[], options?: DbQueryOptions, client?: PoolClient): Promise<void> {
    if (rows.length === 0) return;
    const columns = Object.keys(rows[0]).map(assertColumnName);
    if (columns.length === 0) {
      throw new Error('insert requires at least one column');
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const tuple = `(${columns.map(() => '?').join(', ')})`;
    const sql = `INSERT INTO ${identifier} (${columns.map((c) => `"${c}"`).join(', ')}) VALUES ${rows.map(() => tuple).join(', ')}`;
    const params = rows.flatMap((row) => columns.map((column) => row[column]));
    await this.runQuery(sql, { params, options: { operation: options?.operation ?? 'insert' }, client });
  }

  async updateInternal(
    tableFqn: string,
    id: string,
    patch: DbRow,
    idColumn = 'id',
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<void> {
    const entries = Object.entries(patch);
    if (entries.length === 0) {
      return;
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const setClauses = entries.map(([column]) => `"${assertColumnName(column)}" = ?`).join(', ');
    const sql = `UPDATE ${identifier} SET ${setClauses} WHERE "${assertColumnName(idColumn)}" = ?`;
    const params = [...entries.map(([, value]) => value), id];
    await this.runQuery(sql, { params, options: { operation: options?.operation ?? 'update' }, client });
  }
}

export function createPostgresDbAdapter(config: Partial<PostgresAdapterConfig> = {}): PostgresDbAdapter {
  return new PostgresDbAdapter({ ...getAuditConfig().db, ...config });
}
