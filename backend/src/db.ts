import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DatabaseConfig } from './config.js';
import type {
  FrameRecord,
  ImportDatabase,
  ImportSession,
  TableDefinition,
  UpsertResult,
} from './types/import.js';
import { createTableSql, quoteIdent } from './services/schema.js';

export function createPool(config: DatabaseConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.max,
  });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: PoolClient,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}

export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}

export type UpsertStatement = {
  text: string;
  params: unknown[];
};

export function buildUpsert(table: TableDefinition, values: FrameRecord): UpsertStatement {
  const columns = Object.keys(values);
  const params = columns.map((column) => values[column]);
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
  const conflict = table.primaryKey.map(quoteIdent).join(', ');
  const updates = columns
    .filter((column) => !table.primaryKey.includes(column))
    .map((column) => `${quoteIdent(column)} = excluded.${quoteIdent(column)}`);

  const head = `insert into ${quoteIdent(table.name)} (${columns.map(quoteIdent).join(', ')}) values (${placeholders})`;
  if (!updates.length) {
    return { text: `${head} on conflict (${conflict}) do nothing returning true as inserted`, params };
  }
  return {
    text: `${head} on conflict (${conflict}) do update set ${updates.join(', ')} returning (xmax = 0) as inserted`,
    params,
  };
}

function createSession(client: PoolClient): ImportSession {
  return {
    async upsert(table, values): Promise<UpsertResult> {
      const statement = buildUpsert(table, values);
      const { rows } = await query<{ inserted: boolean }>(client, statement.text, statement.params);
      // "do nothing" returns no row when the key already exists
      return rows[0]?.inserted ? 'inserted' : 'updated';
    },
    async count(table) {
      const { rows } = await query<{ count: string }>(client, `select count(*) as count from ${quoteIdent(table.name)}`);
      return Number(rows[0]?.count ?? 0);
    },
    async clear(table) {
      await query(client, `truncate ${quoteIdent(table.name)}`);
    },
  };
}

export type PgDatabaseOptions = {
  statementTimeoutMs?: number;
};

/** Every transaction checks out its own pooled client. */
export function createPgDatabase(pool: Pool, options: PgDatabaseOptions = {}): ImportDatabase {
  return {
    transaction(fn) {
      return withTransaction(pool, async (client) => {
        if (options.statementTimeoutMs !== undefined) {
          await query(client, `select set_config('statement_timeout', $1, true)`, [String(options.statementTimeoutMs)]);
        }
        return fn(createSession(client));
      });
    },
  };
}

export async function ensureSchema(pool: Pool, tables: readonly TableDefinition[]): Promise<void> {
  await withTransaction(pool, async (client) => {
    for (const table of tables) {
      await query(client, createTableSql(table));
    }
  });
}
