import { Pool } from 'pg'

/**
 * The one pg capability the repositories need. Rows come back untyped and are
 * parsed by the repository that asked for them.
 */
export interface Queryable {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>
}

export interface CreatePoolOptions {
  url: string
  max?: number
}

export const createPool = (options: CreatePoolOptions): Pool =>
  new Pool({
    connectionString: options.url,
    max: options.max ?? 10,
  })

export const poolQueryable = (pool: Pool): Queryable => ({
  query: (sql, params = []) => pool.query(sql, params),
})
