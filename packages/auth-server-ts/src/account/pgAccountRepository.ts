import { z } from 'zod'
import type { Queryable } from '../db/client'
import { DuplicateEmailError, type Account, type AccountRepository, type NewAccount } from './types'

export const USERS_TABLE_DDL = `
CREATE TABLE IF NOT EXISTS users (
  id BIGSERIAL PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  hashed_password TEXT NOT NULL,
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  is_verified BOOLEAN NOT NULL DEFAULT FALSE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`

const ACCOUNT_COLUMNS = 'id::text AS id, email, hashed_password, is_active, is_verified, created_at'

const UNIQUE_VIOLATION = '23505'

const AccountRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  hashed_password: z.string(),
  is_active: z.boolean(),
  is_verified: z.boolean(),
  created_at: z.coerce.date(),
})

const toAccount = (row: unknown): Account => {
  const parsed = AccountRowSchema.parse(row)
  return {
    id: parsed.id,
    email: parsed.email,
    hashedPassword: parsed.hashed_password,
    isActive: parsed.is_active,
    isVerified: parsed.is_verified,
    createdAt: parsed.created_at,
  }
}

const isUniqueViolation = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION

export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(USERS_TABLE_DDL)
  }

  async findByEmail(email: string): Promise<Account | null> {
    const result = await this.db.query(`SELECT ${ACCOUNT_COLUMNS} FROM users WHERE email = $1`, [email])
    const row = result.rows[0]
    return row === undefined ? null : toAccount(row)
  }

  async create(input: NewAccount): Promise<Account> {
    try {
      const result = await this.db.query(
        `INSERT INTO users (email, hashed_password, is_active, is_verified)
         VALUES ($1, $2, TRUE, FALSE)
         RETURNING ${ACCOUNT_COLUMNS}`,
        [input.email, input.hashedPassword]
      )
      return toAccount(result.rows[0])
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateEmailError(input.email, { cause: err })
      throw err
    }
  }

  async markVerified(email: string): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE users SET is_verified = TRUE, updated_at = now() WHERE email = $1 AND is_verified = FALSE',
      [email]
    )
    return result.rowCount === 1
  }
}
