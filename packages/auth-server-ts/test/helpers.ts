import { randomUUID } from 'node:crypto'
import { DuplicateEmailError, type Account, type AccountRepository, type NewAccount } from '../src/account/types'
import { BcryptHasher } from '../src/hashing/hasher'
import { silentLogger } from '../src/logger'
import type { OtpDelivery } from '../src/otp/delivery'
import { OtpLifecycle } from '../src/otp/otpLifecycle'
import { OtpService } from '../src/otp/otpService'
import { OtpStore } from '../src/otp/otpStore'
import type { OtpServiceOptions } from '../src/otp/types'
import { FakeRedis } from './fakeRedis'

export const BYPASS_CODE = '123456'

export class RecordingDelivery implements OtpDelivery {
  readonly sent: Array<{ destination: string; code: string }> = []

  deliver(destination: string, code: string): void {
    this.sent.push({ destination, code })
  }

  lastCodeFor(destination: string): string | undefined {
    return this.sent.filter((entry) => entry.destination === destination).at(-1)?.code
  }
}

export class InMemoryAccountRepository implements AccountRepository {
  private readonly accounts = new Map<string, Account>()

  async findByEmail(email: string): Promise<Account | null> {
    const account = this.accounts.get(email)
    return account ? { ...account } : null
  }

  async create(input: NewAccount): Promise<Account> {
    if (this.accounts.has(input.email)) throw new DuplicateEmailError(input.email)
    const account: Account = {
      id: randomUUID(),
      email: input.email,
      hashedPassword: input.hashedPassword,
      isActive: true,
      isVerified: false,
      createdAt: new Date(0),
    }
    this.accounts.set(input.email, account)
    return { ...account }
  }

  async markVerified(email: string): Promise<boolean> {
    const account = this.accounts.get(email)
    if (!account || account.isVerified) return false
    account.isVerified = true
    return true
  }

  deactivate(email: string): void {
    const account = this.accounts.get(email)
    if (account) account.isActive = false
  }
}

export interface OtpHarnessOptions {
  ttlSeconds?: number
  maxAttempts?: number
  service?: Partial<OtpServiceOptions>
}

/**
 * Wires the passcode stack the way the server does, over FakeRedis with the
 * cheapest bcrypt cost. The bypass code makes every issued code predictable.
 */
export const createOtpHarness = (options: OtpHarnessOptions = {}) => {
  const ttlSeconds = options.ttlSeconds ?? 300
  const redis = new FakeRedis()
  const hasher = new BcryptHasher({ rounds: 4 })
  const store = new OtpStore(redis, { ttlSeconds, logger: silentLogger })
  const lifecycle = new OtpLifecycle(store, hasher, { maxAttempts: options.maxAttempts ?? 5, logger: silentLogger })
  const delivery = new RecordingDelivery()
  const otp = new OtpService(
    { redis, lifecycle, hasher, delivery },
    { env: 'test', bypassCode: BYPASS_CODE, ttlSeconds, logger: silentLogger, ...options.service }
  )
  return { redis, hasher, store, lifecycle, delivery, otp, ttlSeconds }
}
