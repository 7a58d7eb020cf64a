import assert from 'node:assert/strict'
import { test } from 'node:test'

import { AuthServerConfigSchema } from '../src'

const minimal = {
  redis: {},
  database: { url: 'postgres://localhost/passcode_auth' },
  otp: {},
  jwt: { secret: 'test-secret-test-secret' },
}

test('AuthServerConfigSchema fills passcode defaults', () => {
  const config = AuthServerConfigSchema.parse(minimal)

  assert.equal(config.env, 'development')
  assert.equal(config.logLevel, 'info')
  assert.equal(config.redis.url, 'redis://localhost:6379')
  assert.equal(config.otp.ttlSeconds, 300)
  assert.equal(config.otp.digits, 6)
  assert.equal(config.otp.maxAttempts, 5)
  assert.deepEqual(config.otp.rateLimit, { windowSeconds: 60, maxRequests: 3 })
  assert.equal(config.hashing.rounds, 10)
  assert.equal(config.jwt.expiresInSeconds, 900)
  assert.equal(config.jwt.issuer, 'passcode-auth')
  assert.equal(config.mail, undefined)
})

test('AuthServerConfigSchema rejects unknown keys', () => {
  const parsed = AuthServerConfigSchema.safeParse({ ...minimal, otp: { ttl: 10 } })
  assert.equal(parsed.success, false)
})

test('AuthServerConfigSchema rejects a non-numeric bypass code', () => {
  const parsed = AuthServerConfigSchema.safeParse({ ...minimal, otp: { bypassCode: 'abcdef' } })
  assert.equal(parsed.success, false)
})
