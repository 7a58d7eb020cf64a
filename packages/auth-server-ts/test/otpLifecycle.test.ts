import assert from 'node:assert/strict'
import { test } from 'node:test'

import { BcryptHasher } from '../src/hashing/hasher'
import { silentLogger } from '../src/logger'
import { OtpAlreadyActiveError, OtpAttemptsExceededError, OtpVerificationFailedError } from '../src/otp/errors'
import { OtpLifecycle } from '../src/otp/otpLifecycle'
import { OtpStore } from '../src/otp/otpStore'
import { FakeRedis } from './fakeRedis'

const identity = 'user@example.com'
const hasher = new BcryptHasher({ rounds: 4 })

const setup = async (maxAttempts = 5) => {
  const redis = new FakeRedis()
  const store = new OtpStore(redis, { ttlSeconds: 300, logger: silentLogger })
  const lifecycle = new OtpLifecycle(store, hasher, { maxAttempts, logger: silentLogger })
  const hashed = await hasher.hash('111111')
  return { redis, store, lifecycle, hashed }
}

test('OtpLifecycle refuses to issue over a live code', async () => {
  const { lifecycle, hashed } = await setup()

  assert.equal(await lifecycle.issue(identity, hashed), true)
  await assert.rejects(lifecycle.issue(identity, hashed), OtpAlreadyActiveError)
})

test('OtpLifecycle lets exactly one of two concurrent issues win', async () => {
  const { lifecycle, store, hashed } = await setup()
  const other = await hasher.hash('222222')

  const results = await Promise.allSettled([lifecycle.issue(identity, hashed), lifecycle.issue(identity, other)])

  assert.deepEqual(
    results.map((result) => result.status),
    ['fulfilled', 'rejected']
  )
  const rejected = results[1]
  assert.ok(rejected?.status === 'rejected' && rejected.reason instanceof OtpAlreadyActiveError)
  assert.equal(await store.getCode(identity), hashed)
})

test('OtpLifecycle returns false on a mismatch and spends an attempt', async () => {
  const { lifecycle, store, hashed } = await setup()
  await lifecycle.issue(identity, hashed)

  assert.equal(await lifecycle.verify(identity, '999999'), false)
  assert.equal(await store.getAttempts(identity), 1)
  assert.equal(await lifecycle.attemptsRemaining(identity), 4)
})

test('OtpLifecycle consumes the code on a match', async () => {
  const { lifecycle, store, hashed } = await setup()
  await lifecycle.issue(identity, hashed)

  assert.equal(await lifecycle.verify(identity, '111111'), true)
  assert.equal(await store.exists(identity), false)
  await assert.rejects(lifecycle.verify(identity, '111111'), OtpVerificationFailedError)
})

test('OtpLifecycle rejects even the right code once the budget is spent', async () => {
  const { lifecycle, store, hashed } = await setup(3)
  await lifecycle.issue(identity, hashed)

  for (let i = 0; i < 3; i += 1) {
    assert.equal(await lifecycle.verify(identity, '000000'), false)
  }

  await assert.rejects(lifecycle.verify(identity, '111111'), (err: unknown) => {
    assert.ok(err instanceof OtpAttemptsExceededError)
    assert.equal(err.maxAttempts, 3)
    return true
  })
  assert.equal(await store.getAttempts(identity), 3)
  assert.equal(await lifecycle.attemptsRemaining(identity), 0)
})

test('OtpLifecycle treats an expired code like one never issued', async () => {
  const { lifecycle, redis, hashed } = await setup()
  await lifecycle.issue(identity, hashed)
  redis.advanceBy(300_000)

  await assert.rejects(lifecycle.verify(identity, '111111'), OtpVerificationFailedError)
  await assert.rejects(lifecycle.verify('nobody@example.com', '111111'), OtpVerificationFailedError)
})

test('OtpLifecycle allows a new code once the old one expires', async () => {
  const { lifecycle, redis, hashed } = await setup()
  await lifecycle.issue(identity, hashed)
  redis.advanceBy(300_000)

  assert.equal(await lifecycle.issue(identity, hashed), true)
})

test('OtpLifecycle revokes only what exists', async () => {
  const { lifecycle, store, hashed } = await setup()

  assert.equal(await lifecycle.revoke(identity), false)
  await lifecycle.issue(identity, hashed)
  assert.equal(await lifecycle.revoke(identity), true)
  assert.equal(await store.exists(identity), false)
})

test('OtpLifecycle compares no more guesses than the budget under a burst', async () => {
  const { lifecycle, store, hashed } = await setup(5)
  await lifecycle.issue(identity, hashed)

  const results = await Promise.allSettled(Array.from({ length: 20 }, () => lifecycle.verify(identity, '000000')))

  const compared = results.filter((result) => result.status === 'fulfilled')
  const refused = results.filter(
    (result) => result.status === 'rejected' && result.reason instanceof OtpAttemptsExceededError
  )
  assert.equal(compared.length, 5)
  assert.equal(refused.length, 15)
  assert.equal(await store.getAttempts(identity), 5)
})

test('OtpLifecycle lets only one of two concurrent correct codes consume the record', async () => {
  const { lifecycle, store, hashed } = await setup()
  await lifecycle.issue(identity, hashed)

  const results = await Promise.allSettled([lifecycle.verify(identity, '111111'), lifecycle.verify(identity, '111111')])

  const consumed = results.filter((result) => result.status === 'fulfilled' && result.value === true)
  const spent = results.filter(
    (result) => result.status === 'rejected' && result.reason instanceof OtpVerificationFailedError
  )
  assert.equal(consumed.length, 1)
  assert.equal(spent.length, 1)
  assert.equal(await store.exists(identity), false)
})
