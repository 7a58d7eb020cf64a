import assert from 'node:assert/strict'
import { test } from 'node:test'

import {
  OtpAttemptsExceededError,
  OtpAttemptTrackingFailedError,
  OtpCreationFailedError,
  OtpRemovalFailedError,
  OtpVerificationFailedError,
} from '../src/otp/errors'
import { OtpStore } from '../src/otp/otpStore'
import { silentLogger } from '../src/logger'
import { withKeyPrefix } from '../src/redis/withKeyPrefix'
import { FakeRedis } from './fakeRedis'

const identity = 'user@example.com'
const key = 'otp:email:user@example.com'

const setup = () => {
  const redis = new FakeRedis()
  const store = new OtpStore(redis, { ttlSeconds: 300, logger: silentLogger })
  return { redis, store }
}

test('OtpStore creates a record with a zeroed counter and the configured TTL', async () => {
  const { redis, store } = setup()

  assert.equal(await store.setRecord(identity, 'hashed-1'), true)
  assert.equal(await redis.ttl(key), 300)
  assert.equal(await store.getCode(identity), 'hashed-1')
  assert.equal(await store.getAttempts(identity), 0)
})

test('OtpStore honours a custom key prefix', async () => {
  const redis = new FakeRedis()
  const store = new OtpStore(redis, { ttlSeconds: 60, keyPrefix: 'otp:sms:', logger: silentLogger })

  await store.setRecord('+15550100', 'hashed')
  assert.deepEqual(redis.keys(), ['otp:sms:+15550100'])
})

test('OtpStore never overwrites a live record', async () => {
  const { store } = setup()

  assert.equal(await store.setRecord(identity, 'hashed-1'), true)
  assert.equal(await store.setRecord(identity, 'hashed-2'), false)
  assert.equal(await store.getCode(identity), 'hashed-1')
})

test('OtpStore wraps store failures while creating', async () => {
  const { redis, store } = setup()
  const failure = new Error('connection reset')
  redis.failWith = failure

  await assert.rejects(store.setRecord(identity, 'hashed'), (err: unknown) => {
    assert.ok(err instanceof OtpCreationFailedError)
    assert.equal(err.cause, failure)
    return true
  })
})

test('OtpStore reports a missing record as a verification failure', async () => {
  const { store } = setup()
  await assert.rejects(store.getCode(identity), OtpVerificationFailedError)
})

test('OtpStore expiry is indistinguishable from never issued', async () => {
  const { redis, store } = setup()
  await store.setRecord(identity, 'hashed')

  redis.advanceBy(300_000)

  assert.equal(await store.exists(identity), false)
  assert.equal(await store.getAttempts(identity), -1)
  await assert.rejects(store.getCode(identity), OtpVerificationFailedError)
})

test('OtpStore increments attempts without touching the TTL', async () => {
  const { redis, store } = setup()
  await store.setRecord(identity, 'hashed')
  redis.advanceBy(100_000)

  assert.equal(await store.incrementAttempts(identity, 5), 1)
  assert.equal(await store.incrementAttempts(identity, 5), 2)
  assert.equal(await store.getAttempts(identity), 2)
  assert.equal(await redis.ttl(key), 200)
})

test('OtpStore never increments attempts past the limit', async () => {
  const { store } = setup()
  await store.setRecord(identity, 'hashed')

  assert.equal(await store.incrementAttempts(identity, 2), 1)
  assert.equal(await store.incrementAttempts(identity, 2), 2)
  await assert.rejects(store.incrementAttempts(identity, 2), OtpAttemptsExceededError)
  assert.equal(await store.getAttempts(identity), 2)
})

test('OtpStore never recreates an expired record when incrementing', async () => {
  const { redis, store } = setup()
  await store.setRecord(identity, 'hashed')
  redis.advanceBy(300_000)

  await assert.rejects(store.incrementAttempts(identity, 5), OtpVerificationFailedError)
  assert.deepEqual(redis.keys(), [])
})

test('OtpStore wraps store failures while incrementing', async () => {
  const { redis, store } = setup()
  await store.setRecord(identity, 'hashed')
  redis.failWith = new Error('timeout')

  await assert.rejects(store.incrementAttempts(identity, 5), OtpAttemptTrackingFailedError)
})

test('OtpStore rejects a corrupted attempt counter', async () => {
  const { redis, store } = setup()
  redis.seedHash(key, { hashed_code: 'hashed', attempts: 'abc' }, 300)

  await assert.rejects(store.getAttempts(identity), OtpAttemptTrackingFailedError)
})

test('OtpStore deletes a live record and fails on a missing one', async () => {
  const { store } = setup()
  await store.setRecord(identity, 'hashed')

  assert.equal(await store.deleteRecord(identity), true)
  assert.equal(await store.exists(identity), false)
  await assert.rejects(store.deleteRecord(identity), OtpRemovalFailedError)
})

test('OtpStore records land under the client namespace', async () => {
  const redis = new FakeRedis()
  const store = new OtpStore(withKeyPrefix(redis, 'passcode'), { ttlSeconds: 60, logger: silentLogger })

  await store.setRecord(identity, 'hashed')
  await store.incrementAttempts(identity, 5)

  assert.deepEqual(redis.keys(), ['passcode:otp:email:user@example.com'])
  assert.equal(await redis.hget('passcode:otp:email:user@example.com', 'attempts'), '1')
})
