import assert from 'node:assert/strict'
import { test } from 'node:test'

import { TotpCodeGenerator } from '../src/otp/codeGenerator'

// RFC 4226 appendix D key. With an empty identity and nonce the HMAC input is
// the bare counter, so the appendix values apply.
const rfcSecret = Buffer.from('12345678901234567890', 'ascii')
const emptyNonce = () => Buffer.alloc(0)

test('TotpCodeGenerator matches the RFC 4226 reference values', () => {
  const at = (step: number) =>
    new TotpCodeGenerator({
      digits: 6,
      intervalSeconds: 30,
      secret: rfcSecret,
      now: () => step * 30_000,
      nonce: emptyNonce,
    }).generate('')

  assert.equal(at(0), '755224')
  assert.equal(at(1), '287082')
  assert.equal(at(9), '520489')
})

test('TotpCodeGenerator truncates to the configured width', () => {
  const generator = new TotpCodeGenerator({
    digits: 8,
    intervalSeconds: 30,
    secret: rfcSecret,
    now: () => 0,
    nonce: emptyNonce,
  })

  assert.equal(generator.generate(''), '84755224')
})

test('TotpCodeGenerator derives the time step from the interval', () => {
  const generator = new TotpCodeGenerator({ digits: 6, intervalSeconds: 30, now: () => 59_999 })

  assert.equal(generator.timeStep(), 1)
  assert.equal(generator.timeStep(60_000), 2)
})

test('TotpCodeGenerator mixes the nonce into every code', () => {
  let calls = 0
  const generator = new TotpCodeGenerator({
    digits: 6,
    intervalSeconds: 300,
    secret: rfcSecret,
    now: () => 0,
    nonce: () => Buffer.from([calls++]),
  })

  assert.notEqual(generator.generate('a@b.com'), generator.generate('a@b.com'))
})

test('TotpCodeGenerator produces fixed-width digit strings by default', () => {
  const generator = new TotpCodeGenerator({ digits: 6, intervalSeconds: 300 })

  for (let i = 0; i < 20; i += 1) {
    assert.match(generator.generate(`user${i}@example.com`), /^\d{6}$/)
  }
})
