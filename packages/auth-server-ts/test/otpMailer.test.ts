import assert from 'node:assert/strict'
import { test } from 'node:test'
import type Mail from 'nodemailer/lib/mailer'

import { silentLogger } from '../src/logger'
import { OtpMailer, type MailTransport } from '../src/mail/otpMailer'
import { expiryMinutes, renderOtpEmail } from '../src/mail/templates'

class FakeTransport implements MailTransport {
  readonly sent: Mail.Options[] = []
  attempts = 0

  constructor(private readonly failures: number) {}

  async sendMail(message: Mail.Options): Promise<unknown> {
    this.attempts += 1
    if (this.attempts <= this.failures) throw new Error('421 service not available')
    this.sent.push(message)
    return { messageId: `<${this.attempts}@test>` }
  }
}

const mailerFor = (transport: MailTransport, retries = 2) =>
  new OtpMailer(transport, {
    from: 'noreply@example.com',
    ttlSeconds: 300,
    retries,
    backoffMs: 0,
    logger: silentLogger,
  })

test('OtpMailer sends the rendered passcode email', async () => {
  const transport = new FakeTransport(0)

  assert.equal(await mailerFor(transport).send('user@example.com', '123456'), true)

  assert.equal(transport.sent.length, 1)
  const [message] = transport.sent
  assert.equal(message?.from, 'noreply@example.com')
  assert.equal(message?.to, 'user@example.com')
  assert.equal(message?.subject, 'Your verification code (passcode-auth)')
  assert.equal(message?.text, 'Your verification code is: 123456\nIt expires in 5 minutes.')
})

test('OtpMailer retries a failing transport', async () => {
  const transport = new FakeTransport(2)

  assert.equal(await mailerFor(transport).send('user@example.com', '123456'), true)
  assert.equal(transport.attempts, 3)
  assert.equal(transport.sent.length, 1)
})

test('OtpMailer gives up after the configured retries without throwing', async () => {
  const transport = new FakeTransport(10)

  assert.equal(await mailerFor(transport, 1).send('user@example.com', '123456'), false)
  assert.equal(transport.attempts, 2)
})

test('OtpMailer deliver returns before the email is sent', async () => {
  const transport = new FakeTransport(0)

  mailerFor(transport).deliver('user@example.com', '654321')
  assert.equal(transport.sent.length, 0)

  await new Promise((resolve) => setImmediate(resolve))
  assert.equal(transport.sent[0]?.to, 'user@example.com')
})

test('renderOtpEmail states the expiry in whole minutes', () => {
  assert.equal(expiryMinutes(30), 1)
  assert.equal(expiryMinutes(600), 10)

  const email = renderOtpEmail({ code: '042042', ttlSeconds: 60, productName: 'Acme' })
  assert.equal(email.text, 'Your verification code is: 042042\nIt expires in 1 minute.')
  assert.ok(email.html.includes('<div class="code">042042</div>'))
})

test('renderOtpEmail escapes the product name in HTML only', () => {
  const email = renderOtpEmail({ code: '123456', ttlSeconds: 300, productName: '<Acme & Co>' })

  assert.equal(email.subject, 'Your verification code (<Acme & Co>)')
  assert.ok(email.html.includes('signing in to &lt;Acme &amp; Co&gt;:'))
})
