import { backOff } from 'exponential-backoff'
import nodemailer from 'nodemailer'
import type Mail from 'nodemailer/lib/mailer'
import type { MailConfig } from '@passcode-auth/shared-types'
import { logger as defaultLogger, type Logger } from '../logger'
import type { OtpDelivery } from '../otp/delivery'
import { renderOtpEmail } from './templates'

export interface MailTransport {
  sendMail(message: Mail.Options): Promise<unknown>
}

export interface OtpMailerOptions {
  from: string
  ttlSeconds: number
  productName?: string
  /** Retries after the first attempt. Default: 2 */
  retries?: number
  /** Delay before the first retry; doubles on each further retry. Default: 1000 */
  backoffMs?: number
  logger?: Logger
}

export const createMailTransport = (config: MailConfig): MailTransport =>
  nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    ...(config.user && config.password ? { auth: { user: config.user, pass: config.password } } : {}),
  })

/**
 * Emails passcodes through an SMTP transport.
 */
export class OtpMailer implements OtpDelivery {
  private readonly retries: number
  private readonly backoffMs: number
  private readonly productName: string
  private readonly log: Logger

  constructor(
    private readonly transport: MailTransport,
    private readonly options: OtpMailerOptions
  ) {
    this.retries = options.retries ?? 2
    this.backoffMs = options.backoffMs ?? 1000
    this.productName = options.productName ?? 'passcode-auth'
    this.log = (options.logger ?? defaultLogger).child('otp-mailer')
  }

  deliver(destination: string, code: string): void {
    void this.send(destination, code)
  }

  /**
   * Resolves whether the email went out; never rejects.
   */
  async send(destination: string, code: string): Promise<boolean> {
    const content = renderOtpEmail({ code, ttlSeconds: this.options.ttlSeconds, productName: this.productName })
    const message: Mail.Options = {
      from: this.options.from,
      to: destination,
      subject: content.subject,
      text: content.text,
      html: content.html,
    }

    try {
      await backOff(() => this.transport.sendMail(message), {
        numOfAttempts: this.retries + 1,
        startingDelay: this.backoffMs,
        timeMultiple: 2,
        jitter: 'none',
        retry: (err: unknown, attemptNumber: number) => {
          this.log.warn('Passcode email attempt failed', {
            to: destination,
            attempt: attemptNumber,
            of: this.retries + 1,
            reason: err instanceof Error ? err.message : String(err),
          })
          return true
        },
      })
    } catch (err) {
      this.log.error('Passcode email could not be delivered', err)
      return false
    }

    this.log.debug('Passcode email sent', { to: destination })
    return true
  }
}
