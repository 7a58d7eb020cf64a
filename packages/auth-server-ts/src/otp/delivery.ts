/**
 * Out-of-band channel for plaintext passcodes. Fire-and-forget: `deliver`
 * returns before delivery completes and never throws; failures are the
 * channel's to log and retry.
 */
export interface OtpDelivery {
  deliver(destination: string, code: string): void
}
