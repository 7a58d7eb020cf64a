import { createHmac, randomBytes } from 'node:crypto'

export interface CodeGenerator {
  generate(identity: string): string
}

export interface TotpCodeGeneratorOptions {
  digits: number
  /** Length of one time step. Usually the passcode TTL. */
  intervalSeconds: number
  /** Per-instance HMAC key. Random when omitted. */
  secret?: Buffer
  now?: () => number
  nonce?: () => Buffer
}

/**
 * Time-stepped HMAC codes with RFC 4226 dynamic truncation.
 *
 * The HMAC input is the time-step counter followed by the identity and a
 * random nonce, so two identities asking within the same step never share a
 * code and a repeated request never reproduces the previous one.
 */
export class TotpCodeGenerator implements CodeGenerator {
  private readonly secret: Buffer
  private readonly now: () => number
  private readonly nonce: () => Buffer

  constructor(private readonly options: TotpCodeGeneratorOptions) {
    this.secret = options.secret ?? randomBytes(20)
    this.now = options.now ?? (() => Date.now())
    this.nonce = options.nonce ?? (() => randomBytes(16))
  }

  timeStep(atMs: number = this.now()): number {
    return Math.floor(atMs / 1000 / this.options.intervalSeconds)
  }

  generate(identity: string): string {
    const counter = Buffer.alloc(8)
    counter.writeBigUInt64BE(BigInt(this.timeStep()))

    const digest = createHmac('sha1', this.secret).update(counter).update(identity).update(this.nonce()).digest()
    const offset = digest.readUInt8(digest.length - 1) & 0x0f
    const binary = digest.readUInt32BE(offset) & 0x7fffffff

    return (binary % 10 ** this.options.digits).toString().padStart(this.options.digits, '0')
  }
}
