import { randomUUID } from 'node:crypto'
import jwt from 'jsonwebtoken'
import { z } from 'zod'
import type { AuthTokens } from '@passcode-auth/shared-types'
import type { Account } from '../account/types'

export interface AccessTokenServiceOptions {
  secret: string
  expiresInSeconds: number
  issuer: string
}

const AccessTokenClaimsSchema = z.object({
  sub: z.string(),
  email: z.string(),
  iss: z.string(),
  jti: z.string(),
  iat: z.number(),
  exp: z.number(),
})

export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsSchema>

/**
 * HS256 bearer tokens handed out once a login passcode is confirmed.
 */
export class AccessTokenService {
  constructor(private readonly options: AccessTokenServiceOptions) {}

  issue(account: Pick<Account, 'id' | 'email'>): AuthTokens {
    const accessToken = jwt.sign({ email: account.email }, this.options.secret, {
      algorithm: 'HS256',
      subject: account.id,
      issuer: this.options.issuer,
      jwtid: randomUUID(),
      expiresIn: this.options.expiresInSeconds,
    })
    return { accessToken, tokenType: 'Bearer', expiresIn: this.options.expiresInSeconds }
  }

  /**
   * Claims of a valid token, or null for anything expired, forged or malformed.
   */
  verify(token: string): AccessTokenClaims | null {
    let payload: string | jwt.JwtPayload
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        issuer: this.options.issuer,
      })
    } catch {
      return null
    }

    const parsed = AccessTokenClaimsSchema.safeParse(payload)
    return parsed.success ? parsed.data : null
  }
}
