import bcrypt from 'bcryptjs'

export const DEFAULT_BCRYPT_ROUNDS = 10

export interface Hasher {
  hash(plain: string): Promise<string>
  compare(plain: string, hashed: string): Promise<boolean>
  /**
   * A hash of a value nobody knows. Compared against when there is no real
   * hash, so that both paths cost one full comparison.
   */
  placeholderHash(): Promise<string>
}

export interface BcryptHasherOptions {
  rounds?: number
}

/**
 * bcrypt through bcryptjs's asynchronous API. Key expansion runs in slices
 * scheduled on the event loop, so a hash in flight never stalls other
 * requests. The `*Sync` functions are not used anywhere on the request path.
 */
export class BcryptHasher implements Hasher {
  private readonly rounds: number
  private placeholder: Promise<string> | null = null

  constructor(options: BcryptHasherOptions = {}) {
    this.rounds = options.rounds ?? DEFAULT_BCRYPT_ROUNDS
  }

  async hash(plain: string): Promise<string> {
    // A fresh salt per call: equal inputs never produce equal hashes.
    return bcrypt.hash(plain, this.rounds)
  }

  async compare(plain: string, hashed: string): Promise<boolean> {
    return bcrypt.compare(plain, hashed)
  }

  placeholderHash(): Promise<string> {
    if (!this.placeholder) {
      this.placeholder = bcrypt
        .genSalt(this.rounds)
        .then((salt) => bcrypt.hash(salt, salt))
        .catch((err: unknown) => {
          this.placeholder = null
          throw err
        })
    }
    return this.placeholder
  }
}
