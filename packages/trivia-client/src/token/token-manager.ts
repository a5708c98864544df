import { CancellationError, TokenStateError, UnexpectedStateError } from '../errors'
import { logger } from '../logger'
import { ResponseCodes, fromCode } from '../request/response-code'
import { errorForResponseCode } from '../response-errors'
import { TokenResponseSchema, parseBody } from '../schemas'
import type { HttpTransport } from '../transport/http-transport'
import type { TokenState } from '../types'

/** The service forgets a session token after this much inactivity */
export const TOKEN_INACTIVITY_LIMIT_MS = 6 * 60 * 60 * 1000

export type TokenManagerOptions = {
  transport: HttpTransport
  baseUrl: string
  enabled: boolean
  now?: () => number
}

type Waiter = {
  resolve(token: string | null): void
  reject(error: unknown): void
}

/**
 * Owns the session token and the time it was issued or last reset.
 *
 * Reads go through `snapshot()`, which hands out the current immutable state. Every
 * write (fetch, reset) runs through a single serial queue, so a request is built
 * either before or after a token change, never against half of one.
 *
 * Expiry is only detected, never acted on: the state stays `active` until the caller
 * resets the token or builds a new client.
 */
export class TokenManager {
  private state: TokenState
  private failure: unknown = null
  private mutations: Promise<void> = Promise.resolve()
  private readonly waiters = new Set<Waiter>()
  private readonly transport: HttpTransport
  private readonly endpoint: string
  private readonly now: () => number

  constructor(options: TokenManagerOptions) {
    this.transport = options.transport
    this.endpoint = `${options.baseUrl}/api_token.php`
    this.now = options.now ?? (() => Date.now())
    this.state = options.enabled ? { status: 'uninitialized' } : { status: 'disabled' }
  }

  snapshot(): TokenState {
    return this.state
  }

  get token(): string | null {
    return this.state.status === 'active' ? this.state.token : null
  }

  get issuedAt(): number | null {
    return this.state.status === 'active' ? this.state.issuedAt : null
  }

  isTokenExpired(): boolean {
    const issuedAt = this.issuedAt
    if (issuedAt === null) return false
    return this.now() - issuedAt > TOKEN_INACTIVITY_LIMIT_MS
  }

  /**
   * Ask the service for a new token. The service always grants one; a refusal is
   * reported as UnexpectedStateError and also rejects pending `awaitToken` calls.
   */
  fetchToken(): Promise<void> {
    if (this.state.status === 'disabled') {
      return Promise.reject(new TokenStateError('Session tokens are disabled for this client'))
    }
    this.failure = null

    return this.enqueue(async () => {
      try {
        const url = `${this.endpoint}?command=request`
        const body = parseBody(await this.transport.get(url), TokenResponseSchema, url)
        const responseCode = fromCode(body.response_code)

        if (responseCode !== ResponseCodes.SUCCESS || !body.token) {
          throw new UnexpectedStateError(
            `Token endpoint refused to issue a session token (response_code ${body.response_code})`
          )
        }

        logger.debug('Initializing session token')
        this.transition({ status: 'active', token: body.token, issuedAt: this.now() })
      } catch (error) {
        this.fail(error)
        throw error
      }
    })
  }

  /**
   * Wipe the service's memory of questions served to the current token.
   * The token string stays the same; its issuance time moves to now.
   *
   * @throws TokenStateError synchronously when there is no token to reset
   */
  resetToken(): Promise<void> {
    if (this.state.status !== 'active') {
      throw new TokenStateError("Can't reset a missing session token")
    }

    return this.enqueue(async () => {
      // A fetch queued ahead of this reset may have replaced the token
      const current = this.state
      if (current.status !== 'active') {
        throw new TokenStateError("Can't reset a missing session token")
      }
      const url = `${this.endpoint}?command=reset&token=${encodeURIComponent(current.token)}`
      const body = parseBody(await this.transport.get(url), TokenResponseSchema, url)

      if (fromCode(body.response_code) !== ResponseCodes.SUCCESS) {
        throw errorForResponseCode(body.response_code, this)
      }

      logger.info('Session token has been reset')
      this.transition({ status: 'active', token: current.token, issuedAt: this.now() })
    })
  }

  /**
   * Resolve once the token leaves the uninitialized state: with the token, or with
   * `null` when session tokens are disabled.
   *
   * @throws CancellationError when `signal` aborts first
   */
  awaitToken(options: { signal?: AbortSignal } = {}): Promise<string | null> {
    const { signal } = options
    if (signal?.aborted) {
      return Promise.reject(new CancellationError('Stopped waiting for the session token', signal.reason))
    }

    const current = this.state
    if (current.status === 'disabled') return Promise.resolve(null)
    if (current.status === 'active') return Promise.resolve(current.token)
    if (this.failure !== null) return Promise.reject(this.failure)

    return new Promise<string | null>((resolve, reject) => {
      const onAbort = () => {
        waiter.reject(new CancellationError('Stopped waiting for the session token', signal?.reason))
      }
      const cleanup = () => {
        this.waiters.delete(waiter)
        signal?.removeEventListener('abort', onAbort)
      }
      const waiter: Waiter = {
        resolve: (token) => {
          cleanup()
          resolve(token)
        },
        reject: (error) => {
          cleanup()
          reject(error)
        },
      }

      this.waiters.add(waiter)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }

  private transition(next: TokenState): void {
    this.state = Object.freeze(next)
    if (next.status === 'uninitialized') return

    const token = next.status === 'active' ? next.token : null
    for (const waiter of [...this.waiters]) {
      waiter.resolve(token)
    }
  }

  private fail(error: unknown): void {
    // A failed refetch keeps the previous token usable
    if (this.state.status !== 'uninitialized') return

    this.failure = error
    for (const waiter of [...this.waiters]) {
      waiter.reject(error)
    }
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.mutations.then(task)
    // The queue only orders writes; each caller still receives its own outcome through `run`
    this.mutations = run.catch(() => undefined)
    return run
  }
}
