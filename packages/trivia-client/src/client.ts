import { CategoryRegistry } from './categories/category-registry'
import { DEFAULT_BASE_URL, loadClientConfig } from './config'
import { logger } from './logger'
import type { Question } from './questions/question'
import type { EncodingType } from './request/parameters'
import { QuestionRequest } from './request/request'
import { Requester, type SendOptions } from './requester'
import { TokenManager } from './token/token-manager'
import { FetchTransport, type HttpTransport } from './transport/http-transport'
import type { TokenState } from './types'

export type TriviaClientOptions = {
  transport?: HttpTransport
  encoding?: EncodingType
  useSessionToken?: boolean
  baseUrl?: string
  categories?: CategoryRegistry
  now?: () => number
}

/**
 * Entry point to the trivia API.
 *
 * With session tokens enabled (the default) the client requests a token as soon as it
 * is constructed. Requests sent before the token arrives go out without one; call
 * `awaitToken()` first when repeat questions matter.
 */
export class TriviaClient {
  readonly encoding: EncodingType
  readonly categories: CategoryRegistry
  private readonly tokens: TokenManager
  private readonly requester: Requester

  constructor(options: TriviaClientOptions = {}) {
    const transport = options.transport ?? new FetchTransport()
    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    const useSessionToken = options.useSessionToken ?? true

    this.encoding = options.encoding ?? 'html'
    this.categories = options.categories ?? new CategoryRegistry(transport, baseUrl, options.now)
    this.tokens = new TokenManager({
      transport,
      baseUrl,
      enabled: useSessionToken,
      now: options.now,
    })
    this.requester = new Requester({
      transport,
      baseUrl,
      tokens: this.tokens,
      categories: this.categories,
      encoding: this.encoding,
    })

    if (useSessionToken) {
      // Failures also reach callers of awaitToken()
      this.tokens.fetchToken().catch((error: unknown) => {
        logger.error({ err: error }, 'Session token could not be fetched')
      })
    }
  }

  /** HTML encoding, session token enabled, public service */
  static create(): TriviaClient {
    return new TriviaClient()
  }

  static newBuilder(): TriviaClientBuilder {
    return new TriviaClientBuilder()
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, transport?: HttpTransport): TriviaClient {
    const config = loadClientConfig(env)
    return new TriviaClient({ ...config, transport })
  }

  /** `null` when tokens are disabled or the token has not arrived yet */
  get token(): string | null {
    return this.tokens.token
  }

  get tokenState(): TokenState {
    return this.tokens.snapshot()
  }

  isTokenExpired(): boolean {
    return this.tokens.isTokenExpired()
  }

  /**
   * @throws TokenStateError synchronously when there is no token to reset
   */
  resetToken(): Promise<void> {
    return this.tokens.resetToken()
  }

  async awaitToken(options: { signal?: AbortSignal } = {}): Promise<this> {
    await this.tokens.awaitToken(options)
    return this
  }

  fetchQuestionsAsync(amount: number): Promise<Question[]> {
    return this.requester.sendAsync(QuestionRequest.newRequest(amount))
  }

  sendAsync(request: QuestionRequest): Promise<Question[]> {
    return this.requester.sendAsync(request)
  }

  send(request: QuestionRequest, options: SendOptions = {}): Promise<Question[]> {
    return this.requester.send(request, options)
  }

  buildUrl(request: QuestionRequest): string {
    return this.requester.buildUrl(request)
  }
}

export class TriviaClientBuilder {
  private readonly options: TriviaClientOptions = {}

  setTransport(transport: HttpTransport): this {
    this.options.transport = transport
    return this
  }

  /** Escaping applied by the service to question text, HTML entities by default */
  setEncoding(encoding: EncodingType): this {
    this.options.encoding = encoding
    return this
  }

  /**
   * Session tokens stop the service from repeating questions to this client. Once all
   * questions for a query are used up, reset the token or build a new client.
   */
  useSessionToken(useSessionToken: boolean): this {
    this.options.useSessionToken = useSessionToken
    return this
  }

  setBaseUrl(baseUrl: string): this {
    this.options.baseUrl = baseUrl
    return this
  }

  setCategoryRegistry(categories: CategoryRegistry): this {
    this.options.categories = categories
    return this
  }

  setClock(now: () => number): this {
    this.options.now = now
    return this
  }

  build(): TriviaClient {
    return new TriviaClient({ ...this.options })
  }
}
