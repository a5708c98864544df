import type { CategoryRegistry } from './categories/category-registry'
import { CancellationError, ErrorResponseError, TransportError } from './errors'
import { logger } from './logger'
import { decodeQuestion } from './questions/decode-question'
import { type Question, describeQuestion } from './questions/question'
import {
  type EncodingType,
  categoryParameter,
  difficultyParameter,
  encodingParameter,
  typeParameter,
} from './request/parameters'
import type { QuestionRequest } from './request/request'
import { ResponseCodes, fromCode } from './request/response-code'
import { errorForResponseCode } from './response-errors'
import { QuestionResponseSchema, parseBody } from './schemas'
import type { TokenManager } from './token/token-manager'
import type { HttpTransport } from './transport/http-transport'
import type { RequestParameter } from './types'

export type RequesterDependencies = {
  transport: HttpTransport
  tokens: TokenManager
  categories: CategoryRegistry
  encoding: EncodingType
  baseUrl: string
}

export type SendOptions = {
  signal?: AbortSignal
}

/**
 * Turns QuestionRequests into calls against the question endpoint and
 * interprets what comes back.
 */
export class Requester {
  private readonly endpoint: string

  constructor(private readonly deps: RequesterDependencies) {
    this.endpoint = `${deps.baseUrl}/api.php`
  }

  /**
   * Query parameters in wire order: encode, amount, the filters that are set, token.
   * `encode` is always sent, with an empty value for the default encoding.
   */
  buildParameters(request: QuestionRequest, token: string | null): RequestParameter[] {
    const params: RequestParameter[] = [
      encodingParameter(this.deps.encoding),
      { name: 'amount', value: String(request.amount) },
    ]

    if (request.category) params.push(categoryParameter(request.category))
    if (request.type) params.push(typeParameter(request.type))
    if (request.difficulty) params.push(difficultyParameter(request.difficulty))
    // Disabled or not fetched yet
    if (token !== null) params.push({ name: 'token', value: token })

    return params
  }

  buildUrl(request: QuestionRequest): string {
    const state = this.deps.tokens.snapshot()
    const token = state.status === 'active' ? state.token : null
    const query = new URLSearchParams(
      this.buildParameters(request, token).map<[string, string]>(({ name, value }) => [name, value])
    )
    return `${this.endpoint}?${query.toString()}`
  }

  /**
   * Dispatch and resolve with the decoded questions. Transport failures reject unchanged.
   */
  async sendAsync(request: QuestionRequest): Promise<Question[]> {
    const body = await this.deps.transport.get(this.buildUrl(request))
    return this.handleResponse(body)
  }

  /**
   * Dispatch and wait for the outcome. Network failures and cancellation through
   * `signal` are reported as TransportError, so every failure is an ErrorResponseError
   * or a decoding error.
   */
  async send(request: QuestionRequest, options: SendOptions = {}): Promise<Question[]> {
    const { signal } = options
    let body: string
    try {
      if (signal?.aborted) {
        throw new CancellationError('Request cancelled before it was sent', signal.reason)
      }
      body = await this.deps.transport.get(this.buildUrl(request), { signal })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new TransportError(reason, error)
    }
    return this.handleResponse(body)
  }

  handleResponse(raw: string): Question[] {
    const body = parseBody(raw, QuestionResponseSchema, this.endpoint)
    const responseCode = fromCode(body.response_code)

    if (responseCode !== ResponseCodes.SUCCESS) {
      throw errorForResponseCode(body.response_code, this.deps.tokens)
    }

    return body.results.map((result) => {
      const question = decodeQuestion(result, {
        encoding: this.deps.encoding,
        categories: this.deps.categories,
      })
      logger.debug(`Fetched question ${describeQuestion(question)}`)
      return question
    })
  }
}

export function isErrorResponse(error: unknown): error is ErrorResponseError {
  return error instanceof ErrorResponseError
}
