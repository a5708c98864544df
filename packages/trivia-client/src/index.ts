export * from './types'
export { TriviaClient, TriviaClientBuilder, type TriviaClientOptions } from './client'
export { loadClientConfig, DEFAULT_BASE_URL, type ClientConfig } from './config'
export {
  ValidationError,
  ErrorResponseError,
  TransportError,
  UnexpectedStateError,
  InvalidNarrowingError,
  DecodeError,
  TokenStateError,
  CancellationError,
} from './errors'
export { logger } from './logger'
export { CategoryRegistry } from './categories/category-registry'
export { QuestionRequest, QuestionRequestBuilder } from './request/request'
export {
  ResponseCodes,
  fromCode,
  type ResponseCode,
  type ResponseCodeName,
} from './request/response-code'
export {
  EncodingTypeSchema,
  QuestionTypeSchema,
  DifficultySchema,
  encodingParameter,
  encodingLabel,
  categoryParameter,
  typeParameter,
  difficultyParameter,
  decodeText,
  type EncodingType,
  type QuestionType,
  type Difficulty,
} from './request/parameters'
export {
  multipleChoiceQuestion,
  booleanQuestion,
  toMultiple,
  toBoolean,
  isCorrectAnswer,
  incorrectAnswersOf,
  allAnswers,
  describeQuestion,
  describeCategory,
  assertNever,
  type Question,
  type MultipleChoiceQuestion,
  type BooleanQuestion,
} from './questions/question'
export { Requester, isErrorResponse, type SendOptions } from './requester'
export { TokenManager, TOKEN_INACTIVITY_LIMIT_MS, type TokenManagerOptions } from './token/token-manager'
export { TOKEN_EXPIRED_MESSAGE } from './response-errors'
export { FetchTransport, type HttpTransport, type TransportRequestOptions } from './transport/http-transport'
