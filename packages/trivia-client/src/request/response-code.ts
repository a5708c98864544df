export type ResponseCodeName =
  | 'UNKNOWN'
  | 'SUCCESS'
  | 'NO_RESULTS'
  | 'INVALID_PARAMETER'
  | 'TOKEN_NOT_FOUND'
  | 'TOKEN_EMPTY'

export type ResponseCode = {
  readonly name: ResponseCodeName
  readonly code: number
  readonly meaning: string
  readonly isError: boolean
}

/**
 * Every `response_code` the trivia API documents.
 *
 * UNKNOWN is the fallback for numbers outside this table and is not flagged as an error.
 */
export const ResponseCodes = {
  UNKNOWN: { name: 'UNKNOWN', code: -1, meaning: 'Unknown Response Code', isError: false },
  SUCCESS: { name: 'SUCCESS', code: 0, meaning: 'Success', isError: false },
  // The API doesn't have enough questions for the query
  NO_RESULTS: { name: 'NO_RESULTS', code: 1, meaning: 'No Results', isError: true },
  INVALID_PARAMETER: {
    name: 'INVALID_PARAMETER',
    code: 2,
    meaning: 'Invalid Parameter',
    isError: true,
  },
  // Most commonly the service dropped the token after 6 hours of inactivity
  TOKEN_NOT_FOUND: { name: 'TOKEN_NOT_FOUND', code: 3, meaning: 'Token Not Found', isError: true },
  // All questions for the query were already served to this token; reset it
  TOKEN_EMPTY: { name: 'TOKEN_EMPTY', code: 4, meaning: 'Token Empty', isError: true },
} as const satisfies Record<ResponseCodeName, ResponseCode>

const BY_CODE: ReadonlyMap<number, ResponseCode> = new Map(
  Object.values(ResponseCodes).map((responseCode) => [responseCode.code, responseCode])
)

export function fromCode(code: number): ResponseCode {
  return BY_CODE.get(code) ?? ResponseCodes.UNKNOWN
}
