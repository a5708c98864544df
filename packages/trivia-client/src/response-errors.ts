import { ErrorResponseError } from './errors'
import { fromCode, ResponseCodes } from './request/response-code'

export const TOKEN_EXPIRED_MESSAGE =
  'Session Token has been invalidated after 6 hours of inactivity'

export type TokenExpiryProbe = {
  readonly issuedAt: number | null
  isTokenExpired(): boolean
}

/**
 * Build the error for a non-success `response_code`.
 *
 * TOKEN_NOT_FOUND for a token known to have outlived the inactivity window gets an
 * explanatory message; the error kind and code stay the same.
 */
export function errorForResponseCode(rawCode: number, tokens: TokenExpiryProbe): ErrorResponseError {
  const responseCode = fromCode(rawCode)
  if (
    responseCode === ResponseCodes.TOKEN_NOT_FOUND &&
    tokens.issuedAt !== null &&
    tokens.isTokenExpired()
  ) {
    return new ErrorResponseError(responseCode, TOKEN_EXPIRED_MESSAGE, { code: rawCode })
  }
  return new ErrorResponseError(responseCode, undefined, { code: rawCode })
}
