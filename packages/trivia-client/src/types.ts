export type Category = {
  readonly id: number
  readonly name: string
}

/**
 * A query-string name/value pair understood by the trivia API
 */
export type RequestParameter = {
  readonly name: string
  readonly value: string
}

export type TokenState =
  | { readonly status: 'disabled' }
  | { readonly status: 'uninitialized' }
  | { readonly status: 'active'; readonly token: string; readonly issuedAt: number }
