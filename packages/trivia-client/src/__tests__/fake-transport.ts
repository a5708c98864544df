import { vi } from 'vitest'
import type { HttpTransport, TransportRequestOptions } from '../transport/http-transport'

type Responder = (url: string, options?: TransportRequestOptions) => string | Promise<string>

/**
 * In-process stand-in for the HTTP layer. Every call is recorded on `get`.
 */
export function fakeTransport(respond: Responder) {
  const get = vi.fn(
    async (url: string, options?: TransportRequestOptions): Promise<string> => respond(url, options)
  )
  const transport: HttpTransport = { get }
  return { transport, get }
}

export const json = (body: unknown): string => JSON.stringify(body)

export const TOKEN_GRANTED = json({
  response_code: 0,
  response_message: 'Token Generated Successfully!',
  token: 'test-token',
})

export const CATEGORY_LIST = json({
  trivia_categories: [
    { id: 9, name: 'General Knowledge' },
    { id: 18, name: 'Science: Computers' },
    { id: 23, name: 'History' },
  ],
})
