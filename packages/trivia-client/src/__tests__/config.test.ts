import { describe, expect, it } from 'vitest'
import { DEFAULT_BASE_URL, loadClientConfig } from '../config'
import { resolveMinLevel } from '../logger'

describe('loadClientConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadClientConfig({})).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      encoding: 'html',
      useSessionToken: true,
    })
  })

  it('reads every variable', () => {
    expect(
      loadClientConfig({
        TRIVIA_API_BASE_URL: 'http://localhost:3000/',
        TRIVIA_ENCODING: 'legacyUrl',
        TRIVIA_USE_SESSION_TOKEN: 'false',
      })
    ).toEqual({
      baseUrl: 'http://localhost:3000',
      encoding: 'legacyUrl',
      useSessionToken: false,
    })
  })

  it('falls back on values it does not understand', () => {
    expect(
      loadClientConfig({
        TRIVIA_API_BASE_URL: 'not a url',
        TRIVIA_ENCODING: 'rot13',
        TRIVIA_USE_SESSION_TOKEN: 'sometimes',
      })
    ).toEqual({
      baseUrl: DEFAULT_BASE_URL,
      encoding: 'html',
      useSessionToken: true,
    })
  })

  it.each(['0', 'no', 'FALSE'])('disables session tokens for %s', (value) => {
    expect(loadClientConfig({ TRIVIA_USE_SESSION_TOKEN: value }).useSessionToken).toBe(false)
  })
})

describe('resolveMinLevel', () => {
  it.each([
    ['debug', 2],
    ['info', 3],
    ['WARN', 4],
    ['error', 5],
  ])('maps LOG_LEVEL=%s to %i', (level, expected) => {
    expect(resolveMinLevel({ LOG_LEVEL: level })).toBe(expected)
  })

  it('defaults to info in production and debug elsewhere', () => {
    expect(resolveMinLevel({ NODE_ENV: 'production' })).toBe(3)
    expect(resolveMinLevel({ NODE_ENV: 'test' })).toBe(2)
    expect(resolveMinLevel({ LOG_LEVEL: 'loud' })).toBe(2)
  })
})
