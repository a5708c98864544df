import { describe, expect, it } from 'vitest'
import { ResponseCodes, fromCode } from '../response-code'

describe('response codes', () => {
  it('maps 0 to SUCCESS, which is not an error', () => {
    expect(fromCode(0)).toBe(ResponseCodes.SUCCESS)
    expect(fromCode(0).isError).toBe(false)
  })

  it.each([
    [1, 'NO_RESULTS'],
    [2, 'INVALID_PARAMETER'],
    [3, 'TOKEN_NOT_FOUND'],
    [4, 'TOKEN_EMPTY'],
  ] as const)('maps %i to the error %s', (code, name) => {
    const responseCode = fromCode(code)

    expect(responseCode.name).toBe(name)
    expect(responseCode.code).toBe(code)
    expect(responseCode.isError).toBe(true)
  })

  it.each([999, 5, -1, -42])('falls back to UNKNOWN for %i', (code) => {
    expect(fromCode(code)).toBe(ResponseCodes.UNKNOWN)
    expect(fromCode(code).isError).toBe(false)
  })

  it('describes each code', () => {
    expect(ResponseCodes.TOKEN_EMPTY.meaning).toBe('Token Empty')
    expect(ResponseCodes.UNKNOWN.meaning).toBe('Unknown Response Code')
  })
})
