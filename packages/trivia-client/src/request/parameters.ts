import he from 'he'
import { z } from 'zod'
import type { Category, RequestParameter } from '../types'

export const EncodingTypeSchema = z.enum(['html', 'legacyUrl', 'rfc3986', 'base64'])
export const QuestionTypeSchema = z.enum(['multiple', 'boolean'])
export const DifficultySchema = z.enum(['easy', 'medium', 'hard'])

export type EncodingType = z.infer<typeof EncodingTypeSchema>
export type QuestionType = z.infer<typeof QuestionTypeSchema>
export type Difficulty = z.infer<typeof DifficultySchema>

/**
 * Wire codes for the `encode` parameter. These follow the remote API's vocabulary
 * and must only change together with it.
 */
const ENCODINGS: Record<EncodingType, { code: string; label: string }> = {
  html: { code: '', label: 'Default Encoding (HTML Codes)' },
  legacyUrl: { code: 'urlLegacy', label: 'Legacy URL Encoding' },
  rfc3986: { code: 'url3986', label: 'URL Encoding (RFC 3986)' },
  base64: { code: 'base64', label: 'Base64 Encoding' },
}

export function encodingParameter(encoding: EncodingType): RequestParameter {
  return { name: 'encode', value: ENCODINGS[encoding].code }
}

export function encodingLabel(encoding: EncodingType): string {
  return ENCODINGS[encoding].label
}

export function categoryParameter(category: Category): RequestParameter {
  return { name: 'category', value: String(category.id) }
}

export function typeParameter(type: QuestionType): RequestParameter {
  return { name: 'type', value: type }
}

export function difficultyParameter(difficulty: Difficulty): RequestParameter {
  return { name: 'difficulty', value: difficulty }
}

/**
 * Undo the escaping the service applied under the given encoding.
 */
export function decodeText(value: string, encoding: EncodingType): string {
  switch (encoding) {
    case 'html':
      return he.decode(value)
    case 'legacyUrl':
      return decodeURIComponent(value.replace(/\+/g, ' '))
    case 'rfc3986':
      return decodeURIComponent(value)
    case 'base64':
      return Buffer.from(value, 'base64').toString('utf-8')
  }
}
