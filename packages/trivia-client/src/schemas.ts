import { z } from 'zod'
import { DecodeError } from './errors'

/**
 * Wire shapes of the trivia API. Field names follow the service's JSON.
 */

export const ResponseEnvelopeSchema = z
  .object({
    response_code: z.number().int(),
    response_message: z.string().optional(),
  })
  .passthrough()

export const QuestionResultSchema = z.object({
  // Validated against the known types by the decoder, which reports unknown ones by name
  type: z.string(),
  category: z.string(),
  difficulty: z.string(),
  question: z.string(),
  correct_answer: z.string(),
  incorrect_answers: z.array(z.string()),
})

export const QuestionResponseSchema = ResponseEnvelopeSchema.extend({
  results: z.array(QuestionResultSchema).default([]),
})

export const TokenResponseSchema = ResponseEnvelopeSchema.extend({
  token: z.string().min(1).optional(),
})

export const CategoryListSchema = z.object({
  trivia_categories: z.array(
    z.object({
      id: z.number().int(),
      name: z.string(),
    })
  ),
})

export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>
export type QuestionResult = z.infer<typeof QuestionResultSchema>
export type QuestionResponse = z.infer<typeof QuestionResponseSchema>
export type TokenResponse = z.infer<typeof TokenResponseSchema>
export type CategoryList = z.infer<typeof CategoryListSchema>

/**
 * Parse a raw response body against a wire schema.
 *
 * @throws DecodeError with a snippet of the body when it is not JSON or has the wrong shape
 */
export function parseBody<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, endpoint: string): T {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new DecodeError(`Response from ${endpoint} is not JSON. Snippet: ${raw.slice(0, 200)}`, error)
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new DecodeError(`Unexpected response shape from ${endpoint}: ${reason}`, parsed.error)
  }
  return parsed.data
}
