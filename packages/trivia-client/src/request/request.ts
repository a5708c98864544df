import { z } from 'zod'
import { ValidationError } from '../errors'
import type { Category } from '../types'
import type { Difficulty, QuestionType } from './parameters'

const AmountSchema = z
  .number({ invalid_type_error: 'Amount must be a number' })
  .int('Amount must be a whole number')
  .positive("Can't create a request with an amount of 0 or less")

function validateAmount(amount: number): number {
  const parsed = AmountSchema.safeParse(amount)
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid amount', 'amount')
  }
  return parsed.data
}

/**
 * An immutable request for `amount` questions, optionally filtered.
 *
 * The service never returns more than 50 questions per call. Larger amounts are
 * accepted here and passed through unchanged; the service caps the result.
 */
export class QuestionRequest {
  private constructor(
    public readonly amount: number,
    public readonly category: Category | null,
    public readonly type: QuestionType | null,
    public readonly difficulty: Difficulty | null
  ) {
    Object.freeze(this)
  }

  static newRequest(amount: number): QuestionRequest {
    return QuestionRequest.newBuilder(amount).build()
  }

  static newBuilder(amount: number): QuestionRequestBuilder {
    return new QuestionRequestBuilder(amount)
  }

  /** @internal used by the builder only */
  static fromBuilder(
    amount: number,
    category: Category | null,
    type: QuestionType | null,
    difficulty: Difficulty | null
  ): QuestionRequest {
    return new QuestionRequest(amount, category, type, difficulty)
  }
}

export class QuestionRequestBuilder {
  private readonly amount: number
  private category: Category | null = null
  private type: QuestionType | null = null
  private difficulty: Difficulty | null = null

  constructor(amount: number) {
    this.amount = validateAmount(amount)
  }

  /**
   * Category to draw questions from; `null` removes the filter.
   * Look categories up through a CategoryRegistry.
   */
  fromCategory(category: Category | null): this {
    this.category = category
    return this
  }

  ofType(type: QuestionType | null): this {
    this.type = type
    return this
  }

  ofDifficulty(difficulty: Difficulty | null): this {
    this.difficulty = difficulty
    return this
  }

  build(): QuestionRequest {
    return QuestionRequest.fromBuilder(this.amount, this.category, this.type, this.difficulty)
  }
}
