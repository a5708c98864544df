import { InvalidNarrowingError } from '../errors'
import type { Difficulty } from '../request/parameters'
import type { Category } from '../types'

type QuestionBase = {
  /** `null` when the category name is not in the registry */
  readonly category: Category | null
  readonly difficulty: Difficulty
  readonly text: string
}

export type MultipleChoiceQuestion = QuestionBase & {
  readonly type: 'multiple'
  readonly correctAnswer: string
  readonly incorrectAnswers: readonly string[]
}

export type BooleanQuestion = QuestionBase & {
  readonly type: 'boolean'
  readonly correctAnswer: boolean
  readonly incorrectAnswer: boolean
}

export type Question = MultipleChoiceQuestion | BooleanQuestion

export type QuestionFields = QuestionBase

export function assertNever(value: never): never {
  throw new Error(`Unhandled question variant: ${JSON.stringify(value)}`)
}

export function multipleChoiceQuestion(
  fields: QuestionFields,
  correctAnswer: string,
  incorrectAnswers: readonly string[]
): MultipleChoiceQuestion {
  const question: MultipleChoiceQuestion = {
    ...fields,
    type: 'multiple',
    correctAnswer,
    incorrectAnswers: Object.freeze([...incorrectAnswers]),
  }
  return Object.freeze(question)
}

export function booleanQuestion(fields: QuestionFields, correctAnswer: boolean): BooleanQuestion {
  const question: BooleanQuestion = {
    ...fields,
    type: 'boolean',
    correctAnswer,
    incorrectAnswer: !correctAnswer,
  }
  return Object.freeze(question)
}

export function toMultiple(question: Question): MultipleChoiceQuestion {
  if (question.type !== 'multiple') {
    throw new InvalidNarrowingError('multiple', question.type)
  }
  return question
}

export function toBoolean(question: Question): BooleanQuestion {
  if (question.type !== 'boolean') {
    throw new InvalidNarrowingError('boolean', question.type)
  }
  return question
}

export function isCorrectAnswer(question: MultipleChoiceQuestion, answer: string): boolean
export function isCorrectAnswer(question: BooleanQuestion, answer: boolean): boolean
export function isCorrectAnswer(question: Question, answer: string | boolean): boolean
export function isCorrectAnswer(question: Question, answer: string | boolean): boolean {
  return question.correctAnswer === answer
}

export function incorrectAnswersOf(question: MultipleChoiceQuestion): readonly string[]
export function incorrectAnswersOf(question: BooleanQuestion): readonly boolean[]
export function incorrectAnswersOf(question: Question): readonly string[] | readonly boolean[]
export function incorrectAnswersOf(question: Question): readonly string[] | readonly boolean[] {
  switch (question.type) {
    case 'multiple':
      return question.incorrectAnswers
    case 'boolean':
      return [question.incorrectAnswer]
    default:
      return assertNever(question)
  }
}

/**
 * Correct answer first, followed by the incorrect ones in wire order
 */
export function allAnswers(question: Question): ReadonlyArray<string | boolean> {
  switch (question.type) {
    case 'multiple':
      return [question.correctAnswer, ...question.incorrectAnswers]
    case 'boolean':
      return [question.correctAnswer, question.incorrectAnswer]
    default:
      return assertNever(question)
  }
}

export function describeCategory(category: Category | null): string {
  return category ? `C:${category.name}(${category.id})` : 'C:?'
}

export function describeQuestion(question: Question): string {
  return `Q:${question.text}(${describeCategory(question.category)}/${question.type}/${question.difficulty})`
}
