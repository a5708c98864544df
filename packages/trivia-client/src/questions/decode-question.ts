import type { CategoryRegistry } from '../categories/category-registry'
import { DecodeError } from '../errors'
import { logger } from '../logger'
import {
  DifficultySchema,
  type EncodingType,
  QuestionTypeSchema,
  decodeText,
} from '../request/parameters'
import type { QuestionResult } from '../schemas'
import {
  type Question,
  type QuestionFields,
  assertNever,
  booleanQuestion,
  multipleChoiceQuestion,
} from './question'

export type DecodeContext = {
  encoding: EncodingType
  categories: CategoryRegistry
}

function decodeField(value: string, field: string, encoding: EncodingType): string {
  try {
    return decodeText(value, encoding)
  } catch (error) {
    throw new DecodeError(`Field "${field}" is not valid ${encoding} text: ${value}`, error)
  }
}

function parseBoolean(value: string, field: string, encoding: EncodingType): boolean {
  const decoded = decodeField(value, field, encoding).trim().toLowerCase()
  if (decoded === 'true') return true
  if (decoded === 'false') return false
  throw new DecodeError(`Field "${field}" of a boolean question is not True/False: ${value}`)
}

/**
 * Turn one element of the `results` array into a Question.
 *
 * Metadata fields (type, difficulty, category, boolean answers) are decoded from the
 * client's encoding so they can be matched. Question text and multiple choice answers
 * are kept exactly as the service delivered them.
 */
export function decodeQuestion(result: QuestionResult, context: DecodeContext): Question {
  const { encoding, categories } = context

  const rawType = decodeField(result.type, 'type', encoding)
  const type = QuestionTypeSchema.safeParse(rawType.toLowerCase())
  if (!type.success) {
    throw new DecodeError(`Unrecognized question type "${rawType}"`)
  }

  const rawDifficulty = decodeField(result.difficulty, 'difficulty', encoding)
  const difficulty = DifficultySchema.safeParse(rawDifficulty.toLowerCase())
  if (!difficulty.success) {
    throw new DecodeError(`Unrecognized difficulty "${rawDifficulty}"`)
  }

  const categoryName = decodeField(result.category, 'category', encoding)
  const category = categories.fromName(categoryName)
  if (!category && categories.isLoaded) {
    logger.warn(`Category "${categoryName}" is not in the category registry`)
  }

  const fields: QuestionFields = {
    category,
    difficulty: difficulty.data,
    text: result.question,
  }

  switch (type.data) {
    case 'boolean': {
      const correct = parseBoolean(result.correct_answer, 'correct_answer', encoding)
      const [incorrectRaw] = result.incorrect_answers
      if (
        incorrectRaw !== undefined &&
        parseBoolean(incorrectRaw, 'incorrect_answers', encoding) === correct
      ) {
        throw new DecodeError('Boolean question lists its correct answer as incorrect')
      }
      return booleanQuestion(fields, correct)
    }
    case 'multiple':
      return multipleChoiceQuestion(fields, result.correct_answer, result.incorrect_answers)
    default:
      return assertNever(type.data)
  }
}
