import { logger } from '../logger'
import { CategoryListSchema, parseBody } from '../schemas'
import type { HttpTransport } from '../transport/http-transport'
import type { Category } from '../types'

/**
 * Lookup table of the service's categories.
 *
 * Starts empty and is filled by `refresh()`; it never loads on its own. Lookups
 * against an empty table return `null`.
 */
export class CategoryRegistry {
  private categories: readonly Category[] = []
  private refreshedAt: number | null = null

  constructor(
    private readonly transport: HttpTransport,
    private readonly baseUrl: string,
    private readonly now: () => number = () => Date.now()
  ) {}

  get isLoaded(): boolean {
    return this.refreshedAt !== null
  }

  get lastRefreshedAt(): Date | null {
    return this.refreshedAt === null ? null : new Date(this.refreshedAt)
  }

  async refresh(options: { signal?: AbortSignal } = {}): Promise<readonly Category[]> {
    const endpoint = `${this.baseUrl}/api_category.php`
    const body = await this.transport.get(endpoint, options)
    const list = parseBody(body, CategoryListSchema, endpoint)

    this.categories = Object.freeze(
      list.trivia_categories.map((entry) => Object.freeze({ id: entry.id, name: entry.name }))
    )
    this.refreshedAt = this.now()
    logger.info(`Loaded ${this.categories.length} trivia categories`)
    return this.categories
  }

  all(): readonly Category[] {
    return this.categories
  }

  fromId(id: number): Category | null {
    return this.categories.find((category) => category.id === id) ?? null
  }

  fromName(name: string): Category | null {
    return this.categories.find((category) => category.name === name) ?? null
  }
}
