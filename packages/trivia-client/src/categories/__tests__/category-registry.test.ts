import { describe, expect, it, vi } from 'vitest'
import { CATEGORY_LIST, fakeTransport, json } from '../../__tests__/fake-transport'
import { DecodeError } from '../../errors'
import { CategoryRegistry } from '../category-registry'

vi.mock('../../logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}))

describe('CategoryRegistry', () => {
  it('starts empty and answers lookups with null', () => {
    const { transport, get } = fakeTransport(() => CATEGORY_LIST)
    const registry = new CategoryRegistry(transport, 'https://trivia.test')

    expect(registry.isLoaded).toBe(false)
    expect(registry.lastRefreshedAt).toBeNull()
    expect(registry.all()).toEqual([])
    expect(registry.fromId(9)).toBeNull()
    expect(registry.fromName('History')).toBeNull()
    expect(get).not.toHaveBeenCalled()
  })

  it('loads categories from the category endpoint', async () => {
    const { transport, get } = fakeTransport(() => CATEGORY_LIST)
    const registry = new CategoryRegistry(transport, 'https://trivia.test')

    const loaded = await registry.refresh()

    expect(get).toHaveBeenCalledWith('https://trivia.test/api_category.php', {})
    expect(loaded).toHaveLength(3)
    expect(registry.isLoaded).toBe(true)
    expect(registry.fromId(18)).toEqual({ id: 18, name: 'Science: Computers' })
    expect(registry.fromName('History')).toEqual({ id: 23, name: 'History' })
    expect(registry.fromName('history')).toBeNull()
    expect(registry.fromId(999)).toBeNull()
  })

  it('stamps each refresh with the injected clock', async () => {
    let clock = 1_700_000_000_000
    const { transport } = fakeTransport(() => CATEGORY_LIST)
    const registry = new CategoryRegistry(transport, 'https://trivia.test', () => clock)

    await registry.refresh()
    expect(registry.lastRefreshedAt).toEqual(new Date(1_700_000_000_000))

    clock += 60_000
    await registry.refresh()
    expect(registry.lastRefreshedAt).toEqual(new Date(1_700_000_060_000))
  })

  it('replaces the table on refresh', async () => {
    let body = CATEGORY_LIST
    const { transport } = fakeTransport(() => body)
    const registry = new CategoryRegistry(transport, 'https://trivia.test')
    await registry.refresh()

    body = json({ trivia_categories: [{ id: 31, name: 'Entertainment: Japanese Anime & Manga' }] })
    await registry.refresh()

    expect(registry.all()).toEqual([{ id: 31, name: 'Entertainment: Japanese Anime & Manga' }])
    expect(registry.fromId(9)).toBeNull()
  })

  it('keeps the previous table when the response is malformed', async () => {
    let body = CATEGORY_LIST
    const { transport } = fakeTransport(() => body)
    const registry = new CategoryRegistry(transport, 'https://trivia.test')
    await registry.refresh()

    body = json({ categories: [] })

    await expect(registry.refresh()).rejects.toThrow(DecodeError)
    expect(registry.all()).toHaveLength(3)
  })
})
