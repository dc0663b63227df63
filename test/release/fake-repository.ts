import { vi } from 'vitest'

import type { TagSource } from '../../types/tag-source'
import type { TagTarget } from '../../types/tag-target'

/**
 * In-memory repository for planning tests.
 *
 * @param names - Existing tag names.
 * @returns Tag source and target backed by the names.
 */
export function createFakeRepository(names: string[]): TagSource & TagTarget {
  return {
    resolveSha: vi.fn((reference: string) =>
      Promise.resolve(reference === 'HEAD' ? 'head-sha' : `${reference}-sha`),
    ),
    hasTag: vi.fn((tag: string) => Promise.resolve(names.includes(tag))),
    listTags: vi.fn(() =>
      Promise.resolve(names.map(tag => ({ sha: null, tag }))),
    ),
    createTag: vi.fn(() => Promise.resolve()),
    describe: () => 'o/r',
  }
}
