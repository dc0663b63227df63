import { beforeEach, describe, expect, it, vi } from 'vitest'

import { getCommitSha } from '../../core/api/get-commit-sha'
import { createContext, json } from './context'

describe('getCommitSha', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('resolves a reference and caches it', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockImplementation(() => Promise.resolve(json({ sha: 'c0ffee' })))
    let context = createContext('t')

    let first = await getCommitSha(context, {
      reference: 'HEAD',
      owner: 'o',
      repo: 'r',
    })
    let second = await getCommitSha(context, {
      reference: 'HEAD',
      owner: 'o',
      repo: 'r',
    })

    expect(first).toBe('c0ffee')
    expect(second).toBe('c0ffee')
    expect(spy).toHaveBeenCalledOnce()
    expect(context.caches.commitSha.get('o/r#HEAD')).toBe('c0ffee')
  })

  it('encodes branch names', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(json({ sha: 'abc' }))

    await getCommitSha(createContext(), {
      reference: 'feature/tags',
      owner: 'o',
      repo: 'r',
    })

    expect(spy.mock.calls[0]?.[0]).toBe(
      'https://api.github.com/repos/o/r/commits/feature%2Ftags',
    )
  })

  it('propagates API errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      json({ message: 'No commit found' }, { statusText: 'Unprocessable Entity', status: 422 }),
    )

    await expect(
      getCommitSha(createContext(), { reference: 'nope', owner: 'o', repo: 'r' }),
    ).rejects.toHaveProperty('status', 422)
  })
})
