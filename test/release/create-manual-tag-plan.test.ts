import { describe, expect, it } from 'vitest'

import { createManualTagPlan } from '../../core/release/create-manual-tag-plan'
import { InvalidVersionError } from '../../core/errors/invalid-version-error'
import { TagExistsError } from '../../core/errors/tag-exists-error'
import { createFakeRepository } from './fake-repository'

let options = {
  message: 'Release {tag}',
  requirePrefix: false,
  prefix: 'v',
}

describe('createManualTagPlan', () => {
  it('plans a tag for a valid version', async () => {
    let repository = createFakeRepository(['v1.0.0'])

    await expect(
      createManualTagPlan(repository, '2.0.0', options),
    ).resolves.toEqual({
      message: 'Release v2.0.0',
      previous: '1.0.0',
      version: '2.0.0',
      sha: 'head-sha',
      tag: 'v2.0.0',
    })
    expect(repository.hasTag).toHaveBeenCalledWith('v2.0.0')
  })

  it('uses the given commit and template', async () => {
    let repository = createFakeRepository([])

    let plan = await createManualTagPlan(repository, 'v0.1.0-rc.1', {
      ...options,
      message: 'Candidate {version}',
      sha: 'main',
    })

    expect(plan.message).toBe('Candidate 0.1.0-rc.1')
    expect(plan.sha).toBe('main-sha')
    expect(plan.previous).toBeNull()
  })

  it('rejects invalid versions before touching the repository', async () => {
    let repository = createFakeRepository([])

    await expect(
      createManualTagPlan(repository, '1.0', options),
    ).rejects.toBeInstanceOf(InvalidVersionError)
    expect(repository.hasTag).not.toHaveBeenCalled()
  })

  it('rejects existing tags', async () => {
    let repository = createFakeRepository(['v1.0.0'])

    let result = createManualTagPlan(repository, 'v1.0.0', options)

    await expect(result).rejects.toBeInstanceOf(TagExistsError)
    await expect(result).rejects.toThrowError(
      'Tag v1.0.0 already exists in o/r',
    )
  })
})
