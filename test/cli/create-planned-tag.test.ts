import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'

import type { TagTarget } from '../../types/tag-target'
import type { TagPlan } from '../../types/tag-plan'

import { confirmTagCreation } from '../../core/interactive/confirm-tag-creation'
import { writeActionOutputs } from '../../core/actions/write-action-outputs'
import { createPlannedTag } from '../../cli/create-planned-tag'

vi.mock('../../core/interactive/confirm-tag-creation', () => ({
  confirmTagCreation: vi.fn(),
}))
vi.mock('../../core/actions/write-action-outputs', () => ({
  writeActionOutputs: vi.fn(),
}))
vi.mock('nanospinner', () => {
  let spinner = { success: vi.fn(), error: vi.fn(), start: vi.fn() }
  spinner.start.mockReturnValue(spinner)
  return { createSpinner: () => spinner }
})

let plan: TagPlan = {
  message: 'Release v1.0.0',
  version: '1.0.0',
  previous: '0.9.0',
  tag: 'v1.0.0',
  sha: 'abc',
}

function createTarget(): TagTarget {
  return {
    createTag: vi.fn(() => Promise.resolve()),
    describe: () => 'o/r',
  }
}

describe('createPlannedTag', () => {
  let consoleInfoSpy: MockInstance

  beforeEach(() => {
    vi.clearAllMocks()
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleInfoSpy.mockRestore()
  })

  it('creates nothing on a dry run', async () => {
    let target = createTarget()

    let created = await createPlannedTag(
      target,
      plan,
      { dryRun: true, yes: false },
      true,
    )

    expect(created).toBeFalsy()
    expect(target.createTag).not.toHaveBeenCalled()
    expect(confirmTagCreation).not.toHaveBeenCalled()
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      expect.stringContaining('Dry Run'),
    )
    expect(writeActionOutputs).toHaveBeenCalledWith({
      previous: '0.9.0',
      version: '1.0.0',
      created: 'false',
      tag: 'v1.0.0',
      sha: 'abc',
    })
  })

  it('creates the tag without asking when --yes is set', async () => {
    let target = createTarget()

    let created = await createPlannedTag(
      target,
      plan,
      { dryRun: false, yes: true },
      true,
    )

    expect(created).toBeTruthy()
    expect(confirmTagCreation).not.toHaveBeenCalled()
    expect(target.createTag).toHaveBeenCalledWith(plan)
    expect(writeActionOutputs).toHaveBeenCalledWith(
      expect.objectContaining({ created: 'true' }),
    )
  })

  it('creates the tag without asking when not interactive', async () => {
    let target = createTarget()

    await createPlannedTag(target, plan, { dryRun: false, yes: false }, false)

    expect(confirmTagCreation).not.toHaveBeenCalled()
    expect(target.createTag).toHaveBeenCalledOnce()
  })

  it('asks when interactive and respects a refusal', async () => {
    vi.mocked(confirmTagCreation).mockResolvedValue(false)
    let target = createTarget()

    let created = await createPlannedTag(
      target,
      plan,
      { dryRun: false, yes: false },
      true,
    )

    expect(created).toBeFalsy()
    expect(confirmTagCreation).toHaveBeenCalledWith(plan, 'o/r')
    expect(target.createTag).not.toHaveBeenCalled()
    expect(consoleInfoSpy).toHaveBeenCalledWith(
      expect.stringContaining('No tag created'),
    )
    expect(writeActionOutputs).toHaveBeenCalledWith(
      expect.objectContaining({ created: 'false' }),
    )
  })

  it('creates the tag after confirmation', async () => {
    vi.mocked(confirmTagCreation).mockResolvedValue(true)
    let target = createTarget()

    let created = await createPlannedTag(
      target,
      plan,
      { dryRun: false, yes: false },
      true,
    )

    expect(created).toBeTruthy()
    expect(target.createTag).toHaveBeenCalledOnce()
  })

  it('writes an empty previous output for a first release', async () => {
    await createPlannedTag(
      createTarget(),
      { ...plan, previous: null },
      { dryRun: true, yes: false },
      false,
    )

    expect(writeActionOutputs).toHaveBeenCalledWith(
      expect.objectContaining({ previous: '' }),
    )
  })
})
