import { beforeEach, describe, expect, it, vi } from 'vitest'

import { GitCommandError } from '../../core/errors/git-command-error'
import { localTagExists } from '../../core/git/local-tag-exists'
import { runGit } from '../../core/git/run-git'

vi.mock('../../core/git/run-git', () => ({ runGit: vi.fn() }))

let runGitMock = vi.mocked(runGit)

describe('localTagExists', () => {
  beforeEach(() => {
    runGitMock.mockReset()
  })

  it('returns true when the tag resolves', async () => {
    runGitMock.mockResolvedValue('abc123')

    await expect(localTagExists('/repo', 'v1.0.0')).resolves.toBeTruthy()
    expect(runGitMock).toHaveBeenCalledWith(
      ['rev-parse', '-q', '--verify', 'refs/tags/v1.0.0'],
      { cwd: '/repo' },
    )
  })

  it('returns false when rev-parse exits with 1', async () => {
    runGitMock.mockRejectedValue(new GitCommandError(['rev-parse'], 1, ''))

    await expect(localTagExists('/repo', 'v9.9.9')).resolves.toBeFalsy()
  })

  it('rethrows other failures', async () => {
    let failure = new GitCommandError(['rev-parse'], 128, 'fatal: bad')
    runGitMock.mockRejectedValue(failure)

    await expect(localTagExists('/repo', 'v1.0.0')).rejects.toBe(failure)
  })
})
