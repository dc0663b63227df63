import type { TagSource } from '../../types/tag-source'
import type { TagTarget } from '../../types/tag-target'

import { TagPushError } from '../errors/tag-push-error'
import { resolveLocalSha } from './resolve-local-sha'
import { createLocalTag } from './create-local-tag'
import { localTagExists } from './local-tag-exists'
import { listLocalTags } from './list-local-tags'
import { pushTag } from './push-tag'

/**
 * Bind tag reads and writes to a local clone.
 *
 * @param options - Repository options.
 * @param options.cwd - Working directory inside the repository.
 * @param options.remote - Remote tags are pushed to.
 * @param options.push - Push the tag after creating it. A failed push keeps
 *   the local tag and rejects with `TagPushError`.
 * @returns Tag source and target for the clone.
 */
export function createLocalRepository(options: {
  remote: string
  push: boolean
  cwd: string
}): TagSource & TagTarget {
  let { remote, push, cwd } = options

  return {
    createTag: async plan => {
      await createLocalTag(cwd, plan)
      if (!push) {
        return
      }
      try {
        await pushTag(cwd, { tag: plan.tag, remote })
      } catch (error) {
        throw new TagPushError(plan.tag, remote, error)
      }
    },
    describe: () =>
      push ? `the local repository (pushed to ${remote})` : 'the local repository',
    resolveSha: reference => resolveLocalSha(cwd, reference),
    hasTag: tag => localTagExists(cwd, tag),
    listTags: () => listLocalTags(cwd),
  }
}
