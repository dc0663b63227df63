import type { TagInfo } from '../../types/tag-info'

import { runGit } from './run-git'

/**
 * List tags of the local repository with the commit each one points to.
 * Annotated tags are peeled to their commit.
 *
 * @param cwd - Working directory inside the repository.
 * @returns Local tags.
 */
export async function listLocalTags(cwd: string): Promise<TagInfo[]> {
  let output = await runGit(
    [
      'for-each-ref',
      '--format=%(refname:strip=2)%09%(*objectname)%09%(objectname)',
      'refs/tags',
    ],
    { cwd },
  )

  let tags: TagInfo[] = []
  for (let line of output.split('\n')) {
    let [tag, peeled, object] = line.split('\t')
    if (tag) {
      tags.push({ sha: peeled || object || null, tag })
    }
  }
  return tags
}
