import { TagExistsError } from '../errors/tag-exists-error'
import { localTagExists } from './local-tag-exists'
import { runGit } from './run-git'

/**
 * Create a tag in the local repository.
 *
 * The tag is annotated when a message is given and lightweight otherwise.
 *
 * @param cwd - Working directory inside the repository.
 * @param parameters - Tag parameters.
 * @param parameters.tag - Tag name.
 * @param parameters.message - Annotation message.
 * @param parameters.sha - Commit to tag, `HEAD` when null.
 * @throws {TagExistsError} When the tag is already present.
 */
export async function createLocalTag(
  cwd: string,
  parameters: { sha: string | null; message: string; tag: string },
): Promise<void> {
  let { message, tag, sha } = parameters

  if (await localTagExists(cwd, tag)) {
    throw new TagExistsError(tag, 'the local repository')
  }

  let args = message ? ['tag', '-a', tag, '-m', message] : ['tag', tag]
  if (sha) {
    args.push(sha)
  }

  await runGit(args, { cwd })
}
