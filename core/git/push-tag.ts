import { runGit } from './run-git'

/**
 * Push a single tag to a remote.
 *
 * @param cwd - Working directory inside the repository.
 * @param parameters - Push parameters.
 * @param parameters.tag - Tag name.
 * @param parameters.remote - Remote name.
 */
export async function pushTag(
  cwd: string,
  parameters: { remote: string; tag: string },
): Promise<void> {
  let { remote, tag } = parameters
  await runGit(['push', remote, `refs/tags/${tag}`], { cwd })
}
