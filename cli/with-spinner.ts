import { createSpinner } from 'nanospinner'

/**
 * Run a task behind a spinner, marking it failed when the task throws.
 *
 * @param text - Text shown while the task runs.
 * @param task - Task to run.
 * @param done - Builds the success text from the task result.
 * @returns Task result.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  done: (result: T) => string,
): Promise<T> {
  let spinner = createSpinner(text).start()
  try {
    let result = await task()
    spinner.success(done(result))
    return result
  } catch (error) {
    spinner.error('Failed')
    throw error
  }
}
