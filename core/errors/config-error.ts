/** Invalid configuration file or option value. */
export class ConfigError extends Error {
  /**
   * Creates a new ConfigError.
   *
   * @param message - What is wrong.
   * @param source - File path or option name the value came from.
   */
  public constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message)
    this.name = 'ConfigError'
  }
}
