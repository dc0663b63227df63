/** Options controlling how a raw version string is read. */
export interface VersionParseOptions {
  /** Fail when the input does not start with the prefix. */
  requirePrefix: boolean

  /** Tag prefix, `v` by default. Empty string disables prefix handling. */
  prefix: string
}
