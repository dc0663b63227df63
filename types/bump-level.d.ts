/** Part of the version incremented by a bump. */
export type BumpLevel = 'major' | 'minor' | 'patch'
