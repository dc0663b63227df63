import { defineConfig } from 'cspell'

export default defineConfig({
  words: [
    'ghadelimiter',
    'nanospinner',
    'objectname',
    'premajor',
    'preminor',
    'prepatch',
    'refname',
    'rsort',
    'semver',
  ],
  ignorePaths: ['changelog.md', 'license', 'package-lock.json', 'tsconfig.json'],
  dictionaries: ['node', 'npm', 'typescript'],
  useGitignore: true,
  language: 'en',
})
