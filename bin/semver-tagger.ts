#!/usr/bin/env node
import { run } from '../cli/index'

run().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
