#!/usr/bin/env node
import { run } from './sqlcron'

run(process.argv)
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
