#!/usr/bin/env node

import { runCli } from './program.js'

runCli(process.argv)
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
