#!/usr/bin/env tsx
import 'dotenv/config'
import { runCli } from './index.js'

runCli(process.argv).then(
  code => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
