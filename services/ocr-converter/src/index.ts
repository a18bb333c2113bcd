#!/usr/bin/env node
import 'dotenv/config'
import { fileURLToPath } from 'node:url'
import { runCli } from './cli.js'

async function main() {
  process.exitCode = await runCli({
    argv: process.argv,
    env: process.env,
    cwd: process.cwd(),
    selfPath: fileURLToPath(import.meta.url)
  })
}

main().catch((error: unknown) => {
  console.error('[ocr-batch] FAIL', error instanceof Error ? error.message : error)
  process.exit(1)
})
