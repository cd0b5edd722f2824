#!/usr/bin/env node
import { createReadlineAsk } from './run/prompt.js'
import { reportCliError, runCli } from './run/runner.js'

async function main() {
  const controller = new AbortController()
  const interrupt = () => controller.abort()
  process.once('SIGINT', interrupt)

  const prompt = createReadlineAsk({
    input: process.stdin,
    output: process.stdout,
    signal: controller.signal,
    onInterrupt: interrupt,
  })
  try {
    await runCli(process.argv.slice(2), {
      env: process.env,
      stdout: process.stdout,
      stderr: process.stderr,
      ask: prompt.ask,
      signal: controller.signal,
    })
  } finally {
    prompt.close()
    process.off('SIGINT', interrupt)
  }
}

main().catch((error: unknown) => {
  process.exitCode = reportCliError(error, process.stderr)
})
