/**
 * Entry point for the headless runner
 *
 *   src/main.ts --profile scout-expedition --frames 600 --width 1280 --height 720
 */

import { ConfigurationError, formatIssues } from './boids/validation'
import { parseRunnerArgs, run, type RunnerOptions } from './runner'

async function main() {
  let options: RunnerOptions
  try {
    options = parseRunnerArgs(process.argv.slice(2))
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[runner] ${formatIssues(error.issues)}`)
    } else {
      console.error(`[runner] ${error instanceof Error ? error.message : String(error)}`)
    }
    process.exitCode = 2
    return
  }

  await run(options)
}

main().catch((error: unknown) => {
  console.error('[runner] Simulation failed:', error)
  process.exitCode = 1
})
