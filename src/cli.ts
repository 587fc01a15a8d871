/**
 * Command-line entry point. Loads `.env`, runs one command and maps the
 * outcome to the process exit code.
 */

import { config } from 'dotenv'
import { Cause, Effect, Exit } from 'effect'

import { runCommand } from './commands'

config()

Effect.runPromiseExit(runCommand(process.argv.slice(2))).then(exit => {
  if (Exit.isSuccess(exit)) {
    if (!exit.value.ok) {
      process.exitCode = 1
    }
    return
  }

  const failure = Cause.failureOption(exit.cause)
  if (failure._tag === 'Some') {
    const error = failure.value
    console.error('message' in error ? error.message : String(error))
  } else {
    console.error(Cause.pretty(exit.cause))
  }
  process.exitCode = 1
})
