import { AppError, ErrorCode, formatError } from '@npu-latency/errors'
import { EXIT_CODES } from './constants'
import { helpRequested } from './cli-args'

const DEBUG_ENABLED = process.env.DEBUG === '1' || process.env.DEBUG === 'true'

export interface RunCliOptions {
  /** Servers keep running after `main` resolves */
  keepAlive?: boolean
}

/**
 * Shared CLI harness: prints help, runs `main`, and maps failures to exit
 * codes (2 for invalid options, 1 for everything else).
 */
export function runCli(
  help: string,
  main: (argv: string[]) => Promise<void>,
  options: RunCliOptions = {}
): void {
  const argv = process.argv.slice(2)
  if (helpRequested(argv)) {
    console.log(help)
    process.exit(EXIT_CODES.success)
  }

  void main(argv).then(
    () => {
      if (!options.keepAlive) {
        process.exit(EXIT_CODES.success)
      }
    },
    (error: unknown) => {
      console.error(`Error: ${formatError(error)}`)
      if (DEBUG_ENABLED && error instanceof Error && error.stack) {
        console.error(error.stack)
      }
      const usageError = error instanceof AppError && error.code === ErrorCode.BAD_REQUEST
      process.exit(usageError ? EXIT_CODES.validation : EXIT_CODES.failure)
    }
  )
}
