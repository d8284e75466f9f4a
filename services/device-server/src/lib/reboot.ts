import { execFile } from 'child_process'
import { promisify } from 'util'
import { createInternalError, formatError } from '@npu-latency/errors'

const execFileAsync = promisify(execFile)

export const REBOOT_COMMAND = 'reboot'

/** Ask the board to reboot; the supervisor brings the server back up */
export async function rebootBoard(command: string = REBOOT_COMMAND): Promise<void> {
  try {
    await execFileAsync(command)
  } catch (error) {
    throw createInternalError(`Reboot command '${command}' failed: ${formatError(error)}`, {
      cause: error instanceof Error ? error : undefined,
    })
  }
}
