import { RESTART_DELAY_MS } from '@npu-latency/shared'

export type ShutdownListener = () => void

/**
 * Lets a request ask for the server to stop after it has answered. The first
 * request schedules the shutdown; later ones are ignored.
 */
export class ShutdownController {
  private readonly listeners: ShutdownListener[] = []
  private timer: NodeJS.Timeout | undefined
  private scheduled = false

  get requested(): boolean {
    return this.scheduled
  }

  onShutdown(listener: ShutdownListener): void {
    this.listeners.push(listener)
  }

  request(delayMs: number = RESTART_DELAY_MS): void {
    if (this.scheduled) {
      return
    }
    this.scheduled = true
    this.timer = setTimeout(() => {
      this.timer = undefined
      for (const listener of this.listeners) {
        listener()
      }
    }, delayMs)
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    this.scheduled = false
  }
}
