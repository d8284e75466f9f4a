/**
 * Runs tasks one at a time in submission order
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve()
  private pending = 0

  get size(): number {
    return this.pending
  }

  get busy(): boolean {
    return this.pending > 0
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(task, task)
    this.tail = result.then(
      () => this.pending--,
      () => this.pending--
    )
    return result
  }
}
