/**
 * Keyed Queue
 *
 * Runs tasks one at a time per key (channel id); different keys run
 * concurrently. A failing task does not block the tasks queued behind it.
 */

export class KeyedQueue {
  private tails = new Map<string, Promise<void>>()
  private pending = new Map<string, number>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)

    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1)

    void tail.then(() => {
      const remaining = (this.pending.get(key) ?? 1) - 1
      if (remaining === 0) {
        this.pending.delete(key)
        this.tails.delete(key)
      } else {
        this.pending.set(key, remaining)
      }
    })

    return result
  }

  /** Tasks queued or running for a key */
  size(key: string): number {
    return this.pending.get(key) ?? 0
  }
}
