/**
 * Keyed Lock
 *
 * Serialises async tasks per key with a promise chain. Tasks for different
 * keys run concurrently; tasks for the same key run one at a time in call
 * order. A failing task does not block the ones queued behind it.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail = result.then(
      () => undefined,
      () => undefined,
    )
    this.tails.set(key, tail)
    void tail.then(() => {
      // Drop the entry once nothing else has queued behind this task
      if (this.tails.get(key) === tail) this.tails.delete(key)
    })
    return result
  }

  /** Keys with queued or running tasks */
  get pendingKeys(): number {
    return this.tails.size
  }
}
