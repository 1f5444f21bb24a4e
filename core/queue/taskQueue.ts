/**
 * headsync Task Queue - Serialized Async Operations
 *
 * Runs submitted operations strictly one at a time, in submission order,
 * no matter how many callers submit concurrently.
 *
 * The queue keeps a single tail promise: the completion of the most recently
 * submitted operation. A new submission waits for that tail to settle, ignoring
 * whether it fulfilled or rejected, then runs. A failed operation rejects only
 * its own handle; everything after it still runs.
 *
 * There is no timeout and no cancellation. An operation that never settles
 * blocks every operation submitted after it.
 *
 * @example
 * ```ts
 * const queue = new TaskQueue()
 *
 * const a = queue.enqueue(() => bridge.setTitle('Docs'))
 * const b = queue.enqueue(() => bridge.setTitle('Blog'))  // starts after `a` settles
 * ```
 */

/**
 * A deferred unit of work
 */
export type QueuedOperation<T> = () => Promise<T>

export class TaskQueue {
  private tail: Promise<unknown> = Promise.resolve()
  private pending = 0

  /**
   * Submit an operation
   *
   * @returns A promise that settles with exactly the operation's outcome,
   * once every earlier operation has settled and this one has run
   */
  enqueue<T>(operation: QueuedOperation<T>): Promise<T> {
    this.pending++

    const run = async (): Promise<T> => {
      try {
        return await operation()
      } finally {
        this.pending--
      }
    }

    const next = this.tail.then(run, run)
    this.tail = next
    return next
  }

  /**
   * Number of submitted operations that have not settled yet
   */
  get pendingCount(): number {
    return this.pending
  }

  get isIdle(): boolean {
    return this.pending === 0
  }

  /**
   * Resolve once the queue is empty, including operations submitted while waiting.
   * Never rejects.
   */
  async whenIdle(): Promise<void> {
    let observed: Promise<unknown> | null = null

    while (observed !== this.tail) {
      observed = this.tail
      await observed.then(noop, noop)
    }
  }
}

function noop(): void {}
