/**
 * Tracked background tasks
 *
 * Navigation and render callbacks fire synchronously and cannot hand a promise
 * back to whoever raised them. Work they start is tracked here instead: failures
 * are logged rather than lost, and disposal can wait for whatever is still running.
 */

import type { Logger } from '../../cli/utils/logger'

export class TaskTracker {
  private tasks = new Set<Promise<unknown>>()
  private logger: Logger

  constructor(logger: Logger) {
    this.logger = logger
  }

  /**
   * Track a promise
   *
   * @param label - Name used in the failure log line
   * @param fallback - Value to resolve with when the task fails
   * @returns A promise that never rejects
   */
  track<T>(label: string, task: Promise<T>, fallback: T): Promise<T> {
    const tracked = task.then(
      (value) => value,
      (error: unknown) => {
        this.logger.error(`${label} failed:`, error)
        return fallback
      }
    )

    this.tasks.add(tracked)
    void tracked.finally(() => this.tasks.delete(tracked))
    return tracked
  }

  get size(): number {
    return this.tasks.size
  }

  /**
   * Wait for every tracked task, including ones tracked while waiting
   */
  async settled(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks)
    }
  }
}
