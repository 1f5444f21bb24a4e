/**
 * headsync Scope - Paired Acquisition and Release
 *
 * Anything acquired during start-up (navigation subscriptions, render host
 * listeners) registers its release here. Disposing the scope runs every
 * release exactly once, newest first.
 *
 * @example
 * ```ts
 * const scope = new Scope(logger)
 * scope.add(source.subscribe(onNavigate))
 *
 * scope.dispose() // unsubscribes
 * ```
 */

import type { Logger } from '../../cli/utils/logger'

export type DisposeCallback = () => void

export class Scope {
  private callbacks: DisposeCallback[] = []
  private disposed = false
  private logger: Logger

  constructor(logger: Logger) {
    this.logger = logger
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  get size(): number {
    return this.callbacks.length
  }

  /**
   * Register a release callback
   *
   * Adding to a disposed scope releases immediately.
   */
  add(callback: DisposeCallback): void {
    if (this.disposed) {
      this.run(callback)
      return
    }
    this.callbacks.push(callback)
  }

  dispose(): void {
    if (this.disposed) return
    this.disposed = true

    const callbacks = this.callbacks.reverse()
    this.callbacks = []

    for (const callback of callbacks) {
      this.run(callback)
    }
  }

  private run(callback: DisposeCallback): void {
    try {
      callback()
    } catch (error) {
      this.logger.error('Error in scope release callback:', error)
    }
  }
}
