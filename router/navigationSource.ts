/**
 * Navigation Source
 *
 * Supplies the current location and raises a notification on every navigation.
 * Real apps adapt their router or the History API to this interface;
 * MemoryNavigationSource is the in-process implementation used by the CLI and tests.
 */

import type { Location } from './location'
import { createLogger, type Logger } from '../cli/utils/logger'

export type NavigationListener = (location: Location) => void

export type Unsubscribe = () => void

export interface NavigationSource {
  /** Location at the time of reading */
  readonly current: Location
  /** Register a change listener */
  subscribe(listener: NavigationListener): Unsubscribe
}

export class MemoryNavigationSource implements NavigationSource {
  private location: Location
  private listeners = new Set<NavigationListener>()
  private logger: Logger

  constructor(initial: Location, logger: Logger = createLogger({ scope: 'navigation' })) {
    this.location = initial
    this.logger = logger
  }

  get current(): Location {
    return this.location
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  subscribe(listener: NavigationListener): Unsubscribe {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Move to a new location and notify listeners in subscription order
   */
  navigate(location: Location): void {
    this.location = location

    for (const listener of [...this.listeners]) {
      try {
        listener(location)
      } catch (error) {
        this.logger.error(`Navigation listener error for ${location}:`, error)
      }
    }
  }
}
