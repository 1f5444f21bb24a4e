import { hasChanged, type Location } from './location'

/**
 * Holds the last location that produced a head update
 *
 * `current` only moves when `hasChanged` confirms a path-level change,
 * so a run of query-only navigations keeps comparing against the same base.
 */
export class LocationTracker {
  private location: Location

  constructor(initial: Location) {
    this.location = initial
  }

  get current(): Location {
    return this.location
  }

  /**
   * @returns true when `next` is a genuine change and became the new current location
   */
  update(next: Location): boolean {
    if (!hasChanged(this.location, next)) return false
    this.location = next
    return true
  }
}
