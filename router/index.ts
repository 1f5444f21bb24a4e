/**
 * headsync Router
 *
 * Location comparison and navigation notifications.
 *
 * @example
 * ```ts
 * import { LocationTracker, MemoryNavigationSource } from 'headsync'
 *
 * const source = new MemoryNavigationSource('https://example.test/docs')
 * const tracker = new LocationTracker(source.current)
 *
 * source.subscribe((location) => {
 *   if (tracker.update(location)) {
 *     console.log('Path changed to', location)
 *   }
 * })
 * ```
 */

export {
  hasChanged,
  locationPath,
  parseLocation,
  stripQueryAndFragment,
  type Location,
  type LocationParts
} from './location'

export { LocationTracker } from './locationTracker'

export {
  MemoryNavigationSource,
  type NavigationSource,
  type NavigationListener,
  type Unsubscribe
} from './navigationSource'
