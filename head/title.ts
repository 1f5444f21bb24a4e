/**
 * Title derivation
 *
 * The title is the last non-empty path segment followed by the configured
 * suffix. A path with no segment (`/`, `''`) yields an empty segment, so the
 * title is the suffix alone.
 */

import { locationPath, type Location } from '../router/location'

export function lastPathSegment(path: string): string {
  const segments = path.split('/').filter((segment) => segment.length > 0)
  const last = segments[segments.length - 1] ?? ''

  try {
    return decodeURIComponent(last)
  } catch {
    // Malformed escape, keep it as written
    return last
  }
}

export function deriveTitle(path: string, suffix = ''): string {
  return `${lastPathSegment(path)}${suffix}`
}

/**
 * Derive a title from a full location, keeping the path's original case
 */
export function titleForLocation(location: Location, suffix = ''): string {
  return deriveTitle(locationPath(location), suffix)
}
