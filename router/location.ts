/**
 * Location decomposition and change detection
 *
 * A location is an opaque URL string. For change detection only scheme,
 * authority (host + port) and path matter, compared case-insensitively.
 * Query and fragment never count as a change.
 *
 * @example
 * ```ts
 * hasChanged('https://a/x/y?q=1', 'https://a/x/y?q=2') // false
 * hasChanged('https://a/x/y', 'https://a/x/z')         // true
 * hasChanged('https://a/x', 'https://A/x')             // false
 * ```
 */

export type Location = string

export interface LocationParts {
  scheme: string
  /** host, plus the port when it is not the scheme's default */
  authority: string
  path: string
  query: string
  fragment: string
}

/**
 * Decompose an absolute URL
 *
 * Scheme, authority and path come back lowercased and normalized by the
 * WHATWG URL parser: default ports dropped, dot segments resolved, an empty
 * path turned into `/`.
 *
 * @returns null when the string is not an absolute URL
 */
export function parseLocation(location: Location): LocationParts | null {
  let url: URL
  try {
    url = new URL(location)
  } catch {
    return null
  }

  return {
    scheme: url.protocol.replace(/:$/, '').toLowerCase(),
    authority: url.host.toLowerCase(),
    path: url.pathname.toLowerCase(),
    query: url.search.replace(/^\?/, ''),
    fragment: url.hash.replace(/^#/, '')
  }
}

/**
 * Strip query and fragment from a string that is not an absolute URL
 */
export function stripQueryAndFragment(location: Location): string {
  const end = location.search(/[?#]/)
  return end === -1 ? location : location.slice(0, end)
}

/**
 * Path of a location in its original case
 *
 * Falls back to the raw string up to `?` or `#` when it is not an absolute URL.
 */
export function locationPath(location: Location): string {
  try {
    return new URL(location).pathname
  } catch {
    return stripQueryAndFragment(location)
  }
}

/**
 * Whether navigating from `previous` to `next` changes scheme, authority or path
 *
 * Pure comparison. The caller owns the stored previous location.
 */
export function hasChanged(previous: Location, next: Location): boolean {
  if (previous === next) return false

  const before = parseLocation(previous)
  const after = parseLocation(next)

  if (!before || !after) {
    return stripQueryAndFragment(previous).toLowerCase() !== stripQueryAndFragment(next).toLowerCase()
  }

  return (
    before.scheme !== after.scheme ||
    before.authority !== after.authority ||
    before.path !== after.path
  )
}
