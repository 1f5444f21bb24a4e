import { describe, expect, it } from 'vitest'
import { hasChanged, locationPath, parseLocation, stripQueryAndFragment } from '../location'
import { LocationTracker } from '../locationTracker'

describe('parseLocation', () => {
  it('decomposes and normalizes an absolute URL', () => {
    expect(parseLocation('https://Example.test:443/Docs/Intro?tab=2#setup')).toEqual({
      scheme: 'https',
      authority: 'example.test',
      path: '/docs/intro',
      query: 'tab=2',
      fragment: 'setup'
    })
  })

  it('keeps a non-default port in the authority', () => {
    expect(parseLocation('http://localhost:8080/x')?.authority).toBe('localhost:8080')
  })

  it('resolves dot segments and an empty path', () => {
    expect(parseLocation('https://a/x/../y')?.path).toBe('/y')
    expect(parseLocation('https://a')?.path).toBe('/')
  })

  it('returns null for strings that are not absolute URLs', () => {
    expect(parseLocation('/docs/intro')).toBeNull()
    expect(parseLocation('not a url')).toBeNull()
  })
})

describe('hasChanged', () => {
  it('ignores query-only differences', () => {
    expect(hasChanged('https://a/x/y?q=1', 'https://a/x/y?q=2')).toBe(false)
  })

  it('ignores fragment-only differences', () => {
    expect(hasChanged('https://a/x/y#top', 'https://a/x/y#bottom')).toBe(false)
  })

  it('reports a path difference', () => {
    expect(hasChanged('https://a/x/y', 'https://a/x/z')).toBe(true)
  })

  it('compares the authority case-insensitively', () => {
    expect(hasChanged('https://a/x', 'https://A/x')).toBe(false)
  })

  it('compares the path case-insensitively', () => {
    expect(hasChanged('https://a/Docs', 'https://a/docs')).toBe(false)
  })

  it('treats a missing path and a root path as equal', () => {
    expect(hasChanged('https://a', 'https://a/')).toBe(false)
  })

  it('treats a trailing slash after a segment as a different path', () => {
    expect(hasChanged('https://a/x', 'https://a/x/')).toBe(true)
  })

  it('reports scheme and port differences', () => {
    expect(hasChanged('http://a/x', 'https://a/x')).toBe(true)
    expect(hasChanged('https://a:8443/x', 'https://a/x')).toBe(true)
  })

  it('short-circuits identical strings', () => {
    expect(hasChanged('anything at all', 'anything at all')).toBe(false)
  })

  it('falls back to comparing raw paths for relative locations', () => {
    expect(hasChanged('/docs?page=1', '/DOCS#top')).toBe(false)
    expect(hasChanged('/docs', '/blog')).toBe(true)
  })
})

describe('locationPath', () => {
  it('keeps the original case of the path', () => {
    expect(locationPath('https://a/Docs/Intro?x=1')).toBe('/Docs/Intro')
  })

  it('strips query and fragment from relative locations', () => {
    expect(locationPath('docs/intro#install')).toBe('docs/intro')
    expect(stripQueryAndFragment('/a?b#c')).toBe('/a')
  })
})

describe('LocationTracker', () => {
  it('moves only on a path-level change', () => {
    const tracker = new LocationTracker('https://a/docs')

    expect(tracker.update('https://a/docs?tab=2')).toBe(false)
    expect(tracker.current).toBe('https://a/docs')

    expect(tracker.update('https://a/blog')).toBe(true)
    expect(tracker.current).toBe('https://a/blog')

    expect(tracker.update('https://a/blog#comments')).toBe(false)
    expect(tracker.current).toBe('https://a/blog')
  })
})
