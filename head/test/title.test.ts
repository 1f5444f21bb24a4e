import { describe, expect, it } from 'vitest'
import { deriveTitle, lastPathSegment, titleForLocation } from '../title'

describe('deriveTitle', () => {
  it('appends the suffix to the last segment', () => {
    expect(deriveTitle('/docs/intro', ' - Site')).toBe('intro - Site')
  })

  it('uses the last non-empty segment when the path ends with a slash', () => {
    expect(deriveTitle('/docs/intro/', ' - Site')).toBe('intro - Site')
  })

  it('yields the suffix alone for the root path', () => {
    expect(deriveTitle('/', ' - Site')).toBe(' - Site')
    expect(deriveTitle('')).toBe('')
  })

  it('defaults to no suffix', () => {
    expect(deriveTitle('/blog/first-post')).toBe('first-post')
  })
})

describe('lastPathSegment', () => {
  it('decodes percent escapes', () => {
    expect(lastPathSegment('/menu/caf%C3%A9')).toBe('café')
  })

  it('keeps a malformed escape as written', () => {
    expect(lastPathSegment('/stats/100%')).toBe('100%')
  })
})

describe('titleForLocation', () => {
  it('derives from the path of an absolute URL, ignoring query and fragment', () => {
    expect(titleForLocation('https://a/Docs/Getting%20Started?x=1#y', ' | Docs')).toBe('Getting Started | Docs')
  })

  it('derives from a relative location', () => {
    expect(titleForLocation('/blog/post-1?draft=true')).toBe('post-1')
  })

  it('yields the suffix alone for a site root', () => {
    expect(titleForLocation('https://a/', ' - Site')).toBe(' - Site')
  })
})
