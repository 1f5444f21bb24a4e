/**
 * Markup Bridge
 *
 * A Bridge that keeps the document as a parse5 tree instead of touching a live
 * DOM. Head content references are HTML fragments. Used by the CLI, and as an
 * in-process stand-in for a browser bridge.
 */

import { defaultTreeAdapter, html, parse, parseFragment, serialize, type DefaultTreeAdapterMap } from 'parse5'
import type { Bridge } from './bridge'

type Document = DefaultTreeAdapterMap['document']
type Element = DefaultTreeAdapterMap['element']
type ParentNode = DefaultTreeAdapterMap['parentNode']

/** Attributes that identify a meta tag; a new tag replaces an old one with the same key */
const META_KEYS = ['name', 'property', 'http-equiv', 'charset'] as const

export interface MarkupBridge extends Bridge<string> {
  /** Current document title, or null when there is no <title> */
  title(): string | null
  /** Serialized contents of <head> */
  serializeHead(): string
  /** Serialized document */
  serializeDocument(): string
}

const DEFAULT_DOCUMENT = '<!DOCTYPE html><html><head></head><body></body></html>'

export function createMarkupBridge(source: string = DEFAULT_DOCUMENT): MarkupBridge {
  const document = parse(source)

  return {
    async setTitle(title) {
      setTitleText(getHead(document), title)
    },

    async processHeadContent(markup, suffix) {
      const fragment = parseFragment(markup)
      const head = getHead(document)

      for (const meta of findElements(fragment, 'meta')) {
        upsertMeta(head, meta)
      }

      const titleElement = findElements(fragment, 'title')[0]
      const text = titleElement ? textContent(titleElement).trim() : ''
      if (!text) return null

      const title = `${text}${suffix}`
      setTitleText(head, title)
      return title
    },

    title() {
      const element = findElements(getHead(document), 'title')[0]
      return element ? textContent(element) : null
    },

    serializeHead() {
      return serialize(getHead(document))
    },

    serializeDocument() {
      return serialize(document)
    }
  }
}

function getHead(document: Document): Element {
  const head = findElements(document, 'head')[0]
  if (!head) {
    throw new Error('Document has no <head> element')
  }
  return head
}

function findElements(root: ParentNode, tagName: string): Element[] {
  const found: Element[] = []

  function walk(node: ParentNode) {
    for (const child of defaultTreeAdapter.getChildNodes(node)) {
      if (!defaultTreeAdapter.isElementNode(child)) continue
      if (child.tagName === tagName) found.push(child)
      walk(child)
    }
  }

  walk(root)
  return found
}

function textContent(element: Element): string {
  return element.childNodes
    .map((child) => (defaultTreeAdapter.isTextNode(child) ? child.value : ''))
    .join('')
}

function setTitleText(head: Element, title: string): void {
  let element = findElements(head, 'title')[0]

  if (!element) {
    element = defaultTreeAdapter.createElement('title', html.NS.HTML, [])
    defaultTreeAdapter.appendChild(head, element)
  }

  for (const child of [...element.childNodes]) {
    defaultTreeAdapter.detachNode(child)
  }
  defaultTreeAdapter.insertText(element, title)
}

function metaKey(element: Element): string | null {
  for (const key of META_KEYS) {
    const attr = element.attrs.find((a) => a.name === key)
    if (attr) return key === 'charset' ? 'charset' : `${key}=${attr.value.toLowerCase()}`
  }
  return null
}

function upsertMeta(head: Element, meta: Element): void {
  const key = metaKey(meta)
  const copy = defaultTreeAdapter.createElement('meta', html.NS.HTML, meta.attrs.map((a) => ({ ...a })))

  const existing = key === null
    ? undefined
    : findElements(head, 'meta').find((candidate) => metaKey(candidate) === key)

  if (existing) {
    defaultTreeAdapter.insertBefore(head, copy, existing)
    defaultTreeAdapter.detachNode(existing)
  } else {
    defaultTreeAdapter.appendChild(head, copy)
  }
}
