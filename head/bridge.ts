/**
 * headsync Bridge
 *
 * The bridge is the external asynchronous module that actually mutates the
 * document head. headsync never inspects what it does; it only guarantees the
 * bridge is never called concurrently with itself.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * BRIDGE RULES
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * 1. The bridge is imported once and shared by every operation
 * 2. Every bridge call goes through the coordinator's task queue
 * 3. A rejected call affects only the operation that made it
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export interface Bridge<TRef = unknown> {
  /** Replace the document title */
  setTitle(title: string): Promise<void>

  /**
   * Apply head markup content
   *
   * @param ref - Opaque reference to the rendered head content
   * @param suffix - Title suffix to apply to a title found in the content
   * @returns The title found in the content, or null
   */
  processHeadContent(ref: TRef, suffix: string): Promise<string | null>

  /** Release the module, when it holds anything */
  dispose?(): void | Promise<void>
}

export type BridgeImporter<TRef = unknown> = () => Promise<Bridge<TRef>>

export interface BridgeLoader<TRef = unknown> {
  /** Acquire the bridge. Every caller shares the same acquisition. */
  get(): Promise<Bridge<TRef>>
  /** Dispose the bridge if it was acquired or is still being imported, and forget it */
  release(): Promise<void>
  readonly isLoaded: boolean
}

/**
 * Memoize a bridge import
 *
 * The first `get()` starts the import and every caller, the first included,
 * awaits the same promise. A failed import is not remembered, so the next
 * `get()` tries again.
 *
 * @example
 * ```ts
 * const loader = createBridgeLoader(() => import('./headBridge').then((m) => m.bridge))
 * const bridge = await loader.get()
 * ```
 */
export function createBridgeLoader<TRef = unknown>(importer: BridgeImporter<TRef>): BridgeLoader<TRef> {
  let loading: Promise<Bridge<TRef>> | null = null
  let loaded: Bridge<TRef> | null = null

  return {
    get() {
      if (!loading) {
        const attempt = importer().then(
          (bridge) => {
            if (loading === attempt) loaded = bridge
            return bridge
          },
          (error: unknown) => {
            if (loading === attempt) loading = null
            throw error
          }
        )
        loading = attempt
      }
      return loading
    },

    async release() {
      const pending = loading
      const acquired = loaded
      loading = null
      loaded = null

      // An import still in flight is disposed once it lands
      const bridge = acquired ?? (pending ? await pending.catch(() => null) : null)
      if (bridge?.dispose) {
        await bridge.dispose()
      }
    },

    get isLoaded() {
      return loaded !== null
    }
  }
}
