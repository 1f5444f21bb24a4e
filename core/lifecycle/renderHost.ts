/**
 * headsync Render Host
 *
 * The rendering layer tells headsync two things: that the initial render has
 * completed (exactly once), and, after that, where the rendered head content is.
 *
 * MemoryRenderHost is the in-process implementation: the initial-render signal
 * latches, so a listener registered after it fired runs immediately.
 */

export type InitialRenderCallback = () => void

export type HeadContentCallback<TRef> = (ref: TRef) => void

export interface RenderHost<TRef = unknown> {
  onInitialRender(callback: InitialRenderCallback): () => void
  onHeadContent(callback: HeadContentCallback<TRef>): () => void
}

export class MemoryRenderHost<TRef = unknown> implements RenderHost<TRef> {
  private rendered = false
  private renderCallbacks = new Set<InitialRenderCallback>()
  private contentCallbacks = new Set<HeadContentCallback<TRef>>()

  get hasRendered(): boolean {
    return this.rendered
  }

  onInitialRender(callback: InitialRenderCallback): () => void {
    if (this.rendered) {
      callback()
      return () => {}
    }

    this.renderCallbacks.add(callback)
    return () => {
      this.renderCallbacks.delete(callback)
    }
  }

  onHeadContent(callback: HeadContentCallback<TRef>): () => void {
    this.contentCallbacks.add(callback)
    return () => {
      this.contentCallbacks.delete(callback)
    }
  }

  /**
   * Signal that the initial render finished. Only the first call notifies.
   */
  completeInitialRender(): void {
    if (this.rendered) return
    this.rendered = true

    const callbacks = [...this.renderCallbacks]
    this.renderCallbacks.clear()

    for (const callback of callbacks) {
      callback()
    }
  }

  /**
   * Hand head content to listeners
   *
   * A listener that throws (for example on a contract violation) throws to the caller.
   */
  provideHeadContent(ref: TRef): void {
    for (const callback of [...this.contentCallbacks]) {
      callback(ref)
    }
  }
}
