/**
 * headsync Lifecycle
 *
 * Scoped release of subscriptions, and the render host contract.
 */

export { Scope, type DisposeCallback } from './scope'

export {
  MemoryRenderHost,
  type RenderHost,
  type InitialRenderCallback,
  type HeadContentCallback
} from './renderHost'
