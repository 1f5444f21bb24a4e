/**
 * headsync Head
 *
 * Bridge contract, title derivation and the head coordinator.
 */

export {
  HeadCoordinator,
  type CoordinatorState,
  type HeadCoordinatorOptions
} from './coordinator'

export {
  createBridgeLoader,
  type Bridge,
  type BridgeImporter,
  type BridgeLoader
} from './bridge'

export { createMarkupBridge, type MarkupBridge } from './markupBridge'

export { deriveTitle, lastPathSegment, titleForLocation } from './title'
