/**
 * headsync Head Coordinator
 *
 * Keeps the document head in step with client-side navigation. Every bridge
 * interaction, bridge acquisition included, runs through one TaskQueue, so
 * there is never more than one bridge call in flight.
 *
 * States:
 *
 *   uninitialized ──start()──▶ rendering ──renderComplete()──▶ ready
 *         │                        │                              │
 *         └────────────────────────┴───────dispose()──────────────┴──▶ disposed
 *
 * - Navigation notifications are handled in `rendering` and `ready`.
 * - Head content is only accepted in `ready`; anything else is a contract violation.
 *
 * @example
 * ```ts
 * const coordinator = new HeadCoordinator({
 *   navigation: source,
 *   loadBridge: () => import('./headBridge').then((m) => m.bridge),
 *   suffix: ' - Docs'
 * })
 *
 * coordinator.start(renderHost)
 * // ...
 * await coordinator.dispose()
 * ```
 */

import { createLogger, type Logger } from '../cli/utils/logger'
import { BridgeCallError, InvalidStateError } from '../core/errors/headError'
import { Scope } from '../core/lifecycle/scope'
import type { RenderHost } from '../core/lifecycle/renderHost'
import { TaskQueue } from '../core/queue/taskQueue'
import { TaskTracker } from '../core/queue/taskTracker'
import type { Location } from '../router/location'
import { LocationTracker } from '../router/locationTracker'
import type { NavigationSource } from '../router/navigationSource'
import { createBridgeLoader, type Bridge, type BridgeImporter, type BridgeLoader } from './bridge'
import { titleForLocation } from './title'

export type CoordinatorState = 'uninitialized' | 'rendering' | 'ready' | 'disposed'

export interface HeadCoordinatorOptions<TRef> {
  /** Source of the current location and navigation notifications */
  navigation: NavigationSource
  /** Imports the bridge module. Called at most once per successful acquisition. */
  loadBridge: BridgeImporter<TRef>
  /** Appended verbatim to every derived title */
  suffix?: string
  logger?: Logger
  /** Called with the title the bridge found in head content */
  onTitleDiscovered?: (title: string) => void
}

export class HeadCoordinator<TRef = unknown> {
  private status: CoordinatorState = 'uninitialized'
  private disposing: Promise<void> | null = null

  private readonly queue = new TaskQueue()
  private readonly navigation: NavigationSource
  private locations: LocationTracker
  private readonly bridge: BridgeLoader<TRef>
  private readonly suffix: string
  private readonly logger: Logger
  private readonly tasks: TaskTracker
  private readonly scope: Scope
  private readonly onTitleDiscovered: ((title: string) => void) | undefined

  constructor(options: HeadCoordinatorOptions<TRef>) {
    this.navigation = options.navigation
    this.locations = new LocationTracker(options.navigation.current)
    this.bridge = createBridgeLoader(options.loadBridge)
    this.suffix = options.suffix ?? ''
    this.logger = options.logger ?? createLogger({ scope: 'head' })
    this.tasks = new TaskTracker(this.logger)
    this.scope = new Scope(this.logger)
    this.onTitleDiscovered = options.onTitleDiscovered
  }

  get state(): CoordinatorState {
    return this.status
  }

  /** Location of the last head update */
  get location(): Location {
    return this.locations.current
  }

  /**
   * Subscribe to navigation and, when given, to the render host
   */
  start(renderHost?: RenderHost<TRef>): void {
    if (this.status !== 'uninitialized') {
      throw new InvalidStateError('start', this.status, 'uninitialized')
    }
    this.status = 'rendering'
    this.locations = new LocationTracker(this.navigation.current)

    this.scope.add(this.navigation.subscribe((location) => this.handleNavigation(location)))

    if (renderHost) {
      this.scope.add(renderHost.onInitialRender(() => {
        void this.renderComplete()
      }))
      this.scope.add(renderHost.onHeadContent((ref) => {
        void this.headContentAvailable(ref)
      }))
    }

    this.logger.debug(`Started at ${this.locations.current}`)
  }

  /**
   * Initial render finished: set the title for the current location
   *
   * Resolves once the title update has run. A bridge failure is logged, not thrown.
   */
  renderComplete(): Promise<void> {
    if (this.status !== 'rendering') {
      throw new InvalidStateError('complete the initial render', this.status, 'rendering')
    }
    this.status = 'ready'

    const title = titleForLocation(this.locations.current, this.suffix)
    return this.tasks.track('Initial title update', this.setTitle(title), undefined)
  }

  /**
   * Rendered head content is available
   *
   * @throws InvalidStateError before the initial render completed. No bridge call is made.
   * @returns The title the bridge found, or null (also on bridge failure)
   */
  headContentAvailable(ref: TRef): Promise<string | null> {
    if (this.status !== 'ready') {
      throw new InvalidStateError('process head content', this.status, 'ready')
    }

    const work = this.call('processHeadContent', (bridge) => bridge.processHeadContent(ref, this.suffix))
      .then((title) => {
        if (title !== null) {
          this.logger.info(`Head content title: ${title}`)
          this.onTitleDiscovered?.(title)
        }
        return title
      })

    return this.tasks.track('Head content processing', work, null)
  }

  /**
   * Resolve once every queued bridge call has settled
   */
  whenIdle(): Promise<void> {
    return this.queue.whenIdle()
  }

  /**
   * Unsubscribe, let outstanding work finish, then release the bridge
   *
   * Safe from any state. Repeated calls share the first call's promise.
   */
  dispose(): Promise<void> {
    if (!this.disposing) {
      this.status = 'disposed'
      this.scope.dispose()
      this.disposing = this.release()
    }
    return this.disposing
  }

  private handleNavigation(location: Location): void {
    if (this.status !== 'rendering' && this.status !== 'ready') return

    if (!this.locations.update(location)) {
      this.logger.debug(`No path change for ${location}`)
      return
    }

    const title = titleForLocation(location, this.suffix)
    void this.tasks.track(`Title update for ${location}`, this.setTitle(title), undefined)
  }

  private setTitle(title: string): Promise<void> {
    return this.call('setTitle', async (bridge) => {
      await bridge.setTitle(title)
      this.logger.debug(`Title set: ${title}`)
    })
  }

  /**
   * Queue one bridge call, acquiring the bridge first if needed
   */
  private call<T>(operation: string, fn: (bridge: Bridge<TRef>) => Promise<T>): Promise<T> {
    return this.queue.enqueue(async () => {
      let bridge: Bridge<TRef>
      try {
        bridge = await this.bridge.get()
      } catch (error) {
        throw new BridgeCallError('acquire', error)
      }

      try {
        return await fn(bridge)
      } catch (error) {
        throw new BridgeCallError(operation, error)
      }
    })
  }

  private async release(): Promise<void> {
    await this.tasks.settled()

    try {
      await this.queue.enqueue(async () => {
        if (this.bridge.isLoaded) {
          await this.bridge.release()
          this.logger.debug('Bridge released')
        }
      })
    } catch (error) {
      this.logger.error('Bridge release failed:', error)
    }
  }
}
