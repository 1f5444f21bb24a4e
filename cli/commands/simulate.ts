/**
 * headsync CLI - Simulate Command
 *
 * Replays a navigation sequence against a markup bridge and reports every
 * bridge call in the order the queue ran them.
 */

import type { Bridge } from '../../head/bridge'
import { HeadCoordinator } from '../../head/coordinator'
import { createMarkupBridge } from '../../head/markupBridge'
import { MemoryRenderHost } from '../../core/lifecycle/renderHost'
import { MemoryNavigationSource } from '../../router/navigationSource'
import { createLogger, type LogLevel } from '../utils/logger'

export interface SimulateOptions {
    suffix?: string
    /** Head markup handed over after the initial render */
    head?: string
    logLevel?: LogLevel
}

export interface SimulationResult {
    /** Bridge calls in execution order */
    calls: string[]
    title: string | null
    head: string
}

export async function simulate(locations: string[], options: SimulateOptions = {}): Promise<SimulationResult> {
    const [initial, ...rest] = locations
    if (initial === undefined) {
        throw new Error('At least one location is required')
    }

    const logger = createLogger({ scope: 'simulate', level: options.logLevel ?? 'info' })
    const markup = createMarkupBridge()
    const calls: string[] = []

    const bridge: Bridge<string> = {
        async setTitle(title) {
            calls.push(`setTitle(${JSON.stringify(title)})`)
            await markup.setTitle(title)
        },
        async processHeadContent(ref, suffix) {
            calls.push(`processHeadContent(${JSON.stringify(suffix)})`)
            return markup.processHeadContent(ref, suffix)
        }
    }

    const navigation = new MemoryNavigationSource(initial, logger.child('navigation'))
    const renderHost = new MemoryRenderHost<string>()
    const coordinator = new HeadCoordinator<string>({
        navigation,
        loadBridge: async () => bridge,
        suffix: options.suffix,
        logger
    })

    coordinator.start(renderHost)
    renderHost.completeInitialRender()

    if (options.head !== undefined) {
        renderHost.provideHeadContent(options.head)
    }

    for (const location of rest) {
        navigation.navigate(location)
    }

    await coordinator.whenIdle()

    const result: SimulationResult = {
        calls,
        title: markup.title(),
        head: markup.serializeHead()
    }

    await coordinator.dispose()
    return result
}
