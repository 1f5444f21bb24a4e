import { describe, expect, it, vi } from 'vitest'
import { createLogger } from '../../../cli/utils/logger'
import { MemoryRenderHost } from '../renderHost'
import { Scope } from '../scope'

describe('Scope', () => {
  const logger = createLogger({ scope: 'test', level: 'silent' })

  it('releases newest first, exactly once', () => {
    const scope = new Scope(logger)
    const order: string[] = []

    scope.add(() => order.push('navigation'))
    scope.add(() => order.push('render host'))
    expect(scope.size).toBe(2)

    scope.dispose()
    scope.dispose()

    expect(order).toEqual(['render host', 'navigation'])
    expect(scope.isDisposed).toBe(true)
    expect(scope.size).toBe(0)
  })

  it('logs a failing release and keeps going', () => {
    const errorSpy = vi.spyOn(logger, 'error')
    const scope = new Scope(logger)
    const after = vi.fn()

    scope.add(after)
    scope.add(() => {
      throw new Error('release failed')
    })
    scope.dispose()

    expect(after).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledTimes(1)
    errorSpy.mockRestore()
  })

  it('releases immediately when added after disposal', () => {
    const scope = new Scope(logger)
    const release = vi.fn()

    scope.dispose()
    scope.add(release)

    expect(release).toHaveBeenCalledTimes(1)
  })
})

describe('MemoryRenderHost', () => {
  it('notifies initial render once', () => {
    const host = new MemoryRenderHost()
    const callback = vi.fn()

    host.onInitialRender(callback)
    host.completeInitialRender()
    host.completeInitialRender()

    expect(callback).toHaveBeenCalledTimes(1)
    expect(host.hasRendered).toBe(true)
  })

  it('calls late subscribers immediately', () => {
    const host = new MemoryRenderHost()
    const callback = vi.fn()

    host.completeInitialRender()
    host.onInitialRender(callback)

    expect(callback).toHaveBeenCalledTimes(1)
  })

  it('does not notify an unsubscribed listener', () => {
    const host = new MemoryRenderHost<string>()
    const onRender = vi.fn()
    const onContent = vi.fn()

    host.onInitialRender(onRender)()
    host.onHeadContent(onContent)()
    host.completeInitialRender()
    host.provideHeadContent('<title>x</title>')

    expect(onRender).not.toHaveBeenCalled()
    expect(onContent).not.toHaveBeenCalled()
  })

  it('lets a head content listener throw to the caller', () => {
    const host = new MemoryRenderHost<string>()

    host.onHeadContent(() => {
      throw new Error('too early')
    })

    expect(() => host.provideHeadContent('<title>x</title>')).toThrow('too early')
  })
})
