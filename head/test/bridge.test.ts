import { describe, expect, it, vi } from 'vitest'
import { createBridgeLoader, type Bridge } from '../bridge'

function fakeBridge(): Bridge<string> {
  return {
    setTitle: vi.fn(async () => {}),
    processHeadContent: vi.fn(async () => null),
    dispose: vi.fn()
  }
}

describe('createBridgeLoader', () => {
  it('imports once and shares the bridge between concurrent callers', async () => {
    const bridge = fakeBridge()
    const importer = vi.fn(async () => bridge)
    const loader = createBridgeLoader(importer)

    const [first, second, third] = await Promise.all([loader.get(), loader.get(), loader.get()])

    expect(importer).toHaveBeenCalledTimes(1)
    expect(first).toBe(bridge)
    expect(second).toBe(bridge)
    expect(third).toBe(bridge)
    expect(loader.isLoaded).toBe(true)
  })

  it('retries after a failed import', async () => {
    const bridge = fakeBridge()
    const importer = vi.fn<() => Promise<Bridge<string>>>()
      .mockRejectedValueOnce(new Error('chunk failed to load'))
      .mockResolvedValueOnce(bridge)
    const loader = createBridgeLoader(importer)

    await expect(loader.get()).rejects.toThrow('chunk failed to load')
    expect(loader.isLoaded).toBe(false)

    await expect(loader.get()).resolves.toBe(bridge)
    expect(importer).toHaveBeenCalledTimes(2)
  })

  it('disposes only a bridge that was acquired', async () => {
    const bridge = fakeBridge()
    const loader = createBridgeLoader(async () => bridge)

    await loader.release()
    expect(bridge.dispose).not.toHaveBeenCalled()

    await loader.get()
    await loader.release()

    expect(bridge.dispose).toHaveBeenCalledTimes(1)
    expect(loader.isLoaded).toBe(false)
  })

  it('imports again after a release', async () => {
    const importer = vi.fn(async () => fakeBridge())
    const loader = createBridgeLoader(importer)

    await loader.get()
    await loader.release()
    await loader.get()

    expect(importer).toHaveBeenCalledTimes(2)
  })

  it('disposes a bridge whose import lands after release', async () => {
    const bridge = fakeBridge()
    let finishImport: (value: Bridge<string>) => void = () => {}
    const loader = createBridgeLoader(() => new Promise<Bridge<string>>((resolve) => {
      finishImport = resolve
    }))

    const acquiring = loader.get()
    const releasing = loader.release()
    finishImport(bridge)
    await releasing

    await expect(acquiring).resolves.toBe(bridge)
    expect(loader.isLoaded).toBe(false)
    expect(bridge.dispose).toHaveBeenCalledTimes(1)
  })

  it('keeps a bridge acquired after an earlier release settles', async () => {
    const importer = vi.fn(async () => fakeBridge())
    const loader = createBridgeLoader(importer)

    await loader.release()
    await loader.get()

    expect(loader.isLoaded).toBe(true)
  })
})
