import { createEventBus } from '@tessera/events'

const resolve = <T = unknown>(name: string): T => {
  throw new Error(`unexpected resolve of ${name}`)
}

describe('Event bus - local strategy', () => {
  const prevEnv = { ...process.env }
  beforeEach(() => {
    delete process.env.EVENTS_STRATEGY
  })
  afterEach(() => {
    process.env = { ...prevEnv }
    jest.restoreAllMocks()
  })

  test('delivers to handlers with event name and origin', async () => {
    const bus = createEventBus({ resolve })
    const calls: Array<{ payload: unknown; eventName: string; origin: string }> = []
    bus.on('demo', async (payload, ctx) => {
      calls.push({ payload, eventName: ctx.eventName, origin: ctx.origin })
    })
    await bus.emit('demo', { a: 1 })
    expect(bus.strategy).toBe('local')
    expect(calls).toEqual([{ payload: { a: 1 }, eventName: 'demo', origin: bus.instanceId }])
  })

  test('broadcast delivers exactly once in a single process', async () => {
    const bus = createEventBus({ resolve })
    const handler = jest.fn()
    bus.on('schema', handler)
    await bus.emit('schema', { v: 2 }, { broadcast: true })
    expect(handler).toHaveBeenCalledTimes(1)
  })

  test('unsubscribe stops delivery', async () => {
    const bus = createEventBus({ resolve })
    const handler = jest.fn()
    const off = bus.on('x', handler)
    off()
    await bus.emit('x', {})
    expect(handler).not.toHaveBeenCalled()
  })

  test('a failing handler is logged and does not stop the others', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    const bus = createEventBus({ resolve })
    const second = jest.fn()
    bus.registerModuleSubscribers([
      { id: 'first', event: 'y', handler: () => { throw new Error('nope') } },
      { id: 'second', event: 'y', handler: second },
    ])
    await bus.emit('y', 1)
    expect(second).toHaveBeenCalledWith(1, expect.objectContaining({ eventName: 'y' }))
    expect(errorSpy).toHaveBeenCalledWith('[events] Handler error for "y":', expect.any(Error))
  })

  test('rejects an unknown EVENTS_STRATEGY', () => {
    process.env.EVENTS_STRATEGY = 'kafka'
    expect(() => createEventBus({ resolve })).toThrow('Invalid EVENTS_STRATEGY "kafka". Must be one of: local, redis')
  })
})
