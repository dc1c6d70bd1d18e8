type MessageListener = (channel: string, message: string) => void

type MockClient = {
  url: string
  publish: jest.Mock
  subscribe: jest.Mock
  quit: jest.Mock
  listeners: Map<string, MessageListener>
}

const mockClients: MockClient[] = []

jest.mock('ioredis', () => {
  class MockRedis {
    publish = jest.fn(async () => 1)
    subscribe = jest.fn(async () => 1)
    quit = jest.fn(async () => 'OK')
    listeners = new Map<string, MessageListener>()
    on = jest.fn((event: string, listener: MessageListener) => {
      this.listeners.set(event, listener)
      return this
    })

    constructor(public url: string) {
      mockClients.push(this)
    }
  }

  return {
    __esModule: true,
    default: MockRedis,
    Redis: MockRedis,
  }
})

type CreateEventBus = typeof import('@tessera/events').createEventBus

const resolve = <T = unknown>(name: string): T => {
  throw new Error(`unexpected resolve of ${name}`)
}

const flush = () => new Promise((resolve) => setImmediate(resolve))

describe('Event bus - redis strategy (mocked)', () => {
  const prevEnv = { ...process.env }
  let createEventBus: CreateEventBus

  beforeEach(async () => {
    jest.resetModules()
    mockClients.length = 0
    process.env.EVENTS_STRATEGY = 'redis'
    process.env.REDIS_URL = 'redis://localhost:6379'
    delete process.env.EVENTS_CHANNEL
    const mod = await import('@tessera/events')
    createEventBus = mod.createEventBus
  })
  afterEach(() => {
    process.env = { ...prevEnv }
    jest.restoreAllMocks()
  })

  function clients() {
    const [publisher, subscriber] = mockClients
    if (!publisher || !subscriber) throw new Error('redis clients were not created')
    return { publisher, subscriber }
  }

  test('opens publisher and subscriber connections on the configured channel', async () => {
    createEventBus({ resolve })
    await flush()
    const { publisher, subscriber } = clients()
    expect(publisher.url).toBe('redis://localhost:6379')
    expect(subscriber.subscribe).toHaveBeenCalledWith('tessera:events')
  })

  test('broadcast delivers locally and publishes an envelope', async () => {
    const bus = createEventBus({ resolve, instanceId: 'node-a' })
    const received: unknown[] = []
    bus.on('schema.changed', (payload) => { received.push(payload) })
    await bus.emit('schema.changed', { version: 2 }, { broadcast: true })
    expect(received).toEqual([{ version: 2 }])
    const { publisher } = clients()
    expect(publisher.publish).toHaveBeenCalledTimes(1)
    const [channel, raw] = publisher.publish.mock.calls[0]
    expect(channel).toBe('tessera:events')
    expect(JSON.parse(raw)).toEqual({
      event: 'schema.changed',
      payload: { version: 2 },
      origin: 'node-a',
      emittedAt: expect.any(String),
    })
  })

  test('non-broadcast events stay local', async () => {
    const bus = createEventBus({ resolve })
    await bus.emit('local.only', {})
    expect(clients().publisher.publish).not.toHaveBeenCalled()
  })

  test('messages from other instances reach local handlers', async () => {
    const bus = createEventBus({ resolve, instanceId: 'node-a' })
    const seen: Array<{ payload: unknown; origin: string }> = []
    bus.on('schema.changed', (payload, ctx) => { seen.push({ payload, origin: ctx.origin }) })
    await flush()
    const listener = clients().subscriber.listeners.get('message')
    listener?.('tessera:events', JSON.stringify({
      event: 'schema.changed',
      payload: { version: 5 },
      origin: 'node-b',
      emittedAt: '2026-01-01T00:00:00.000Z',
    }))
    await flush()
    expect(seen).toEqual([{ payload: { version: 5 }, origin: 'node-b' }])
  })

  test('own echoes, other channels and malformed messages are ignored', async () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    const bus = createEventBus({ resolve, instanceId: 'node-a' })
    const handler = jest.fn()
    bus.on('schema.changed', handler)
    await flush()
    const listener = clients().subscriber.listeners.get('message')
    const envelope = JSON.stringify({ event: 'schema.changed', payload: {}, origin: 'node-a', emittedAt: 'x' })
    listener?.('tessera:events', envelope)
    listener?.('other-channel', envelope)
    listener?.('tessera:events', '{not json')
    await flush()
    expect(handler).not.toHaveBeenCalled()
    expect(warnSpy).toHaveBeenCalledWith('[events.redis] Ignoring malformed message on "tessera:events"')
  })

  test('close quits both connections', async () => {
    const bus = createEventBus({ resolve })
    await bus.close()
    const { publisher, subscriber } = clients()
    expect(publisher.quit).toHaveBeenCalledTimes(1)
    expect(subscriber.quit).toHaveBeenCalledTimes(1)
  })

  test('requires a redis url', () => {
    delete process.env.REDIS_URL
    delete process.env.EVENTS_REDIS_URL
    expect(() => createEventBus({ resolve })).toThrow('REDIS_URL or EVENTS_REDIS_URL must be set for redis events strategy')
  })
})
