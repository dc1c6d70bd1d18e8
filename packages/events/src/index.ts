export { createEventBus } from './bus'
export { createLocalTransport } from './strategies/local'
export { createRedisTransport, parseEnvelope } from './strategies/redis'
export * from './types'
