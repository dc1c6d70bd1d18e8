export * from './lib/env'
export * from './lib/async/mutex'
export * from './lib/crud/errors'
export * from './lib/db/escapeLikePattern'
export * from './lib/db/mikro'
export * from './lib/di/container'
export * from './lib/http/json'
export type * from './modules/registry'
