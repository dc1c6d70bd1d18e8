import type { ModuleInfo } from '@tessera/shared/modules/registry'

export const metadata: ModuleInfo = {
  name: 'dynamic_entities',
  title: 'Dynamic Entities',
  version: '0.1.0',
  description: 'User-defined entity types with live schema migration and generic CRUD.',
}

export { DYNAMIC_ENTITIES_EVENTS } from './events'
