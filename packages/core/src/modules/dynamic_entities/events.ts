export const DYNAMIC_ENTITIES_EVENTS = {
  schemaChanged: 'dynamic_entities.schema.changed',
} as const

export type DynamicEntitiesEventName = (typeof DYNAMIC_ENTITIES_EVENTS)[keyof typeof DYNAMIC_ENTITIES_EVENTS]
