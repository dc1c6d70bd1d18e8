import type { EventTransport } from '../types'

/** Single-process transport: local delivery is all there is. */
export function createLocalTransport(): EventTransport {
  return {
    name: 'local',
    async publish() {},
    async subscribe() {},
    async close() {},
  }
}
