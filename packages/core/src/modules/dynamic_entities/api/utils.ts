import { createRequestContainer } from '@tessera/shared/lib/di/container'
import { CrudHttpError, badRequest, conflict, serviceUnavailable } from '@tessera/shared/lib/crud/errors'
import { jsonError } from '@tessera/shared/lib/http/json'
import {
  ConcurrentModificationError,
  DestructiveChangeRejected,
  MigrationError,
  NotFoundError,
  SchemaNotReadyError,
  ValidationError,
} from '../lib/errors'
import type { DynamicRepository } from '../lib/repository'
import type { DynamicEntityService } from '../lib/service'

export const TENANT_HEADER = 'x-tenant-id'
export const ORGANIZATION_HEADER = 'x-organization-id'

export type DynamicEntitiesApiContext = {
  tenantScope: string | null
  organizationId: string | null
  service: DynamicEntityService
  repository: DynamicRepository
}

function readHeader(req: Request, name: string): string | null {
  const value = req.headers.get(name)?.trim()
  return value ? value : null
}

export async function resolveDynamicEntitiesApiContext(req: Request): Promise<DynamicEntitiesApiContext> {
  const container = await createRequestContainer()
  return {
    tenantScope: readHeader(req, TENANT_HEADER),
    organizationId: readHeader(req, ORGANIZATION_HEADER),
    service: container.resolve<DynamicEntityService>('dynamicEntityService'),
    repository: container.resolve<DynamicRepository>('dynamicRepository'),
  }
}

export function toHttpError(err: unknown): CrudHttpError {
  if (err instanceof CrudHttpError) return err
  if (err instanceof ValidationError) return badRequest(err.message, { code: err.code, issues: err.issues })
  if (err instanceof NotFoundError) return new CrudHttpError(404, { error: err.message, code: err.code })
  if (err instanceof DestructiveChangeRejected) {
    return conflict(err.message, { code: err.code, field: err.field, issues: err.issues })
  }
  if (err instanceof ConcurrentModificationError) {
    return conflict(err.message, { code: err.code, expectedVersion: err.expectedVersion, actualVersion: err.actualVersion })
  }
  if (err instanceof SchemaNotReadyError) return serviceUnavailable(err.message, { code: err.code })
  if (err instanceof MigrationError) {
    const extras = { code: err.code, kind: err.kind, targetVersion: err.targetVersion }
    if (err.retryable) return serviceUnavailable(err.message, extras)
    return new CrudHttpError(500, { error: err.message, ...extras })
  }
  console.error('[dynamic_entities.api] Unhandled error:', err)
  return new CrudHttpError(500, { error: 'Internal server error' })
}

export async function withErrorHandling(handler: () => Promise<Response>): Promise<Response> {
  try {
    return await handler()
  } catch (err) {
    return jsonError(toHttpError(err))
  }
}

export function parseJsonParam(name: string, raw: string | null): unknown {
  if (raw === null || raw === '') return undefined
  try {
    return JSON.parse(raw)
  } catch {
    throw badRequest(`Query parameter "${name}" must be valid JSON`)
  }
}

export function parseFlag(raw: string | null): boolean {
  return raw === '1' || raw === 'true'
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
