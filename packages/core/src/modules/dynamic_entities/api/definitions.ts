import type { ApiRouteMetadata } from '@tessera/shared/modules/registry'
import { badRequest } from '@tessera/shared/lib/crud/errors'
import { json, readJsonBody } from '@tessera/shared/lib/http/json'
import { isPlainObject, parseFlag, resolveDynamicEntitiesApiContext, withErrorHandling } from './utils'

export const metadata: ApiRouteMetadata = {
  GET: { requireAuth: true, requireFeatures: ['dynamic_entities.definitions.view'] },
  POST: { requireAuth: true, requireFeatures: ['dynamic_entities.definitions.manage'] },
  DELETE: { requireAuth: true, requireFeatures: ['dynamic_entities.definitions.manage'] },
}

export async function GET(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const { service, tenantScope } = await resolveDynamicEntitiesApiContext(req)
    const name = new URL(req.url).searchParams.get('name')
    if (name) return json(await service.describe(name, tenantScope))
    return json({ items: await service.listEntityTypes(tenantScope) })
  })
}

export async function POST(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const body = await readJsonBody(req)
    if (!isPlainObject(body)) throw badRequest('Request body must be an object')
    const { service, tenantScope } = await resolveDynamicEntitiesApiContext(req)
    const result = await service.submit({ ...body, tenantScope: body.tenantScope === undefined ? tenantScope : body.tenantScope })
    return json(result)
  })
}

export async function DELETE(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const params = new URL(req.url).searchParams
    const name = params.get('name')
    if (!name) throw badRequest('Query parameter "name" is required')
    const { service, tenantScope } = await resolveDynamicEntitiesApiContext(req)
    return json(await service.drop({ name, tenantScope, force: parseFlag(params.get('force')) }))
  })
}
