import type { ApiRouteMetadata } from '@tessera/shared/modules/registry'
import { json } from '@tessera/shared/lib/http/json'
import { resolveDynamicEntitiesApiContext, withErrorHandling } from './utils'

export const metadata: ApiRouteMetadata = {
  GET: { requireAuth: true, requireFeatures: ['dynamic_entities.status.view'] },
}

export async function GET(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const { service, tenantScope } = await resolveDynamicEntitiesApiContext(req)
    return json({ items: await service.status(tenantScope) })
  })
}
