import { z } from 'zod'
import type { ApiRouteMetadata } from '@tessera/shared/modules/registry'
import { badRequest, notFound } from '@tessera/shared/lib/crud/errors'
import { json, readJsonBody } from '@tessera/shared/lib/http/json'
import { recordQuerySchema } from '../data/validators'
import { issuesFromZod, ValidationError } from '../lib/errors'
import type { EntityRef } from '../lib/types'
import { parseJsonParam, resolveDynamicEntitiesApiContext, withErrorHandling, type DynamicEntitiesApiContext } from './utils'

export const metadata: ApiRouteMetadata = {
  GET: { requireAuth: true, requireFeatures: ['dynamic_entities.records.view'] },
  POST: { requireAuth: true, requireFeatures: ['dynamic_entities.records.manage'] },
  DELETE: { requireAuth: true, requireFeatures: ['dynamic_entities.records.manage'] },
}

const writeSchema = z.object({
  entity: z.string().min(1),
  values: z.record(z.unknown()),
})

function entityRef(ctx: DynamicEntitiesApiContext, entity: string): EntityRef {
  return { entity, tenantScope: ctx.tenantScope, organizationId: ctx.organizationId }
}

function requireParam(params: URLSearchParams, name: string): string {
  const value = params.get(name)
  if (!value) throw badRequest(`Query parameter "${name}" is required`)
  return value
}

export async function GET(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const params = new URL(req.url).searchParams
    const entity = requireParam(params, 'entity')
    const ctx = await resolveDynamicEntitiesApiContext(req)
    const id = params.get('id')
    if (id) {
      const record = await ctx.repository.findOne(entityRef(ctx, entity), id)
      if (!record) throw notFound(`Record "${id}" not found`)
      return json(record)
    }
    const query = recordQuerySchema.safeParse({
      filters: parseJsonParam('filter', params.get('filter')),
      sort: parseJsonParam('sort', params.get('sort')),
      page: params.get('page') ?? undefined,
      pageSize: params.get('pageSize') ?? undefined,
      search: params.get('search') ?? undefined,
    })
    if (!query.success) throw new ValidationError(issuesFromZod(query.error))
    return json(await ctx.repository.find(entityRef(ctx, entity), query.data))
  })
}

export async function POST(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const parsed = writeSchema.safeParse(await readJsonBody(req))
    if (!parsed.success) throw new ValidationError(issuesFromZod(parsed.error))
    const ctx = await resolveDynamicEntitiesApiContext(req)
    const created = parsed.data.values.id === undefined || parsed.data.values.id === null
    const id = await ctx.repository.save(entityRef(ctx, parsed.data.entity), parsed.data.values)
    return json({ id }, { status: created ? 201 : 200 })
  })
}

export async function DELETE(req: Request): Promise<Response> {
  return withErrorHandling(async () => {
    const params = new URL(req.url).searchParams
    const entity = requireParam(params, 'entity')
    const id = requireParam(params, 'id')
    const ctx = await resolveDynamicEntitiesApiContext(req)
    await ctx.repository.delete(entityRef(ctx, entity), id)
    return json({ ok: true })
  })
}
