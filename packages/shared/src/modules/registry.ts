export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type ModuleInfo = {
  name: string
  title: string
  version: string
  description?: string
  requires?: string[]
}

export type RouteAccess = {
  requireAuth?: boolean
  requireFeatures?: string[]
}

/** Exported as `metadata` by route modules; enforced by the host's auth layer. */
export type ApiRouteMetadata = Partial<Record<HttpMethod, RouteAccess>>

export type ApiHandler = (req: Request) => Promise<Response>
