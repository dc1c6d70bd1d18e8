import { CrudHttpError } from '../crud/errors'

export function json(body: unknown, init?: { status?: number; headers?: Record<string, string> }): Response {
  return new Response(JSON.stringify(body), {
    status: init?.status ?? 200,
    headers: { 'content-type': 'application/json', ...(init?.headers ?? {}) },
  })
}

export function jsonError(error: CrudHttpError): Response {
  return json(error.body, { status: error.status })
}

export async function readJsonBody(req: Request): Promise<unknown> {
  const text = await req.text()
  if (!text.trim()) return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new CrudHttpError(400, { error: 'Request body must be valid JSON' })
  }
}
