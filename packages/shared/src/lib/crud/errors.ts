export type CrudErrorBody = Record<string, unknown> & { error?: string }

export class CrudHttpError extends Error {
  status: number
  body: CrudErrorBody

  constructor(status: number, body?: CrudErrorBody | string) {
    const normalizedBody: CrudErrorBody = typeof body === 'string' ? { error: body } : body ?? {}
    super(typeof body === 'string' ? body : normalizedBody.error ?? 'Request failed')
    this.name = 'CrudHttpError'
    this.status = status
    this.body = normalizedBody
  }
}

export function badRequest(message: string, extras?: Record<string, unknown>): CrudHttpError {
  return new CrudHttpError(400, { error: message, ...(extras ?? {}) })
}

export function notFound(message = 'Not found'): CrudHttpError {
  return new CrudHttpError(404, { error: message })
}

export function conflict(message: string, extras?: Record<string, unknown>): CrudHttpError {
  return new CrudHttpError(409, { error: message, ...(extras ?? {}) })
}

export function unprocessable(message: string, extras?: Record<string, unknown>): CrudHttpError {
  return new CrudHttpError(422, { error: message, ...(extras ?? {}) })
}

export function serviceUnavailable(message = 'Service unavailable', extras?: Record<string, unknown>): CrudHttpError {
  return new CrudHttpError(503, { error: message, ...(extras ?? {}) })
}
