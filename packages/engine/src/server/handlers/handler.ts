import type { HttpRequest, HttpResponse } from '../../http/types.js'
import { notFound } from '../../http/response.js'

/**
 * One route family. `segments` are the non-empty path segments of the
 * request target; `segments[0]` is the route name that selected the handler.
 */
export interface RequestHandler {
  /** When set, a 200 response may be content-encoded for the client. */
  readonly compressible?: boolean
  handle(request: HttpRequest, segments: readonly string[]): HttpResponse | Promise<HttpResponse>
}

/** Dispatches on the request method. Unlisted methods get 404. */
export class MethodHandler implements RequestHandler {
  private readonly byMethod: ReadonlyMap<string, RequestHandler>

  constructor(byMethod: Iterable<[string, RequestHandler]>) {
    this.byMethod = new Map(byMethod)
  }

  handle(request: HttpRequest, segments: readonly string[]): HttpResponse | Promise<HttpResponse> {
    const handler = this.byMethod.get(request.method)
    if (!handler) {
      return notFound()
    }
    return handler.handle(request, segments)
  }
}
