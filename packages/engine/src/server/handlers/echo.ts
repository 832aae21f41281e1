import { notFound, textResponse } from '../../http/response.js'
import type { HttpRequest, HttpResponse } from '../../http/types.js'
import type { RequestHandler } from './handler.js'

/** `/echo/{text}`: replies with the raw segment, not percent-decoded. */
export class EchoHandler implements RequestHandler {
  readonly compressible = true

  handle(_request: HttpRequest, segments: readonly string[]): HttpResponse {
    const text = segments[1]
    if (text === undefined) {
      return notFound()
    }
    return textResponse(200, text)
  }
}
