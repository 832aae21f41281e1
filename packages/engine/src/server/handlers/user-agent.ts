import { textResponse } from '../../http/response.js'
import { getHeader, type HttpRequest, type HttpResponse } from '../../http/types.js'
import type { RequestHandler } from './handler.js'

export class UserAgentHandler implements RequestHandler {
  handle(request: HttpRequest): HttpResponse {
    return textResponse(200, getHeader(request, 'user-agent'))
  }
}
