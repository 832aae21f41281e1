import { encodeResponse, negotiateEncoding } from "../http/content-encoding.js";
import { internalError, notFound, textResponse } from "../http/response.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import type { RequestHandler } from "./handlers/handler.js";

export interface RouterOptions {
  routes: Iterable<[string, RequestHandler]>;
  logger?: Logger;
}

/** Non-empty `/`-separated segments of a request target. */
export function splitPath(target: string): string[] {
  return target.split("/").filter((segment) => segment.length > 0);
}

/**
 * Maps the first path segment to a handler. The table is copied at
 * construction and never changes afterwards, so concurrent connections read
 * it without coordination.
 */
export class Router {
  private readonly routes: ReadonlyMap<string, RequestHandler>;
  private readonly logger: Logger;

  constructor(options: RouterOptions) {
    this.routes = new Map(options.routes);
    this.logger = options.logger ?? basicLogger();
  }

  async route(request: HttpRequest): Promise<HttpResponse> {
    const target = request.target;
    if (target === "" || target === "/") {
      return textResponse(200, "");
    }

    if (!target.startsWith("/")) {
      return notFound();
    }

    const segments = splitPath(target);
    const handler = segments.length > 0 ? this.routes.get(segments[0]) : undefined;
    if (!handler) {
      return notFound();
    }

    let response: HttpResponse;
    try {
      response = await handler.handle(request, segments);
    } catch (err) {
      this.logger.error(`Handler for /${segments[0]} failed:`, err);
      return internalError();
    }

    if (handler.compressible && response.status === 200) {
      const encoding = negotiateEncoding(request);
      if (encoding) {
        return encodeResponse(response, encoding);
      }
    }
    return response;
  }
}
