import { gzipSync } from "node:zlib";
import { withBody } from "./response.js";
import { getHeader, type HttpRequest, type HttpResponse } from "./types.js";

export type ContentEncoding = "gzip";

const ENCODERS: Record<ContentEncoding, (body: Uint8Array) => Uint8Array> = {
  gzip: (body) => gzipSync(body),
};

/**
 * Substring match on Accept-Encoding. Quality values are not parsed, so
 * `gzip;q=0` still counts as accepted.
 */
export function acceptsEncoding(
  request: HttpRequest,
  encoding: ContentEncoding,
): boolean {
  return getHeader(request, "accept-encoding").includes(encoding);
}

/** First encoding from `supported` the client accepts, if any. */
export function negotiateEncoding(
  request: HttpRequest,
  supported: readonly ContentEncoding[] = ["gzip"],
): ContentEncoding | null {
  return supported.find((encoding) => acceptsEncoding(request, encoding)) ?? null;
}

export function encodeResponse(
  response: HttpResponse,
  encoding: ContentEncoding,
): HttpResponse {
  const encoded = ENCODERS[encoding](response.body);
  return withBody(response, encoded, [["Content-Encoding", encoding]]);
}
