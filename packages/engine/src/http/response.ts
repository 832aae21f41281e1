import { fromString } from "../utils/buffer.js";
import { CONTENT_TYPE, type ContentType, type HttpResponse, STATUS_TEXT } from "./types.js";

const EMPTY = new Uint8Array(0);

export interface ResponseInit {
  status: number;
  headers?: Iterable<[string, string]>;
  body?: Uint8Array;
}

/**
 * Build an immutable response. `Content-Length` is always derived from the
 * body, whatever the caller passed.
 */
export function createResponse(init: ResponseInit): HttpResponse {
  const body = init.body ?? EMPTY;
  const headers = new Map(init.headers);
  headers.set("Content-Length", String(body.length));

  return Object.freeze({
    status: init.status,
    statusText: STATUS_TEXT[init.status] ?? "Unknown",
    headers,
    body,
  });
}

export function textResponse(status: number, text: string): HttpResponse {
  return binaryResponse(status, fromString(text), CONTENT_TYPE.TEXT_PLAIN);
}

export function binaryResponse(
  status: number,
  body: Uint8Array,
  contentType: ContentType,
): HttpResponse {
  return createResponse({
    status,
    headers: [["Content-Type", contentType]],
    body,
  });
}

/** Status line and Content-Length only. */
export function emptyResponse(status: number): HttpResponse {
  return createResponse({ status });
}

/** Copy of `response` with a different body and extra headers. */
export function withBody(
  response: HttpResponse,
  body: Uint8Array,
  headers: Iterable<[string, string]> = [],
): HttpResponse {
  const merged = new Map(response.headers);
  for (const [name, value] of headers) {
    merged.set(name, value);
  }
  return createResponse({ status: response.status, headers: merged, body });
}

export const notFound = (): HttpResponse => emptyResponse(404);
export const created = (): HttpResponse => emptyResponse(201);
export const internalError = (): HttpResponse => emptyResponse(500);
