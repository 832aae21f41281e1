export interface HttpRequest {
  readonly method: string;
  /** Raw request-target as sent, e.g. `/echo/abc`. */
  readonly target: string;
  /** Version without the `HTTP/` prefix, e.g. `1.1`. */
  readonly httpVersion: string;
  /** Keys are lower-cased header names. */
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Uint8Array;
}

export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: ReadonlyMap<string, string>;
  readonly body: Uint8Array;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  404: "Not Found",
  500: "Internal Server Error",
};

export const CONTENT_TYPE = {
  TEXT_PLAIN: "text/plain",
  OCTET_STREAM: "application/octet-stream",
} as const;

export type ContentType = (typeof CONTENT_TYPE)[keyof typeof CONTENT_TYPE];

/** Case-insensitive header lookup. Missing headers read as `""`. */
export function getHeader(request: HttpRequest, name: string): string {
  return request.headers.get(name.toLowerCase()) ?? "";
}
