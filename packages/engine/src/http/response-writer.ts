import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./types.js";

/**
 * Serialize a response to wire bytes: status line, headers, blank line, body.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const headerBytes = buildHeaderBytes(
    response.status,
    response.statusText,
    withContentLength(response),
  );
  return concat([headerBytes, response.body]);
}

/**
 * Send a complete HTTP response (headers + body) over a socket.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}

function withContentLength(response: HttpResponse): ReadonlyMap<string, string> {
  for (const key of response.headers.keys()) {
    if (key.toLowerCase() === "content-length") return response.headers;
  }
  const headers = new Map(response.headers);
  headers.set("Content-Length", String(response.body.length));
  return headers;
}

function buildHeaderBytes(
  status: number,
  statusText: string,
  headers: ReadonlyMap<string, string>,
): Uint8Array {
  const lines: string[] = [`HTTP/1.1 ${status} ${statusText}`];
  for (const [key, value] of headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}
