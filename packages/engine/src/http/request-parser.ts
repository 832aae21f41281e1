import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfByte } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const LF = 10;
const CR = 13;
const EMPTY = new Uint8Array(0);
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB

export interface ParseHttpRequestOptions {
  maxHeaderSize?: number;
  maxBodySize?: number;
  /** `null` or absent waits for the client indefinitely. */
  timeoutMs?: number | null;
}

export interface HttpRequestHead {
  method: string;
  target: string;
  httpVersion: string;
  headers: Map<string, string>;
  contentLength: number;
}

interface RawLine {
  text: string;
  byteLength: number;
}

export type HttpRequestParseErrorCode =
  | "EMPTY_REQUEST"
  | "MALFORMED_REQUEST_LINE"
  | "HEADERS_TOO_LARGE"
  | "BODY_TOO_LARGE"
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/**
 * Content-Length counts only when it is a plain decimal number; anything
 * else means "no body".
 */
export function parseContentLength(value: string | undefined): number {
  if (!value || !/^\d+$/.test(value)) {
    return 0;
  }
  return Number.parseInt(value, 10);
}

export function parseRequestLine(
  line: string,
): Pick<HttpRequestHead, "method" | "target" | "httpVersion"> {
  const parts = line.split(" ");
  // Trailing spaces do not make up a missing token.
  while (parts.length > 0 && parts[parts.length - 1] === "") {
    parts.pop();
  }
  if (parts.length < 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request line",
    );
  }

  const [method, target, rawVersion] = parts;
  const httpVersion = rawVersion.startsWith("HTTP/")
    ? rawVersion.slice("HTTP/".length)
    : rawVersion;
  return { method, target, httpVersion };
}

/**
 * Reads one request from a socket's byte stream: CRLF-terminated lines for
 * the head, then a fixed number of body bytes. End of stream is tolerated
 * anywhere after the request line; a short body is truncated, not an error.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = EMPTY;
  private ended = false;
  private receivedAny = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.receivedAny = true;
      this.buffer =
        this.buffer.length === 0 ? data : concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.ended = true;
      this.notifyWaiters();
    });
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const deadline = deadlineFrom(options?.timeoutMs);
    const head = await this.readRequestHead(options, deadline);
    const body = await this.readBody(head.contentLength, options, deadline);

    return {
      method: head.method,
      target: head.target,
      httpVersion: head.httpVersion,
      headers: head.headers,
      body,
    };
  }

  async readRequestHead(
    options?: ParseHttpRequestOptions,
    deadline = deadlineFrom(options?.timeoutMs),
  ): Promise<HttpRequestHead> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;

    const requestLine = await this.readLine(maxHeaderSize, deadline);
    if (requestLine === null || requestLine.text === "") {
      throw new HttpRequestParseError("EMPTY_REQUEST", "Empty request");
    }

    const { method, target, httpVersion } = parseRequestLine(requestLine.text);

    const headers = new Map<string, string>();
    let headerBytes = requestLine.byteLength;
    while (true) {
      const raw = await this.readLine(maxHeaderSize - headerBytes, deadline);
      if (raw === null || raw.text === "") break;

      headerBytes += raw.byteLength;
      if (headerBytes > maxHeaderSize) {
        throw new HttpRequestParseError(
          "HEADERS_TOO_LARGE",
          "Request headers too large",
        );
      }

      const line = raw.text;
      const colonIdx = line.indexOf(":");
      if (colonIdx === -1) continue;
      const key = line.substring(0, colonIdx).trim().toLowerCase();
      const value = line.substring(colonIdx + 1).trim();
      headers.set(key, value);
    }

    return {
      method,
      target,
      httpVersion,
      headers,
      contentLength: parseContentLength(headers.get("content-length")),
    };
  }

  /**
   * Read up to `contentLength` bytes. Resolves early with fewer bytes if the
   * peer stops sending.
   */
  async readBody(
    contentLength: number,
    options?: ParseHttpRequestOptions,
    deadline = deadlineFrom(options?.timeoutMs),
  ): Promise<Uint8Array> {
    if (contentLength <= 0) {
      return EMPTY;
    }

    const maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    if (contentLength > maxBodySize) {
      throw new HttpRequestParseError(
        "BODY_TOO_LARGE",
        "Request body too large",
      );
    }

    const body = new Uint8Array(contentLength);
    let position = 0;

    while (position < contentLength) {
      if (this.buffer.length > 0) {
        const take = Math.min(contentLength - position, this.buffer.length);
        body.set(this.buffer.subarray(0, take), position);
        this.buffer = this.buffer.subarray(take);
        position += take;
        continue;
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.ended) {
        break;
      }

      await this.waitOrTimeout(deadline);
    }

    return position === contentLength ? body : body.slice(0, position);
  }

  /**
   * Next line without its terminator, or `null` once the stream has ended
   * with nothing left to read. `byteLength` counts the terminator.
   */
  private async readLine(
    maxBytes: number,
    deadline: number,
  ): Promise<RawLine | null> {
    while (true) {
      const lfIdx = indexOfByte(this.buffer, LF);
      if (lfIdx !== -1) {
        const line = this.buffer.subarray(0, lfIdx);
        this.buffer = this.buffer.subarray(lfIdx + 1);
        return { text: decodeLine(line), byteLength: lfIdx + 1 };
      }

      if (this.buffer.length > maxBytes) {
        throw new HttpRequestParseError(
          "HEADERS_TOO_LARGE",
          "Request headers too large",
        );
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.ended) {
        if (this.buffer.length === 0) {
          return null;
        }
        const rest = this.buffer;
        this.buffer = EMPTY;
        return { text: decodeLine(rest), byteLength: rest.length };
      }

      await this.waitOrTimeout(deadline);
    }
  }

  private async waitOrTimeout(deadline: number): Promise<void> {
    const hadActivity = await this.waitForActivity(deadline - Date.now());
    if (hadActivity) return;

    if (!this.receivedAny) {
      throw new HttpRequestParseError(
        "IDLE_TIMEOUT",
        "Connection idle timed out",
      );
    }
    throw new HttpRequestParseError(
      "REQUEST_TIMEOUT",
      "Request timed out before completion",
    );
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        resolve(true);
      };

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          if (settled) return;
          settled = true;
          this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
          resolve(false);
        }, timeoutMs);
      }

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

function deadlineFrom(timeoutMs: number | null | undefined): number {
  return timeoutMs == null ? Number.POSITIVE_INFINITY : Date.now() + timeoutMs;
}

function decodeLine(line: Uint8Array): string {
  const end =
    line.length > 0 && line[line.length - 1] === CR
      ? line.length - 1
      : line.length;
  return decodeToString(line.subarray(0, end));
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Parse a single HTTP/1.1 request from a TCP socket stream.
 * Returns a promise that resolves with the parsed request.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}
