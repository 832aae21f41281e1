import { describe, expect, it, vi } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import {
  binaryResponse,
  createResponse,
  emptyResponse,
  notFound,
  textResponse,
} from "./response.js";
import { sendResponse, serializeResponse } from "./response-writer.js";
import { type HttpResponse, STATUS_TEXT } from "./types.js";

function mockSocket(overrides: Partial<ITcpSocket> = {}): ITcpSocket {
  return {
    send: vi.fn(),
    onData() {},
    onEnd() {},
    onClose() {},
    onError() {},
    close() {},
    destroy() {},
    ...overrides,
  };
}

describe("serializeResponse", () => {
  it("writes status line, headers, blank line and body with CRLF", () => {
    const bytes = serializeResponse(textResponse(200, "abc"));

    expect(decodeToString(bytes)).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 3\r\n\r\nabc",
    );
  });

  it("writes an empty 404 with a zero Content-Length", () => {
    expect(decodeToString(serializeResponse(notFound()))).toBe(
      "HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n",
    );
  });

  it("writes 201 Created without a body", () => {
    expect(decodeToString(serializeResponse(emptyResponse(201)))).toBe(
      "HTTP/1.1 201 Created\r\nContent-Length: 0\r\n\r\n",
    );
  });

  it("counts bytes, not characters, in Content-Length", () => {
    const response = textResponse(200, "héllo");

    expect(response.headers.get("Content-Length")).toBe("6");
    expect(serializeResponse(response).length).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 6\r\n\r\n"
        .length + 6,
    );
  });

  it("appends the body bytes untouched", () => {
    const body = new Uint8Array([0, 1, 2, 255]);
    const bytes = serializeResponse(
      binaryResponse(200, body, "application/octet-stream"),
    );

    expect(Array.from(bytes.subarray(bytes.length - 4))).toEqual([
      0, 1, 2, 255,
    ]);
  });

  it("adds Content-Length when a hand-built response lacks one", () => {
    const response: HttpResponse = {
      status: 200,
      statusText: "OK",
      headers: new Map([["Content-Type", "text/plain"]]),
      body: fromString("hi"),
    };

    expect(decodeToString(serializeResponse(response))).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 2\r\n\r\nhi",
    );
  });
});

describe("createResponse", () => {
  it("overrides a caller-supplied Content-Length with the body length", () => {
    const response = createResponse({
      status: 200,
      headers: [["Content-Length", "999"]],
      body: fromString("four"),
    });

    expect(response.headers.get("Content-Length")).toBe("4");
  });

  it("knows reason phrases only for the statuses the server sends", () => {
    expect(Object.keys(STATUS_TEXT)).toEqual(["200", "201", "404", "500"]);
    expect(emptyResponse(413).statusText).toBe("Unknown");
  });

  it("returns frozen responses", () => {
    expect(Object.isFrozen(textResponse(200, "x"))).toBe(true);
  });
});

describe("sendResponse", () => {
  it("uses sendAndWait when the socket offers it", async () => {
    const sendAndWait = vi.fn(async (_data: Uint8Array) => {});
    const socket = mockSocket({ sendAndWait });

    await sendResponse(socket, textResponse(200, "ok"));

    expect(sendAndWait).toHaveBeenCalledTimes(1);
    expect(socket.send).not.toHaveBeenCalled();
    const sent = sendAndWait.mock.calls[0][0];
    expect(decodeToString(sent)).toBe(
      "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\nContent-Length: 2\r\n\r\nok",
    );
  });

  it("falls back to send", async () => {
    const send = vi.fn();
    const socket = mockSocket({ send });

    await sendResponse(socket, notFound());

    expect(send).toHaveBeenCalledTimes(1);
  });
});
