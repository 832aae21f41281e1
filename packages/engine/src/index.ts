// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { DEFAULT_PORT, defaultConfig } from "./config/server-config.js";
// HTTP
export type { ContentEncoding } from "./http/content-encoding.js";
export {
  acceptsEncoding,
  encodeResponse,
  negotiateEncoding,
} from "./http/content-encoding.js";
export type {
  HttpRequestHead,
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  createHttpRequestParser,
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseHttpRequest,
} from "./http/request-parser.js";
export type { ResponseInit } from "./http/response.js";
export {
  binaryResponse,
  created,
  createResponse,
  emptyResponse,
  internalError,
  notFound,
  textResponse,
} from "./http/response.js";
export { sendResponse, serializeResponse } from "./http/response-writer.js";
export type { ContentType, HttpRequest, HttpResponse } from "./http/types.js";
export { CONTENT_TYPE, getHeader, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  LOG_LEVELS,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type {
  DefaultRoutesOptions,
  FileHandlerOptions,
  RequestHandler,
} from "./server/handlers/index.js";
export {
  createDefaultRoutes,
  EchoHandler,
  FileGetHandler,
  FilePostHandler,
  MethodHandler,
  UserAgentHandler,
} from "./server/handlers/index.js";
export type { RouterOptions } from "./server/router.js";
export { Router, splitPath } from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
