import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { createDefaultRoutes, type RequestHandler } from "./handlers/index.js";
import { Router } from "./router.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Replaces the default `echo` / `user-agent` / `files` table. */
  routes?: Iterable<[string, RequestHandler]>;
}

export type WebServerEvents = {
  listening: [port: number];
  request: [request: HttpRequest, response: HttpResponse];
  error: [err: Error];
  close: [];
};

/**
 * Accepts connections and answers exactly one request on each. Every
 * connection runs as its own async task; tasks share only the router and
 * the configuration.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private router: Router;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.router = new Router({
      routes:
        options.routes ??
        createDefaultRoutes({
          directory: this.config.directory,
          fs: options.fileSystem,
          logger: this.logger,
        }),
      logger: this.logger,
    });
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.warn("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        // Accept failures do not stop the listener.
        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.destroy();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError((err) => {
      this.logger.warn(`Socket error from ${socket.remoteAddress ?? "?"}:`, err);
      this.activeConnections.delete(socket);
    });

    const parser = createHttpRequestParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest({
          timeoutMs: this.config.requestTimeoutMs,
          maxBodySize: this.config.maxRequestBodySize,
        });
      } catch (err) {
        // Unparseable or empty requests get no response.
        if (err instanceof HttpRequestParseError) {
          this.logger.debug(`Dropping connection (${err.code}): ${err.message}`);
        } else {
          this.logger.warn("Failed to read request:", err);
        }
        return;
      }

      const response = await this.router.route(request);

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        this.logger.info(
          `${request.method} ${request.target} -> ${response.status} - ${addr}`,
        );
      }

      try {
        await sendResponse(socket, response);
      } catch (err) {
        this.logger.warn("Failed to write response:", err);
        return;
      }
      this.emit("request", request, response);
    } finally {
      socket.close();
      this.activeConnections.delete(socket);
    }
  }
}
