export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Root directory for the `/files` handlers. */
  directory: string;
  /** Suppress per-request logging. Default: false */
  quiet: boolean;
  /**
   * Max time allowed for receiving a full HTTP request. `null` waits
   * indefinitely. Default: null
   */
  requestTimeoutMs: number | null;
  /** Largest Content-Length accepted before the connection is dropped. Default: 10MB */
  maxRequestBodySize: number;
}

export const DEFAULT_PORT = 4221;

export function defaultConfig(directory = "."): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    directory,
    quiet: false,
    requestTimeoutMs: null,
    maxRequestBodySize: 10 * 1024 * 1024,
  };
}
