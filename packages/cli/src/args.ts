import { DEFAULT_PORT, isLogLevel, type LogLevel } from "@linehttp/engine";

export interface CliArgs {
  directory: string;
  port: number;
  host: string;
  quiet: boolean;
  logLevel: LogLevel;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    directory: ".",
    port: DEFAULT_PORT,
    host: "0.0.0.0",
    quiet: false,
    logLevel: "info",
    help: false,
    version: false,
  };

  let i = 0;
  const valueFor = (flag: string): string => {
    const value = args[++i];
    if (value === undefined || value.startsWith("-")) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      parsed.directory = valueFor(arg);
    } else if (arg === "--port" || arg === "-p") {
      parsed.port = parsePort(valueFor(arg));
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = valueFor(arg);
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--log-level") {
      const level = valueFor(arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Invalid log level: ${level}`);
      }
      parsed.logLevel = level;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(port) || port > 65535) {
    throw new CliUsageError(`Invalid port number: ${value}`);
  }
  return port;
}

export const HELP_TEXT = `
linehttp - a small HTTP/1.1 server

Usage: linehttp [options]

Routes:
  /                    200 with an empty body
  /echo/{text}         replies with {text} (gzip when accepted)
  /user-agent          replies with the User-Agent header
  /files/{name}        GET reads, POST writes {name} under --directory

Options:
  --directory, -d <dir>   Root directory for /files (default: .)
  --port, -p <port>       Port to listen on (default: ${DEFAULT_PORT})
  --host, -H <host>       Host to bind (default: 0.0.0.0)
  --quiet, -q             Suppress request logging
  --log-level <level>     debug, info, warn or error (default: info)
  --version, -v           Show version
  --help, -h              Show this help
`;
