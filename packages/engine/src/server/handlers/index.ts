import type { IFileSystem } from '../../interfaces/filesystem.js'
import type { Logger } from '../../logging/logger.js'
import { EchoHandler } from './echo.js'
import { FileGetHandler, FilePostHandler } from './files.js'
import { MethodHandler, type RequestHandler } from './handler.js'
import { UserAgentHandler } from './user-agent.js'

export { EchoHandler } from './echo.js'
export { FileGetHandler, FilePostHandler, type FileHandlerOptions } from './files.js'
export { MethodHandler, type RequestHandler } from './handler.js'
export { UserAgentHandler } from './user-agent.js'

export interface DefaultRoutesOptions {
  directory: string
  fs: IFileSystem
  logger?: Logger
}

/** `echo`, `user-agent` and `files`, keyed by first path segment. */
export function createDefaultRoutes(options: DefaultRoutesOptions): Map<string, RequestHandler> {
  const fileOptions = { root: options.directory, fs: options.fs, logger: options.logger }
  return new Map<string, RequestHandler>([
    ['echo', new EchoHandler()],
    ['user-agent', new UserAgentHandler()],
    [
      'files',
      new MethodHandler([
        ['GET', new FileGetHandler(fileOptions)],
        ['POST', new FilePostHandler(fileOptions)],
      ]),
    ],
  ])
}
