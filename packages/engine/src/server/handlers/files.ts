import { binaryResponse, created, internalError, notFound } from '../../http/response.js'
import { CONTENT_TYPE, type HttpRequest, type HttpResponse } from '../../http/types.js'
import type { IFileHandle, IFileSystem } from '../../interfaces/filesystem.js'
import type { Logger } from '../../logging/logger.js'
import { basicLogger } from '../../logging/logger.js'
import type { RequestHandler } from './handler.js'

export interface FileHandlerOptions {
  /** Directory the file names are resolved against. */
  root: string
  fs: IFileSystem
  logger?: Logger
}

abstract class FileHandler implements RequestHandler {
  protected readonly root: string
  protected readonly fs: IFileSystem
  protected readonly logger: Logger

  constructor(options: FileHandlerOptions) {
    this.root = options.root.replace(/\/+$/, '')
    this.fs = options.fs
    this.logger = options.logger ?? basicLogger()
  }

  abstract handle(request: HttpRequest, segments: readonly string[]): Promise<HttpResponse>

  /**
   * Path for the file named by the second segment, or null when there is no
   * usable name.
   */
  protected resolveFilePath(segments: readonly string[]): string | null {
    const name = segments[1]
    if (name === undefined || name === '.' || name === '..') {
      return null
    }
    return `${this.root}/${name}`
  }
}

/** GET `/files/{name}`: the file's bytes as application/octet-stream. */
export class FileGetHandler extends FileHandler {
  async handle(_request: HttpRequest, segments: readonly string[]): Promise<HttpResponse> {
    const filePath = this.resolveFilePath(segments)
    if (!filePath) {
      return notFound()
    }

    try {
      const stat = await this.fs.stat(filePath)
      if (!stat.isFile) {
        return notFound()
      }

      const handle = await this.fs.open(filePath, 'r')
      try {
        const data = await readFully(handle, stat.size)
        return binaryResponse(200, data, CONTENT_TYPE.OCTET_STREAM)
      } finally {
        await handle.close()
      }
    } catch (err) {
      this.logger.debug(`Cannot read ${filePath}:`, err)
      return notFound()
    }
  }
}

/**
 * POST `/files/{name}`: writes the request body, replacing any existing
 * file. Failures answer 500.
 */
export class FilePostHandler extends FileHandler {
  async handle(request: HttpRequest, segments: readonly string[]): Promise<HttpResponse> {
    const filePath = this.resolveFilePath(segments)
    if (!filePath) {
      return notFound()
    }

    try {
      await this.fs.mkdir(parentDirectory(filePath))
      const handle = await this.fs.open(filePath, 'w')
      try {
        await writeFully(handle, request.body)
      } finally {
        await handle.close()
      }
      return created()
    } catch (err) {
      this.logger.error(`Failed to write ${filePath}:`, err)
      return internalError()
    }
  }
}

async function readFully(handle: IFileHandle, size: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(size)
  let position = 0
  while (position < size) {
    const { bytesRead } = await handle.read(buffer, position, size - position, position)
    if (bytesRead === 0) break
    position += bytesRead
  }
  return position === size ? buffer : buffer.slice(0, position)
}

async function writeFully(handle: IFileHandle, data: Uint8Array): Promise<void> {
  let position = 0
  while (position < data.length) {
    const { bytesWritten } = await handle.write(data, position, data.length - position, position)
    if (bytesWritten === 0) {
      throw new Error('Write made no progress')
    }
    position += bytesWritten
  }
}

function parentDirectory(filePath: string): string {
  const idx = filePath.lastIndexOf('/')
  if (idx === -1) return '.'
  if (idx === 0) return '/'
  return filePath.slice(0, idx)
}
