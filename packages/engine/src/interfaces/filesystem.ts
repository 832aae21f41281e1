/**
 * Abstract File System Interfaces
 *
 * Decouples the file handlers from any specific runtime so they can be
 * exercised against an in-memory tree.
 */

export interface IFileStat {
  size: number
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /**
   * Open a file. `'w'` creates or truncates; it does not create parent
   * directories.
   */
  open(path: string, mode: 'r' | 'w'): Promise<IFileHandle>

  /** Get file statistics. */
  stat(path: string): Promise<IFileStat>

  /** Create a directory and any missing parents. Existing directories are fine. */
  mkdir(path: string): Promise<void>
}
