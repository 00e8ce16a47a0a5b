import { closeSync, openSync, writeSync } from 'node:fs'

/**
 * Synchronous text destination for an export.
 */
export interface GmlSink {
  write: (chunk: string) => void
  flush: () => void
}

/**
 * Collects the document in memory.
 */
export class StringSink implements GmlSink {
  private chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  flush(): void {}

  toString(): string {
    return this.chunks.join('')
  }
}

const DEFAULT_BUFFER_SIZE = 64 * 1024

/**
 * Buffered writer over a file descriptor. The file is created or truncated on
 * construction.
 */
export class FileSink implements GmlSink {
  private fd: number | null
  private buffer = ''

  constructor(
    readonly path: string,
    private readonly bufferSize: number = DEFAULT_BUFFER_SIZE,
  ) {
    this.fd = openSync(path, 'w')
  }

  write(chunk: string): void {
    this.buffer += chunk
    if (this.buffer.length >= this.bufferSize) {
      this.flush()
    }
  }

  flush(): void {
    if (this.fd === null) {
      throw new Error(`FileSink for ${this.path} is closed`)
    }
    if (this.buffer.length === 0)
      return
    const pending = this.buffer
    this.buffer = ''
    writeSync(this.fd, pending)
  }

  /**
   * Release the file descriptor. Output written since the last flush is
   * dropped.
   */
  close(): void {
    if (this.fd === null)
      return
    const fd = this.fd
    this.fd = null
    this.buffer = ''
    closeSync(fd)
  }
}
