import { open, type FileHandle } from 'fs/promises'
import type { Writable } from 'stream'
import { OutputIOError, describeError } from '../../errors.js'

/**
 * Destination of one generated document.
 */
export interface OutputSink {
  readonly description: string
  write(content: string): Promise<void>
  close(): Promise<void>
}

/**
 * Writes to a stream the process does not own, such as stdout. Closing it
 * leaves the stream open.
 */
export class StreamSink implements OutputSink {
  constructor(
    private readonly stream: Writable,
    readonly description: string = 'standard output'
  ) {}

  write(content: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(content, error => {
        if (error) {
          reject(
            new OutputIOError(
              `Failed to write ${this.description}: ${error.message}`,
              this.description,
              error
            )
          )
        } else {
          resolve()
        }
      })
    })
  }

  async close(): Promise<void> {}
}

export class DiscardSink implements OutputSink {
  readonly description = 'discarded output'

  async write(_content: string): Promise<void> {}

  async close(): Promise<void> {}
}

/**
 * File created (or truncated) on open.
 */
export class FileSink implements OutputSink {
  private constructor(
    readonly path: string,
    private readonly handle: FileHandle
  ) {}

  get description(): string {
    return this.path
  }

  static async create(path: string): Promise<FileSink> {
    try {
      return new FileSink(path, await open(path, 'w'))
    } catch (error) {
      throw new OutputIOError(`Failed to create file ${path}: ${describeError(error)}`, path, error)
    }
  }

  async write(content: string): Promise<void> {
    try {
      await this.handle.writeFile(content, 'utf-8')
    } catch (error) {
      throw new OutputIOError(
        `Failed to write file ${this.path}: ${describeError(error)}`,
        this.path,
        error
      )
    }
  }

  async close(): Promise<void> {
    try {
      await this.handle.close()
    } catch (error) {
      throw new OutputIOError(
        `Failed to close file ${this.path}: ${describeError(error)}`,
        this.path,
        error
      )
    }
  }
}
