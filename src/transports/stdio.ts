import { randomUUID } from 'node:crypto'
import { createInterface } from 'node:readline'
import type { Interface } from 'node:readline'
import { TransportError, errorMessage } from '../errors.ts'
import { AsyncQueue } from './transport.ts'
import type { Channel } from './transport.ts'

export interface StdioChannelOptions {
  /**
   * Defaults to process.stdin
   */
  input?: NodeJS.ReadableStream
  /**
   * Defaults to process.stdout
   */
  output?: NodeJS.WritableStream
  id?: string
}

/**
 * Newline-delimited frames over a pair of streams. Blank lines are skipped.
 */
export class StdioChannel implements Channel {
  readonly id: string
  private readonly output: NodeJS.WritableStream
  private readonly readline: Interface
  private readonly inbox = new AsyncQueue<string>()
  private closed = false

  constructor (options: StdioChannelOptions = {}) {
    this.id = options.id ?? randomUUID()
    this.output = options.output ?? process.stdout
    this.readline = createInterface({
      input: options.input ?? process.stdin,
      crlfDelay: Infinity
    })

    this.readline.on('line', (line: string) => {
      const frame = line.trim()
      if (frame.length > 0) {
        this.inbox.push(frame)
      }
    })
    this.readline.on('close', () => {
      this.inbox.end()
    })
  }

  async send (frame: string): Promise<void> {
    if (this.closed) {
      throw new TransportError('stdio channel is closed')
    }

    await new Promise<void>((resolve, reject) => {
      this.output.write(frame + '\n', (error?: Error | null) => {
        if (error) {
          reject(new TransportError(`stdout write failed: ${errorMessage(error)}`, { cause: error }))
        } else {
          resolve()
        }
      })
    })
  }

  receive (): AsyncIterable<string> {
    return this.inbox
  }

  async close (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    this.readline.close()
    this.inbox.end()
  }
}
