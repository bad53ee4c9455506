import { randomUUID } from 'node:crypto'
import { TransportError } from '../errors.ts'
import { AsyncQueue } from './transport.ts'
import type { Channel } from './transport.ts'

class MemoryChannel implements Channel {
  readonly id: string
  readonly inbox = new AsyncQueue<string>()
  peer: MemoryChannel | undefined
  private closed = false

  constructor (id: string) {
    this.id = id
  }

  async send (frame: string): Promise<void> {
    if (this.closed || this.peer === undefined || this.peer.closed) {
      throw new TransportError('Channel closed')
    }
    this.peer.inbox.push(frame)
  }

  receive (): AsyncIterable<string> {
    return this.inbox
  }

  async close (): Promise<void> {
    this.disconnect()
    this.peer?.disconnect()
  }

  private disconnect (): void {
    this.closed = true
    this.inbox.end()
  }
}

/**
 * Two connected in-process channels: what one sends, the other receives.
 * Closing either end disconnects both.
 */
export function createChannelPair (id: string = randomUUID()): [Channel, Channel] {
  const server = new MemoryChannel(id)
  const client = new MemoryChannel(id)
  server.peer = client
  client.peer = server
  return [server, client]
}
