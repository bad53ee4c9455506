import type { MessageBroker } from '../brokers/message-broker.ts'
import { inboundTopic, outboundTopic } from '../brokers/message-broker.ts'
import { TransportError } from '../errors.ts'
import { AsyncQueue } from './transport.ts'
import type { Channel } from './transport.ts'

/**
 * Server end of an SSE connection.
 *
 * Outbound frames are published on the connection's outbound topic, where the
 * subscribe stream picks them up; frames posted to the publish endpoint arrive
 * on the inbound topic.
 */
export class SseChannel implements Channel {
  readonly id: string
  private readonly broker: MessageBroker
  private readonly inbox = new AsyncQueue<string>()
  private readonly onClose: () => void
  private closed = false

  constructor (id: string, broker: MessageBroker, onClose: () => void = () => {}) {
    this.id = id
    this.broker = broker
    this.onClose = onClose
  }

  get open (): boolean {
    return !this.closed
  }

  async listen (): Promise<void> {
    await this.broker.subscribe(inboundTopic(this.id), frame => {
      this.inbox.push(frame)
    })
  }

  async send (frame: string): Promise<void> {
    if (this.closed) {
      throw new TransportError(`Connection ${this.id} is closed`)
    }
    await this.broker.publish(outboundTopic(this.id), frame)
  }

  receive (): AsyncIterable<string> {
    return this.inbox
  }

  /**
   * Called when the subscriber goes away: ends `receive()` without touching the stream.
   */
  async disconnect (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    this.inbox.end()
    await this.broker.unsubscribe(inboundTopic(this.id))
  }

  async close (): Promise<void> {
    if (this.closed) {
      return
    }
    await this.disconnect()
    this.onClose()
  }
}
