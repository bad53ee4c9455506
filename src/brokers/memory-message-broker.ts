import mqemitter from 'mqemitter'
import type { MQEmitter } from 'mqemitter'
import type { MessageBroker } from './message-broker.ts'

type Listener = Parameters<MQEmitter['on']>[1]

export class MemoryMessageBroker implements MessageBroker {
  private emitter: MQEmitter
  private subscriptions = new Map<string, Listener>()

  constructor () {
    this.emitter = mqemitter()
  }

  async publish (topic: string, frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.emitter.emit({ topic, frame }, (err) => {
        if (err) {
          reject(err)
        } else {
          resolve()
        }
      })
    })
  }

  async subscribe (topic: string, handler: (frame: string) => void): Promise<void> {
    await this.unsubscribe(topic)

    return new Promise((resolve) => {
      const listener: Listener = (message, done) => {
        const frame: unknown = message.frame
        if (typeof frame === 'string') {
          handler(frame)
        }
        done()
      }

      this.subscriptions.set(topic, listener)
      this.emitter.on(topic, listener, () => {
        resolve()
      })
    })
  }

  async unsubscribe (topic: string): Promise<void> {
    const listener = this.subscriptions.get(topic)
    if (!listener) {
      return
    }
    this.subscriptions.delete(topic)

    return new Promise((resolve) => {
      this.emitter.removeListener(topic, listener, () => {
        resolve()
      })
    })
  }

  async close (): Promise<void> {
    this.subscriptions.clear()
    return new Promise((resolve) => {
      this.emitter.close(() => {
        resolve()
      })
    })
  }
}
