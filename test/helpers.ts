import pino from 'pino'
import type { FastifyBaseLogger } from 'fastify'
import type { JSONRPCNotification, ProgressToken, RequestId } from '../src/schema.ts'
import type { HandlerContext } from '../src/types.ts'
import type { Registry } from '../src/registry.ts'
import type { Channel } from '../src/transports/transport.ts'
import { createChannelPair } from '../src/transports/memory.ts'
import { Session } from '../src/session/session.ts'
import type { SessionOptions } from '../src/session/session.ts'
import { RequestClientContext } from '../src/session/client-context.ts'
import { LoggingService } from '../src/features/logging.ts'

export const silentLogger: FastifyBaseLogger = pino({ level: 'silent' })

export const serverInfo = { name: 'test-server', version: '1.0.0' }

/**
 * Reads a nested property of a decoded frame.
 */
export function field (value: unknown, ...path: string[]): unknown {
  let current = value
  for (const key of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined
    }
    current = Reflect.get(current, key)
  }
  return current
}

/**
 * The client side of a channel, speaking raw JSON-RPC.
 */
export class TestPeer {
  readonly channel: Channel
  private readonly iterator: AsyncIterator<string>

  constructor (channel: Channel) {
    this.channel = channel
    this.iterator = channel.receive()[Symbol.asyncIterator]()
  }

  send (message: unknown): Promise<void> {
    return this.channel.send(typeof message === 'string' ? message : JSON.stringify(message))
  }

  request (id: RequestId, method: string, params?: { [key: string]: unknown }): Promise<void> {
    return this.send(params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params })
  }

  notify (method: string, params?: { [key: string]: unknown }): Promise<void> {
    return this.send(params === undefined ? { jsonrpc: '2.0', method } : { jsonrpc: '2.0', method, params })
  }

  async next (): Promise<unknown> {
    const result = await this.iterator.next()
    if (result.done === true) {
      throw new Error('channel closed')
    }
    return JSON.parse(result.value)
  }

  async ended (): Promise<boolean> {
    const result = await this.iterator.next()
    return result.done === true
  }

  /**
   * Handshake with id 0, followed by `notifications/initialized`.
   */
  async initialize (capabilities: { [key: string]: unknown } = {}): Promise<unknown> {
    await this.request(0, 'initialize', {
      protocolVersion: '2024-11-05',
      capabilities,
      clientInfo: { name: 'test-client', version: '1.0.0' }
    })
    const response = await this.next()
    await this.notify('notifications/initialized')
    return response
  }
}

export interface OpenSession {
  session: Session
  peer: TestPeer
  done: Promise<void>
}

export function openSession (registry: Registry, options: Partial<SessionOptions> = {}): OpenSession {
  const [serverEnd, clientEnd] = createChannelPair('test-session')
  const session = new Session(serverEnd, {
    registry,
    logger: silentLogger,
    serverInfo,
    ...options
  })
  const done = session.start()
  return { session, peer: new TestPeer(clientEnd), done }
}

export interface TestContext {
  context: HandlerContext
  controller: AbortController
  emitted: JSONRPCNotification[]
}

export function createHandlerContext (requestId: RequestId = 1, progressToken?: ProgressToken): TestContext {
  const controller = new AbortController()
  const emitted: JSONRPCNotification[] = []
  const emit = (notification: JSONRPCNotification): void => {
    emitted.push(notification)
  }
  const client = new RequestClientContext({
    requestId,
    progressToken,
    controller,
    roots: () => [],
    logging: new LoggingService(emit),
    emit
  })
  return {
    context: { sessionId: 'test-session', requestId, client, services: {}, log: silentLogger },
    controller,
    emitted
  }
}

/**
 * A promise with its resolve function, for holding handlers until a test releases them.
 */
export function gate (): { promise: Promise<void>, open: () => void } {
  let open = (): void => {}
  const promise = new Promise<void>(resolve => {
    open = resolve
  })
  return { promise, open }
}
