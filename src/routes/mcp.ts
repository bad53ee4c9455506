import { randomUUID } from 'node:crypto'
import type { FastifyPluginAsync } from 'fastify'
import type { MessageBroker } from '../brokers/message-broker.ts'
import { inboundTopic, outboundTopic } from '../brokers/message-broker.ts'
import type { Session } from '../session/session.ts'
import type { Channel } from '../transports/transport.ts'
import { SseChannel } from '../transports/sse.ts'

export interface SseRoutesOptions {
  broker: MessageBroker
  heartbeatInterval: number
  connect: (channel: Channel) => Session
}

interface PublishParams {
  connectionId: string
}

/**
 * Subscribe and publish endpoints of the SSE transport.
 *
 * `GET /sub` opens the event stream of a new connection and announces the
 * publish URL in an `endpoint` event; `POST /pub/:connectionId` hands one frame
 * to the session bound to that connection.
 */
const sseRoutes: FastifyPluginAsync<SseRoutesOptions> = async (app, options) => {
  const { broker, heartbeatInterval, connect } = options
  const connections = new Map<string, SseChannel>()

  // Frames are decoded by the session, parse errors included.
  app.removeAllContentTypeParsers()
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body)
  })

  app.get('/sub', async (request, reply) => {
    const connectionId = randomUUID()
    const raw = reply.raw
    let eventId = 0

    const write = (chunk: string): void => {
      if (!raw.writableEnded && !raw.destroyed) {
        raw.write(chunk)
      }
    }
    const end = (): void => {
      if (!raw.writableEnded) {
        raw.end()
      }
    }

    reply.hijack()
    raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    })

    const channel = new SseChannel(connectionId, broker, end)
    try {
      await broker.subscribe(outboundTopic(connectionId), frame => {
        write(`id: ${++eventId}\nevent: message\ndata: ${frame}\n\n`)
      })
      await channel.listen()
    } catch (error) {
      request.log.error({ err: error, connectionId }, 'failed to open SSE connection')
      end()
      return
    }

    connections.set(connectionId, channel)
    write(`event: endpoint\ndata: ${app.prefix}/pub/${connectionId}\n\n`)

    const heartbeat = setInterval(() => {
      write(': heartbeat\n\n')
    }, heartbeatInterval)
    heartbeat.unref()

    raw.on('close', () => {
      clearInterval(heartbeat)
      connections.delete(connectionId)
      request.log.info({ connectionId }, 'SSE connection closed')
      Promise.all([
        channel.disconnect(),
        broker.unsubscribe(outboundTopic(connectionId))
      ]).catch((error: unknown) => {
        request.log.warn({ err: error, connectionId }, 'failed to release SSE connection')
      })
    })

    request.log.info({ connectionId }, 'SSE connection opened')
    connect(channel)
  })

  app.post<{ Params: PublishParams }>('/pub/:connectionId', async (request, reply) => {
    const { connectionId } = request.params
    const channel = connections.get(connectionId)
    if (channel === undefined || !channel.open) {
      reply.code(404)
      return { error: `Unknown connection: ${connectionId}` }
    }

    const frame = typeof request.body === 'string' ? request.body : ''
    await broker.publish(inboundTopic(connectionId), frame)
    reply.code(202)
    return { accepted: true }
  })

  app.addHook('preClose', async () => {
    const open = [...connections.values()]
    connections.clear()
    await Promise.all(open.map(channel => channel.close()))
  })
}

export default sseRoutes
