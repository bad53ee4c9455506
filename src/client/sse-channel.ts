import { request } from 'undici'
import type { Dispatcher } from 'undici'
import { TransportError, errorMessage } from '../errors.ts'
import { AsyncQueue } from '../transports/transport.ts'
import type { Channel } from '../transports/transport.ts'

export interface SseEvent {
  event: string
  data: string
  id?: string
}

/**
 * Incremental `text/event-stream` parser. Comment lines (heartbeats) are skipped.
 */
export class SseParser {
  private buffer = ''

  feed (chunk: string): SseEvent[] {
    this.buffer += chunk.replace(/\r\n?/g, '\n')
    const events: SseEvent[] = []

    let boundary = this.buffer.indexOf('\n\n')
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary)
      this.buffer = this.buffer.slice(boundary + 2)
      const event = parseBlock(block)
      if (event) {
        events.push(event)
      }
      boundary = this.buffer.indexOf('\n\n')
    }
    return events
  }
}

function parseBlock (block: string): SseEvent | undefined {
  let event = 'message'
  let id: string | undefined
  const data: string[] = []

  for (const line of block.split('\n')) {
    if (line === '' || line.startsWith(':')) {
      continue
    }
    const colon = line.indexOf(':')
    const field = colon === -1 ? line : line.slice(0, colon)
    const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '')
    if (field === 'event') {
      event = value
    } else if (field === 'data') {
      data.push(value)
    } else if (field === 'id') {
      id = value
    }
  }

  if (data.length === 0) {
    return undefined
  }
  return id === undefined ? { event, data: data.join('\n') } : { event, data: data.join('\n'), id }
}

export interface SseClientChannelOptions {
  dispatcher?: Dispatcher
  /**
   * Milliseconds to wait for the `endpoint` event. Defaults to 10 seconds.
   */
  connectTimeout?: number
}

/**
 * Client end of the SSE transport: frames arrive on the subscribe stream and
 * are sent by POSTing to the endpoint the server announced.
 */
export class SseClientChannel implements Channel {
  readonly id: string
  private readonly endpoint: URL
  private readonly inbox: AsyncQueue<string>
  private readonly controller: AbortController
  private readonly dispatcher?: Dispatcher
  private closed = false

  constructor (endpoint: URL, inbox: AsyncQueue<string>, controller: AbortController, dispatcher?: Dispatcher) {
    this.endpoint = endpoint
    this.id = endpoint.pathname.split('/').pop() ?? ''
    this.inbox = inbox
    this.controller = controller
    this.dispatcher = dispatcher
  }

  async send (frame: string): Promise<void> {
    if (this.closed) {
      throw new TransportError('SSE channel is closed')
    }

    let response: Dispatcher.ResponseData
    try {
      response = await request(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: frame,
        dispatcher: this.dispatcher
      })
    } catch (error) {
      throw new TransportError(`Publish failed: ${errorMessage(error)}`, { cause: error })
    }

    await response.body.dump()
    if (response.statusCode !== 202) {
      throw new TransportError(`Publish failed with status ${response.statusCode}`)
    }
  }

  receive (): AsyncIterable<string> {
    return this.inbox
  }

  async close (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    this.inbox.end()
    this.controller.abort()
  }
}

/**
 * Opens the subscribe stream at `url` and resolves once the server has
 * announced the publish endpoint.
 */
export async function openSseChannel (url: string | URL, options: SseClientChannelOptions = {}): Promise<SseClientChannel> {
  const subscribeUrl = new URL(url)
  const controller = new AbortController()
  const inbox = new AsyncQueue<string>()

  let response: Dispatcher.ResponseData
  try {
    response = await request(subscribeUrl, {
      method: 'GET',
      headers: { accept: 'text/event-stream' },
      signal: controller.signal,
      dispatcher: options.dispatcher
    })
  } catch (error) {
    throw new TransportError(`Cannot connect to ${subscribeUrl.href}: ${errorMessage(error)}`, { cause: error })
  }

  if (response.statusCode !== 200) {
    await response.body.dump()
    throw new TransportError(`Cannot connect to ${subscribeUrl.href}: status ${response.statusCode}`)
  }

  const body = response.body
  const endpoint = new Promise<URL>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort()
      reject(new TransportError(`No endpoint announced by ${subscribeUrl.href}`))
    }, options.connectTimeout ?? 10_000)
    timer.unref()

    const pump = async (): Promise<void> => {
      const parser = new SseParser()
      const decoder = new TextDecoder()
      try {
        for await (const chunk of body) {
          const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true })
          for (const event of parser.feed(text)) {
            if (event.event === 'endpoint') {
              clearTimeout(timer)
              resolve(new URL(event.data, subscribeUrl))
            } else if (event.event === 'message') {
              inbox.push(event.data)
            }
          }
        }
      } catch (error) {
        if (!controller.signal.aborted) {
          reject(new TransportError(`Subscribe stream failed: ${errorMessage(error)}`, { cause: error }))
        }
      } finally {
        clearTimeout(timer)
        reject(new TransportError(`Subscribe stream of ${subscribeUrl.href} ended`))
        inbox.end()
      }
    }
    pump().catch(reject)
  })

  return new SseClientChannel(await endpoint, inbox, controller, options.dispatcher)
}
