import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import pino from 'pino'
import type { Session } from './session/session.ts'
import { StdioChannel } from './transports/stdio.ts'

/**
 * Options for the stdio transport
 */
export interface StdioTransportOptions {
  /**
   * Custom input stream (defaults to process.stdin)
   */
  input?: NodeJS.ReadableStream
  /**
   * Custom output stream (defaults to process.stdout)
   */
  output?: NodeJS.WritableStream
  /**
   * Diagnostics logger. Defaults to a pino logger writing to stderr at
   * `MCP_LOG_LEVEL` (or `info`), so stdout carries frames only.
   */
  logger?: FastifyBaseLogger
  /**
   * Install SIGINT/SIGTERM handlers that stop the transport
   */
  handleSignals?: boolean
}

export function createStderrLogger (level: string = process.env.MCP_LOG_LEVEL ?? 'info'): FastifyBaseLogger {
  return pino({ level }, pino.destination(2))
}

/**
 * Serves one MCP session over a pair of byte streams, stdin/stdout by default.
 */
export class StdioTransport {
  private readonly app: FastifyInstance
  private readonly transportOpts: StdioTransportOptions
  private readonly log: FastifyBaseLogger
  private session?: Session
  private stopping?: Promise<void>

  constructor (app: FastifyInstance, transportOpts: StdioTransportOptions = {}) {
    this.app = app
    this.transportOpts = transportOpts
    this.log = transportOpts.logger ?? createStderrLogger()
  }

  /**
   * Readies the app and starts the session. Resolves with the running session.
   */
  async start (): Promise<Session> {
    if (this.session) {
      return this.session
    }

    await this.app.ready()
    const channel = new StdioChannel({
      input: this.transportOpts.input,
      output: this.transportOpts.output
    })
    this.session = this.app.mcpConnect(channel, { logger: this.log })
    this.log.info({ sessionId: channel.id }, 'MCP stdio transport started')

    if (this.transportOpts.handleSignals) {
      const onSignal = (signal: NodeJS.Signals): void => {
        this.log.info({ signal }, 'received signal, shutting down')
        this.stop().catch((error: unknown) => {
          this.log.error({ err: error }, 'error during shutdown')
        })
      }
      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)
    }

    return this.session
  }

  /**
   * Resolves when the session has ended, either because the input closed or
   * because the client sent `shutdown`.
   */
  async closed (): Promise<void> {
    const session = await this.start()
    await session.start()
  }

  stop (): Promise<void> {
    if (this.stopping === undefined) {
      this.stopping = this.shutdown()
    }
    return this.stopping
  }

  private async shutdown (): Promise<void> {
    this.log.info('stopping MCP stdio transport')
    if (this.session) {
      await this.session.close()
    }
    try {
      await this.app.close()
    } catch (error) {
      this.log.error({ err: error }, 'error closing Fastify app')
    }
  }
}

/**
 * Create a stdio transport for a Fastify MCP server
 */
export function createStdioTransport (
  app: FastifyInstance,
  transportOpts: StdioTransportOptions = {}
): StdioTransport {
  return new StdioTransport(app, transportOpts)
}

/**
 * Runs the server in stdio mode until the session ends or a signal arrives.
 */
export async function runStdioServer (
  app: FastifyInstance,
  transportOpts: StdioTransportOptions = {}
): Promise<void> {
  const transport = createStdioTransport(app, { handleSignals: true, ...transportOpts })
  await transport.closed()
  await transport.stop()
}
