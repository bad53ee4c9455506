import type { FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'
import type { PluginConfig } from '../config.ts'
import type { Registry } from '../registry.ts'
import type { ConnectOptions, HandlerServices } from '../types.ts'
import type { Channel } from '../transports/transport.ts'
import { Session } from '../session/session.ts'

interface SessionDecoratorsOptions {
  config: PluginConfig
  registry: Registry
  services: HandlerServices
}

const sessionDecoratorsPlugin: FastifyPluginAsync<SessionDecoratorsOptions> = async (app, options) => {
  const { config, registry, services } = options
  const sessions = new Map<string, Session>()

  app.decorate('mcpSessions', sessions)

  app.decorate('mcpConnect', (channel: Channel, connectOptions: ConnectOptions = {}) => {
    const logger = (connectOptions.logger ?? app.log).child({ sessionId: channel.id })
    const session = new Session(channel, {
      registry,
      logger,
      serverInfo: config.serverInfo,
      instructions: config.instructions,
      services,
      requestTimeout: config.requestTimeout,
      maxCompletionValues: config.maxCompletionValues,
      defaultLogLevel: config.defaultLogLevel
    })

    sessions.set(session.id, session)
    logger.debug('MCP session started')
    session.start()
      .catch((error: unknown) => {
        logger.error({ err: error }, 'MCP session failed')
      })
      .finally(() => {
        sessions.delete(session.id)
        logger.debug('MCP session ended')
      })
    return session
  })

  app.addHook('onClose', async () => {
    const open = [...sessions.values()]
    await Promise.all(open.map(session => session.close()))
    sessions.clear()
  })
}

export default fp(sessionDecoratorsPlugin, {
  name: 'mcp-session-decorators'
})
