/**
 * Topic-based relay carrying encoded frames between the subscribe stream and
 * the publish endpoint of an SSE connection.
 */
export interface MessageBroker {
  publish (topic: string, frame: string): Promise<void>
  subscribe (topic: string, handler: (frame: string) => void): Promise<void>
  unsubscribe (topic: string): Promise<void>
  close (): Promise<void>
}

export function inboundTopic (connectionId: string): string {
  return `mcp/connection/${connectionId}/inbound`
}

export function outboundTopic (connectionId: string): string {
  return `mcp/connection/${connectionId}/outbound`
}
