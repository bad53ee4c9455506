export { McpClient } from './client.ts'
export type { McpClientOptions, NotificationListener, RequestOptions } from './client.ts'
export { openSseChannel, SseClientChannel, SseParser } from './sse-channel.ts'
export type { SseClientChannelOptions, SseEvent } from './sse-channel.ts'
export { spawnStdioChannel, splitCommandLine, ChildProcessChannel } from './stdio-channel.ts'
export type { SpawnChannelOptions } from './stdio-channel.ts'
export type {
  CompletionResponse,
  InitializeResponse,
  PromptList,
  PromptResponse,
  ResourceList,
  ResourceReadResponse,
  ResourceTemplateList,
  ToolCallResponse,
  ToolList
} from './schemas.ts'
