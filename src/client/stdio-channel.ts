import { spawn } from 'node:child_process'
import type { ChildProcess } from 'node:child_process'
import { once } from 'node:events'
import { TransportError } from '../errors.ts'
import { StdioChannel } from '../transports/stdio.ts'
import type { Channel } from '../transports/transport.ts'

export interface SpawnChannelOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /**
   * What to do with the server's stderr. Defaults to `inherit`.
   */
  stderr?: 'inherit' | 'ignore'
}

/**
 * Channel to a server started as a child process, speaking over its stdio.
 */
export class ChildProcessChannel implements Channel {
  readonly id: string
  private readonly child: ChildProcess
  private readonly stdio: StdioChannel
  private closed = false

  constructor (child: ChildProcess, stdio: StdioChannel) {
    this.child = child
    this.stdio = stdio
    this.id = stdio.id
  }

  send (frame: string): Promise<void> {
    return this.stdio.send(frame)
  }

  receive (): AsyncIterable<string> {
    return this.stdio.receive()
  }

  /**
   * Closes the server's stdin and waits for it to exit.
   */
  async close (): Promise<void> {
    if (this.closed) {
      return
    }
    this.closed = true
    await this.stdio.close()
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return
    }
    const exited = once(this.child, 'exit')
    this.child.stdin?.end()
    const timer = setTimeout(() => {
      this.child.kill('SIGTERM')
    }, 2000)
    timer.unref()
    await exited
    clearTimeout(timer)
  }
}

/**
 * Splits a command line on whitespace, honouring single and double quotes.
 */
export function splitCommandLine (commandLine: string): string[] {
  const words: string[] = []
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g
  for (const match of commandLine.matchAll(pattern)) {
    words.push(match[1] ?? match[2] ?? match[3] ?? '')
  }
  return words
}

export async function spawnStdioChannel (commandLine: string, options: SpawnChannelOptions = {}): Promise<ChildProcessChannel> {
  const [command, ...args] = splitCommandLine(commandLine)
  if (command === undefined) {
    throw new TransportError('Empty server command')
  }

  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    stdio: ['pipe', 'pipe', options.stderr ?? 'inherit']
  })

  const { stdin, stdout } = child
  if (stdin === null || stdout === null) {
    child.kill()
    throw new TransportError(`Cannot open the stdio of ${command}`)
  }

  await new Promise<void>((resolve, reject) => {
    child.once('spawn', () => {
      resolve()
    })
    child.once('error', error => {
      reject(new TransportError(`Cannot start ${command}: ${error.message}`, { cause: error }))
    })
  })

  return new ChildProcessChannel(child, new StdioChannel({ input: stdout, output: stdin }))
}
