import chalk from 'chalk'
import { ChatSession, type Message } from '@tidewire/client'
import type { CommandResult } from '../output/with-output.js'
import { withGatewayClient, type ConnectDeps } from '../utils/client.js'
import type { GlobalOptions } from '../utils/options.js'

const ROLE_COLORS = {
  user: chalk.cyan,
  assistant: chalk.green,
  system: chalk.yellow,
} satisfies Record<Message['role'], (text: string) => string>

export function formatMessage(message: Message): string {
  return `${ROLE_COLORS[message.role](`${message.role}:`)} ${message.content}`
}

export async function runHistoryCommand(
  sessionKey: string,
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<CommandResult> {
  return withGatewayClient(options, deps, async (client) => {
    const session = new ChatSession({ client, sessionKey, logger: deps.logger })
    const transcript = await session.loadHistory()
    return {
      text: transcript.length > 0 ? transcript.map(formatMessage).join('\n') : 'No messages',
      json: transcript,
    }
  })
}
