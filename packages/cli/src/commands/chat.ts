import { ChatSession } from '@tidewire/client'
import type { CommandResult } from '../output/with-output.js'
import { withGatewayClient, type ConnectDeps } from '../utils/client.js'
import type { GlobalOptions } from '../utils/options.js'
import { formatMessage } from './history.js'

const DEFAULT_REPLY_TIMEOUT = 120_000

/** Sends one message and waits for the assistant's finished reply. */
export async function runChatCommand(
  sessionKey: string,
  text: string,
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<CommandResult> {
  if (text.trim().length === 0) {
    throw new Error('Message must not be empty')
  }

  return withGatewayClient(options, deps, async (client) => {
    const session = new ChatSession({ client, sessionKey, logger: deps.logger })
    const reply = session.waitForReply({
      timeoutMs: options.replyTimeout ?? DEFAULT_REPLY_TIMEOUT,
    })
    try {
      const [, message] = await Promise.all([session.sendMessage(text), reply])
      if (!message) {
        throw new Error('Chat ended without a reply')
      }
      return { text: formatMessage(message), json: message }
    } finally {
      session.abandon()
    }
  })
}
