import { isJsonObject, type JsonObject } from '@tidewire/client'
import type { CommandResult } from '../output/with-output.js'
import { withGatewayClient, type ConnectDeps } from '../utils/client.js'
import type { GlobalOptions } from '../utils/options.js'

export const SESSIONS_LIST_METHOD = 'sessions.list'

function formatSession(session: JsonObject): string {
  const key = typeof session.key === 'string' ? session.key : '?'
  const label = typeof session.label === 'string' ? session.label : ''
  const preview = typeof session.lastMessagePreview === 'string' ? session.lastMessagePreview : ''
  return [key, label, preview].filter((part) => part.length > 0).join('  ')
}

export async function runSessionsCommand(
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<CommandResult> {
  return withGatewayClient(options, deps, async (client) => {
    const payload = await client.request(SESSIONS_LIST_METHOD)
    const sessions =
      isJsonObject(payload) && Array.isArray(payload.sessions)
        ? payload.sessions.filter(isJsonObject)
        : []
    return {
      text: sessions.length > 0 ? sessions.map(formatSession).join('\n') : 'No sessions',
      json: sessions,
    }
  })
}
