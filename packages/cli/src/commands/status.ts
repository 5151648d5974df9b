import { isJsonObject, type JsonObject, type JsonValue } from '@tidewire/client'
import { renderRows, type CommandResult, type KeyValueRow } from '../output/with-output.js'
import { resolveCliConfig, withGatewayClient, type ConnectDeps } from '../utils/client.js'
import type { GlobalOptions } from '../utils/options.js'

export const HEALTH_METHOD = 'health'

interface GatewayStatus {
  url: string
  status: 'connected'
  protocol: number | null
  serverVersion: string | null
  serverHost: string | null
  methods: string[]
  health: JsonValue
}

function readString(value: JsonValue | undefined): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null
}

function readMethods(features: JsonValue | undefined): string[] {
  if (!isJsonObject(features) || !Array.isArray(features.methods)) {
    return []
  }
  return features.methods.filter((method): method is string => typeof method === 'string')
}

function toRows(status: GatewayStatus): KeyValueRow[] {
  return [
    { key: 'URL', value: status.url },
    { key: 'Status', value: status.status },
    { key: 'Protocol', value: status.protocol === null ? '-' : String(status.protocol) },
    { key: 'Server', value: status.serverVersion ?? '-' },
    { key: 'Host', value: status.serverHost ?? '-' },
    { key: 'Methods', value: status.methods.length > 0 ? status.methods.join(', ') : '-' },
    { key: 'Health', value: JSON.stringify(status.health) },
  ]
}

export async function runStatusCommand(
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<CommandResult> {
  const url = resolveCliConfig(options, deps.env ?? process.env).url

  return withGatewayClient(options, deps, async (client) => {
    const hello: JsonObject = client.serverHello ?? {}
    const server: JsonObject = isJsonObject(hello.server) ? hello.server : {}
    const status: GatewayStatus = {
      url,
      status: 'connected',
      protocol: typeof hello.protocol === 'number' ? hello.protocol : null,
      serverVersion: readString(server.version),
      serverHost: readString(server.host),
      methods: readMethods(hello.features),
      health: await client.request(HEALTH_METHOD),
    }
    return { text: renderRows(toRows(status)), json: status }
  })
}
