import { isJsonObject, type JsonObject } from '@tidewire/client'
import type { CommandResult } from '../output/with-output.js'
import { withGatewayClient, type ConnectDeps } from '../utils/client.js'
import type { GlobalOptions } from '../utils/options.js'

export function parseParams(raw: string | undefined): JsonObject | undefined {
  if (raw === undefined) {
    return undefined
  }
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new Error(`Params must be valid JSON: ${raw}`)
  }
  if (!isJsonObject(parsed)) {
    throw new Error('Params must be a JSON object')
  }
  return parsed
}

/** Raw RPC: sends any method and prints the response payload. */
export async function runCallCommand(
  method: string,
  rawParams: string | undefined,
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<CommandResult> {
  const params = parseParams(rawParams)
  return withGatewayClient(options, deps, async (client) => {
    const payload = await client.request(method, params)
    return { text: JSON.stringify(payload, null, 2), json: payload }
  })
}
