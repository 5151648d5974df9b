import {
  GatewayClient,
  createChildLogger,
  createDemoTransportFactory,
  createRootLogger,
  loadGatewayConfig,
  parseGatewayConfig,
  resolveLogConfig,
  type GatewayConfig,
  type GatewayTransportFactory,
  type Logger,
} from '@tidewire/client'
import type { GlobalOptions } from './options.js'

export const DEMO_GATEWAY_URL = 'ws://demo.tidewire.invalid'
const DEFAULT_TIMEOUT = 5000

export interface ConnectDeps {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  transportFactory?: GatewayTransportFactory
}

/**
 * The demo gateway needs no config file or credentials; everything else goes
 * through the usual file, environment, flag layering.
 */
export function resolveCliConfig(options: GlobalOptions, env: NodeJS.ProcessEnv): GatewayConfig {
  if (options.demo) {
    return parseGatewayConfig({ url: options.url ?? DEMO_GATEWAY_URL })
  }
  return loadGatewayConfig({
    configPath: options.config,
    env,
    overrides: {
      url: options.url,
      token: options.token,
      password: options.password,
    },
  })
}

// Connection chatter stays quiet unless TIDEWIRE_LOG or the config file asks for it.
function createCliLogger(config: GatewayConfig, env: NodeJS.ProcessEnv): Logger {
  const logConfig = resolveLogConfig({ level: 'warn', ...config.log }, env)
  return createChildLogger(createRootLogger(logConfig), 'cli')
}

/**
 * Create and connect a gateway client.
 * Returns the connected client or throws if connection fails.
 */
export async function connectToGateway(
  options: GlobalOptions,
  deps: ConnectDeps = {}
): Promise<GatewayClient> {
  const env = deps.env ?? process.env
  const config = resolveCliConfig(options, env)
  const timeout = options.timeout ?? DEFAULT_TIMEOUT

  const client = new GatewayClient({
    config,
    logger: deps.logger ?? createCliLogger(config, env),
    transportFactory:
      deps.transportFactory ?? (options.demo ? createDemoTransportFactory() : undefined),
  })

  let timer: ReturnType<typeof setTimeout> | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Connection timeout after ${timeout}ms`))
    }, timeout)
  })

  try {
    await Promise.race([client.connect(), timeoutPromise])
    return client
  } catch (err) {
    client.disconnect()
    throw err
  } finally {
    clearTimeout(timer)
  }
}

/** Connects, runs `fn`, and always disconnects afterwards. */
export async function withGatewayClient<T>(
  options: GlobalOptions,
  deps: ConnectDeps,
  fn: (client: GatewayClient) => Promise<T>
): Promise<T> {
  const client = await connectToGateway(options, deps)
  try {
    return await fn(client)
  } finally {
    client.disconnect()
  }
}
