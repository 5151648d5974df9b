import { Command } from 'commander'
import { createRequire } from 'node:module'
import { z } from 'zod'
import { runCallCommand } from './commands/call.js'
import { runChatCommand } from './commands/chat.js'
import { runHistoryCommand } from './commands/history.js'
import { runSessionsCommand } from './commands/sessions.js'
import { runStatusCommand } from './commands/status.js'
import { processIo, withOutput, type CliIo } from './output/with-output.js'
import type { ConnectDeps } from './utils/client.js'

const require = createRequire(import.meta.url)

const CliPackageJsonSchema = z.object({ version: z.string().trim().min(1) })

function resolveCliVersion(): string {
  const result = CliPackageJsonSchema.safeParse(require('../package.json'))
  if (result.success) {
    return result.data.version
  }
  throw new Error('Unable to resolve @tidewire/cli version from package.json.')
}

const VERSION = resolveCliVersion()

export interface CliDeps extends ConnectDeps {
  io?: CliIo
}

export function createCli(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIo
  const program = new Command()

  program
    .name('tidewire')
    .description('Tidewire CLI - talk to an assistant gateway from the command line')
    .version(VERSION, '-v, --version', 'output the version number')
    .option('--url <url>', 'gateway URL (ws:// or wss://), overrides TIDEWIRE_URL')
    .option('--token <token>', 'auth token, preferred over a password')
    .option('--password <password>', 'auth password')
    .option('--config <path>', 'config file (default: $TIDEWIRE_HOME/config.json)')
    .option('--demo', 'use the built-in demo gateway instead of a real one')
    .option('--timeout <ms>', 'connection timeout in milliseconds', '5000')
    .option('--json', 'output in JSON format')

  program
    .command('status')
    .description('Connect, report the server hello and check health')
    .action(withOutput((_args, options) => runStatusCommand(options, deps), io))

  program
    .command('sessions')
    .description('List sessions known to the gateway')
    .action(withOutput((_args, options) => runSessionsCommand(options, deps), io))

  program
    .command('history')
    .description('Print the transcript of a session, heartbeats filtered out')
    .argument('<sessionKey>', 'session to read')
    .action(
      withOutput(([sessionKey = ''], options) => runHistoryCommand(sessionKey, options, deps), io)
    )

  program
    .command('chat')
    .description('Send a message and print the assistant reply once it finishes streaming')
    .argument('<sessionKey>', 'session to talk in')
    .argument('<message>', 'message text')
    .option('--reply-timeout <ms>', 'how long to wait for the reply', '120000')
    .action(
      withOutput(
        ([sessionKey = '', message = ''], options) =>
          runChatCommand(sessionKey, message, options, deps),
        io
      )
    )

  program
    .command('call')
    .description('Send a raw request and print the response payload')
    .argument('<method>', 'RPC method name')
    .argument('[params]', 'params as a JSON object')
    .action(
      withOutput(
        ([method = '', params], options) => runCallCommand(method, params, options, deps),
        io
      )
    )

  return program
}
