/**
 * Command wrapper for automatic output rendering.
 *
 * Wraps command handlers so each one returns a result instead of writing to
 * the terminal itself. Errors go to stderr and end the process with code 1.
 */

import chalk from 'chalk'
import { Command } from 'commander'
import { toErrorMessage } from '@tidewire/client'
import { parseGlobalOptions, type GlobalOptions } from '../utils/options.js'

/** What a command hands back: a human rendering and a JSON one. */
export interface CommandResult {
  text: string
  json: unknown
}

export interface CliIo {
  stdout: (text: string) => void
  stderr: (text: string) => void
  exit: (code: number) => void
}

export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  },
  exit: (code) => {
    process.exit(code)
  },
}

export interface KeyValueRow {
  key: string
  value: string
}

export function renderRows(rows: KeyValueRow[]): string {
  const width = Math.max(0, ...rows.map((row) => row.key.length))
  return rows.map((row) => `${chalk.bold(row.key.padEnd(width))}  ${row.value}`).join('\n')
}

export function render(result: CommandResult, options: Pick<GlobalOptions, 'json'>): string {
  return options.json ? JSON.stringify(result.json, null, 2) : result.text
}

/**
 * Wrap a command handler to automatically render output.
 *
 * Commander calls actions with the positional arguments, then the options,
 * then the command itself; the handler gets the positionals and the merged
 * global options.
 */
export function withOutput(
  handler: (args: string[], options: GlobalOptions) => Promise<CommandResult>,
  io: CliIo = processIo
): (...actionArgs: unknown[]) => Promise<void> {
  return async (...actionArgs) => {
    const command = actionArgs.at(-1)
    if (!(command instanceof Command)) {
      throw new Error('withOutput must wrap a commander action')
    }

    let json = false
    try {
      const options = parseGlobalOptions(command.optsWithGlobals())
      json = options.json ?? false
      const result = await handler(command.args, options)
      const output = render(result, options)
      if (output) {
        io.stdout(output + '\n')
      }
    } catch (error) {
      const message = toErrorMessage(error)
      io.stderr(
        (json ? JSON.stringify({ error: message }, null, 2) : chalk.red(`Error: ${message}`)) + '\n'
      )
      io.exit(1)
    }
  }
}
