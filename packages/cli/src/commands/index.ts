/**
 * commands/index.ts — Commander program, configured and returned without parsing.
 *
 * Imported by:
 *   src/bin/xferctl.ts   (the `xferctl` binary)
 *   test/*.test.ts       (with an in-memory runtime)
 */

import { Command, CommanderError } from 'commander'

import type { CliRuntime } from '../context.js'
import { auditCommand } from './audit.js'
import { endpointCommand } from './endpoint.js'
import { loginCommand } from './login.js'
import { logoutCommand } from './logout.js'
import { roleCommand } from './role.js'
import { whoamiCommand } from './whoami.js'

export const VERSION = '0.1.0'

/** Apply exitOverride and output routing to a command and all its descendants. */
function configureTree(command: Command, runtime: CliRuntime): void {
  command
    .exitOverride()
    .configureOutput({
      writeOut: (s) => { runtime.stdout.write(s) },
      writeErr: (s) => { runtime.stderr.write(s) },
    })
  for (const sub of command.commands) {
    configureTree(sub, runtime)
  }
}

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command('xferctl')
    .description(
      'xferctl — administrative client for data-transfer endpoint management APIs.\n' +
      'Run `xferctl login` once, then pass --endpoint <hostname> to endpoint commands.',
    )
    .version(VERSION)
    .option('--verbose', 'Show progress messages on stderr')
    .option('--debug', 'Show debug messages on stderr (implies --verbose)')

  program.addCommand(loginCommand(runtime))
  program.addCommand(logoutCommand(runtime))
  program.addCommand(whoamiCommand(runtime))
  program.addCommand(auditCommand(runtime))
  program.addCommand(endpointCommand(runtime))
  program.addCommand(roleCommand(runtime))

  configureTree(program, runtime)
  return program
}

/**
 * Parse argv and run the selected command. Usage errors from commander are
 * mapped to its own exit code (1 for errors, 0 for --help/--version).
 */
export async function runProgram(runtime: CliRuntime, argv: ReadonlyArray<string>): Promise<void> {
  const program = createProgram(runtime)
  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) {
      runtime.setExitCode(err.exitCode)
      return
    }
    throw err
  }
}
