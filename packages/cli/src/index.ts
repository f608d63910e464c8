/**
 * @xferctl/cli
 *
 * Programmatic entry to the xferctl command tree. The binary lives in
 * bin/xferctl.ts.
 */

export { VERSION, createProgram, runProgram } from './commands/index.js'
export type { CliRuntime, CommandContext, GlobalOptions } from './context.js'
export { reportError, runCommand } from './context.js'
export { Logger } from './logger.js'
export type { LoggerOptions } from './logger.js'
