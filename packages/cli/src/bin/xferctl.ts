#!/usr/bin/env node
/**
 * bin/xferctl.ts — entry point for the `xferctl` command.
 *
 * Reads the environment once, wires SIGINT to cancellation, and runs the
 * program. A second SIGINT falls through to Node's default handler.
 */

import { readEnv } from '@xferctl/runtime-host'

import { runProgram } from '../commands/index.js'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

await runProgram(
  {
    env: readEnv(),
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    signal: controller.signal,
    setExitCode: (code) => { process.exitCode = code },
  },
  process.argv.slice(2),
)
