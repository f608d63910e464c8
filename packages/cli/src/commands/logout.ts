/**
 * xferctl logout — delete the saved credentials for a profile.
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE } from '@xferctl/kernel';
import { logout } from '@xferctl/runtime-host';

import { formatterFor, runCommand } from '../context.js';
import type { CliRuntime } from '../context.js';

interface LogoutFlags {
  profile: string;
  format: string;
}

export function logoutCommand(runtime: CliRuntime): Command {
  return new Command('logout')
    .description('Remove saved credentials for a profile')
    .option('-p, --profile <name>', 'Profile to log out', DEFAULT_PROFILE)
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (flags: LogoutFlags, command: Command) => {
      await runCommand(runtime, command, (ctx) => {
        const out = formatterFor(ctx, flags.format);
        logout({ env: runtime.env, profile: flags.profile, log: ctx.log });
        out.printStructured({ profile: flags.profile, logged_out: true });
        out.println(`Logged out of profile "${flags.profile}".`);
      });
    });
}
