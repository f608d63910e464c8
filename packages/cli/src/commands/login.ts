/**
 * xferctl login — Authorization Code flow
 *
 * Prints the authorization URL, then waits for the browser redirect on
 * http://localhost:8080/callback (or, with --no-local-server, for the code
 * to be pasted on stdin). The exchanged bundle is saved under --profile.
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE, formatRfc3339, parseScopeList } from '@xferctl/kernel';
import { IdentityProviderClient, loadClientConfig, login } from '@xferctl/runtime-host';

import { formatterFor, runCommand } from '../context.js';
import type { CliRuntime } from '../context.js';

interface LoginFlags {
  profile: string;
  scopes: string;
  localServer: boolean;
  format: string;
}

export function loginCommand(runtime: CliRuntime): Command {
  return new Command('login')
    .description('Authenticate and save credentials for a profile')
    .option('-p, --profile <name>', 'Profile to save credentials under', DEFAULT_PROFILE)
    .option('--scopes <scopes>', 'Space-separated scopes to request', 'openid profile email')
    .option('--no-local-server', 'Paste the authorization code instead of running a local callback server')
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (flags: LoginFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const idp = new IdentityProviderClient(loadClientConfig(runtime.env), {
          transport: runtime.transport,
          now: ctx.now,
          log: ctx.log,
        });
        try {
          const result = await login({
            env: runtime.env,
            profile: flags.profile,
            idp,
            // Keep stdout clean for the JSON result.
            output: out.isStructured() ? runtime.stderr : runtime.stdout,
            scopes: parseScopeList(flags.scopes),
            noLocalServer: !flags.localServer,
            input: runtime.stdin,
            promptOutput: runtime.stderr,
            signal: ctx.signal,
            log: ctx.log,
          });

          out.printStructured({
            profile: result.profile,
            token_file: result.tokenFile,
            expires_at: formatRfc3339(result.bundle.expiresAt),
            scopes: result.bundle.scopes,
          });
          out.println(`Login successful. Credentials saved for profile "${result.profile}".`);
        } finally {
          idp.close();
        }
      });
    });
}
