/**
 * xferctl whoami — show the identity behind a profile's token.
 *
 * An expired token fails with TokenExpired before any network call,
 * unless --refresh is given and the bundle carries a refresh credential.
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE, formatRfc3339 } from '@xferctl/kernel';
import { IdentityProviderClient, loadClientConfig, whoami } from '@xferctl/runtime-host';

import { formatterFor, runCommand } from '../context.js';
import type { CliRuntime } from '../context.js';

interface WhoamiFlags {
  profile: string;
  format: string;
  refresh?: boolean;
}

export function whoamiCommand(runtime: CliRuntime): Command {
  return new Command('whoami')
    .description('Show the authenticated identity for a profile')
    .option('-p, --profile <name>', 'Profile to inspect', DEFAULT_PROFILE)
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .option('--refresh', 'Refresh an expired token instead of failing')
    .action(async (flags: WhoamiFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const idp = new IdentityProviderClient(loadClientConfig(runtime.env), {
          transport: runtime.transport,
          now: ctx.now,
          log: ctx.log,
        });
        try {
          const { identity, bundle } = await whoami({
            env: runtime.env,
            profile: flags.profile,
            idp,
            now: ctx.now(),
            refresh: flags.refresh === true,
            signal: ctx.signal,
            log: ctx.log,
          });
          const expires = formatRfc3339(bundle.expiresAt);

          out.printStructured({
            username: identity.username ?? '',
            email: identity.email ?? '',
            name: identity.name ?? '',
            sub: identity.subject ?? '',
            profile: flags.profile,
            expires_at: expires,
            scopes: bundle.scopes,
            resource_server: bundle.resourceServer,
          });

          out.println('Authenticated User Information:');
          out.println();
          if (identity.name !== undefined && identity.name !== '') {
            out.printText('Name:     %s\n', identity.name);
          }
          if (identity.username !== undefined && identity.username !== '') {
            out.printText('Username: %s\n', identity.username);
          }
          if (identity.email !== undefined && identity.email !== '') {
            out.printText('Email:    %s\n', identity.email);
          }
          out.printText('ID:       %s\n', identity.subject ?? '');
          out.printText('Profile:  %s\n', flags.profile);
          out.printText('Expires:  %s\n', expires);
        } finally {
          idp.close();
        }
      });
    });
}
