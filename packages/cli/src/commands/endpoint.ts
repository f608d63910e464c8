/**
 * xferctl endpoint — endpoint information
 *
 *   endpoint info   API and manager versions (no credentials required)
 *   endpoint show   endpoint configuration
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE, cipherSuiteName, tlsVersionName } from '@xferctl/kernel';
import { getEndpoint, getInfo } from '@xferctl/runtime-host';
import type { ApiClient } from '@xferctl/runtime-host';

import { endpointClient, formatterFor, runCommand } from '../context.js';
import type { CliRuntime, CommandContext, EndpointFlags } from '../context.js';

interface EndpointCommandFlags extends EndpointFlags {
  format: string;
}

function withEndpointOptions(command: Command): Command {
  return command
    .requiredOption('--endpoint <hostname>', 'Endpoint hostname')
    .option('-p, --profile <name>', 'Profile whose credentials to use', DEFAULT_PROFILE)
    .option('--insecure', 'Skip certificate verification (test servers only)')
    .option('-f, --format <format>', 'Output format (text|json)', 'text');
}

function logTlsProfile(ctx: CommandContext, client: ApiClient): void {
  const profile = client.tlsProfile;
  ctx.log.info(`TLS minimum version: ${tlsVersionName(profile.minVersion)}`);
  ctx.log.info(`TLS cipher suites: ${profile.cipherSuites.map(cipherSuiteName).join(', ')}`);
}

function infoCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('info').description('Show endpoint API version information'))
    .action(async (flags: EndpointCommandFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags, false);
        try {
          const info = await getInfo(client, ctx.signal);
          out.printStructured(info);
          out.printText('%s%s\n', 'API Version:'.padEnd(20), info.api_version);
          out.printText('%s%s\n', 'Endpoint ID:'.padEnd(20), info.endpoint_id);
          out.printText('%s%s\n', 'Manager Version:'.padEnd(20), info.manager_version);
        } finally {
          client.close();
        }
      });
    });
}

function showCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('show').description('Show endpoint configuration'))
    .action(async (flags: EndpointCommandFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags);
        try {
          logTlsProfile(ctx, client);
          const endpoint = await getEndpoint(client, ctx.signal);
          out.printStructured(endpoint);

          const rows: Array<[string, string | undefined]> = [
            ['ID:', endpoint.id],
            ['Display Name:', endpoint.display_name],
            ['Organization:', endpoint.organization],
            ['Department:', endpoint.department],
            ['Description:', endpoint.description],
            ['Contact Email:', endpoint.contact_email],
            ['Info Link:', endpoint.info_link],
            ['Public:', endpoint.public === undefined ? undefined : String(endpoint.public)],
            ['Network Use:', endpoint.network_use],
            ['Keywords:', endpoint.keywords?.join(', ')],
          ];
          for (const [label, value] of rows) {
            if (value !== undefined && value !== '') {
              out.printText('%s%s\n', label.padEnd(20), value);
            }
          }
        } finally {
          client.close();
        }
      });
    });
}

export function endpointCommand(runtime: CliRuntime): Command {
  return new Command('endpoint')
    .description('Endpoint information')
    .addCommand(infoCommand(runtime))
    .addCommand(showCommand(runtime));
}
