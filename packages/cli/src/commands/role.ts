/**
 * xferctl role — manage endpoint and collection roles
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE, InvalidArgumentError } from '@xferctl/kernel';
import type { OutputFormatter } from '@xferctl/kernel';
import { createRole, deleteRole, getRole, listRoles } from '@xferctl/runtime-host';
import type { Role } from '@xferctl/runtime-host';

import { endpointClient, formatterFor, runCommand } from '../context.js';
import type { CliRuntime, EndpointFlags } from '../context.js';

interface RoleFlags extends EndpointFlags {
  format: string;
}

interface ListFlags extends RoleFlags {
  collection?: string;
  principal?: string;
}

interface CreateFlags extends RoleFlags {
  principal: string;
  role: string;
  collection?: string;
}

const ROLE_NAMES: ReadonlyArray<string> = ['administrator', 'access_manager', 'activity_manager', 'activity_monitor'];

function withEndpointOptions(command: Command): Command {
  return command
    .requiredOption('--endpoint <hostname>', 'Endpoint hostname')
    .option('-p, --profile <name>', 'Profile whose credentials to use', DEFAULT_PROFILE)
    .option('--insecure', 'Skip certificate verification (test servers only)')
    .option('-f, --format <format>', 'Output format (text|json)', 'text');
}

function printRole(out: OutputFormatter, role: Role): void {
  out.printText('%s%s\n', 'ID:'.padEnd(14), role.id ?? '');
  out.printText('%s%s\n', 'Role:'.padEnd(14), role.role ?? '');
  out.printText('%s%s\n', 'Principal:'.padEnd(14), role.principal ?? '');
  if (role.collection !== undefined && role.collection !== '') {
    out.printText('%s%s\n', 'Collection:'.padEnd(14), role.collection);
  }
}

function listCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('list').description('List roles'))
    .option('--collection <id>', 'Only roles on this collection')
    .option('--principal <urn>', 'Only roles granted to this principal')
    .action(async (flags: ListFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags);
        try {
          const list = await listRoles(client, {
            collection: flags.collection,
            principal: flags.principal,
            signal: ctx.signal,
          });
          out.printStructured(list);
          if (list.data.length === 0) {
            out.println('No roles found.');
            return;
          }
          out.printText('%s  %s  %s\n', 'ID'.padEnd(36), 'ROLE'.padEnd(18), 'PRINCIPAL');
          for (const role of list.data) {
            out.printText('%s  %s  %s\n', (role.id ?? '').padEnd(36), (role.role ?? '').padEnd(18), role.principal ?? '');
          }
        } finally {
          client.close();
        }
      });
    });
}

function showCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('show').description('Show one role').argument('<role-id>', 'Role id'))
    .action(async (roleId: string, flags: RoleFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags);
        try {
          const role = await getRole(client, roleId, ctx.signal);
          out.printStructured(role);
          printRole(out, role);
        } finally {
          client.close();
        }
      });
    });
}

function createCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('create').description('Grant a role'))
    .requiredOption('--principal <urn>', 'Identity or group to grant the role to')
    .requiredOption('--role <role>', `Role name (${ROLE_NAMES.join('|')})`)
    .option('--collection <id>', 'Collection to scope the role to (endpoint-wide when omitted)')
    .action(async (flags: CreateFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        if (!ROLE_NAMES.includes(flags.role)) {
          throw new InvalidArgumentError(`Unknown role "${flags.role}" (expected ${ROLE_NAMES.join(', ')}).`);
        }
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags);
        try {
          const role = await createRole(
            client,
            { principal: flags.principal, role: flags.role, collection: flags.collection },
            ctx.signal,
          );
          out.printStructured(role);
          printRole(out, role);
        } finally {
          client.close();
        }
      });
    });
}

function deleteCommand(runtime: CliRuntime): Command {
  return withEndpointOptions(new Command('delete').description('Delete a role').argument('<role-id>', 'Role id'))
    .action(async (roleId: string, flags: RoleFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const client = endpointClient(ctx, flags);
        try {
          await deleteRole(client, roleId, ctx.signal);
          out.printStructured({ id: roleId, deleted: true });
          out.println(`Role ${roleId} deleted.`);
        } finally {
          client.close();
        }
      });
    });
}

export function roleCommand(runtime: CliRuntime): Command {
  return new Command('role')
    .description('Manage endpoint and collection roles')
    .addCommand(listCommand(runtime))
    .addCommand(showCommand(runtime))
    .addCommand(createCommand(runtime))
    .addCommand(deleteCommand(runtime));
}
