/**
 * xferctl audit — import, search and export endpoint audit logs
 *
 * Subcommands:
 *   audit load   --endpoint <host>   fetch remote records into the local store
 *   audit query                      search the local store (newest first)
 *   audit dump   -o <file>           export matching records as JSON or CSV
 *
 * The local store lives at <config-root>/audit/audit.db. Time flags take
 * RFC 3339 values and are validated before anything else happens.
 */

import { Command } from 'commander';

import { DEFAULT_PROFILE, OutputFormat, createFormatter, formatRfc3339, toAuditRecordJson } from '@xferctl/kernel';
import type { AuditFilter } from '@xferctl/kernel';
import {
  DEFAULT_LOAD_LIMIT,
  DEFAULT_QUERY_LIMIT,
  dumpAuditLogs,
  loadAuditLogs,
  parseExportFormat,
  parseTimeFlag,
  queryAuditLogs,
} from '@xferctl/runtime-host';

import { formatterFor, parseLimit, runCommand, tlsProfileFor } from '../context.js';
import type { CliRuntime } from '../context.js';
import { resultColor } from '../theme.js';

interface FilterFlags {
  startTime?: string;
  endTime?: string;
  eventType?: string;
  identity?: string;
  action?: string;
  result?: string;
}

interface LoadFlags {
  endpoint: string;
  profile: string;
  startTime?: string;
  endTime?: string;
  eventType?: string;
  limit: string;
  insecure?: boolean;
  format: string;
}

interface QueryFlags extends FilterFlags {
  limit: string;
  format: string;
}

interface DumpFlags extends FilterFlags {
  output: string;
  format: string;
}

function withFilterOptions(command: Command): Command {
  return command
    .option('--start-time <time>', 'Only records at or after this time (RFC 3339)')
    .option('--end-time <time>', 'Only records at or before this time (RFC 3339)')
    .option('--event-type <type>', 'Only records of this event type')
    .option('--identity <id>', 'Only records by this identity id')
    .option('--action <action>', 'Only records with this action')
    .option('--result <result>', 'Only records with this result (success|failure)');
}

function toFilter(flags: FilterFlags): AuditFilter {
  return {
    startTime: parseTimeFlag(flags.startTime, '--start-time'),
    endTime: parseTimeFlag(flags.endTime, '--end-time'),
    eventType: flags.eventType,
    identityId: flags.identity,
    action: flags.action,
    result: flags.result,
  };
}

// ---------------------------------------------------------------------------
// audit load
// ---------------------------------------------------------------------------

function loadCommand(runtime: CliRuntime): Command {
  return new Command('load')
    .description('Fetch audit records from an endpoint into the local store')
    .requiredOption('--endpoint <hostname>', 'Endpoint hostname')
    .option('-p, --profile <name>', 'Profile whose credentials to use', DEFAULT_PROFILE)
    .option('--start-time <time>', 'Only records at or after this time (RFC 3339)')
    .option('--end-time <time>', 'Only records at or before this time (RFC 3339)')
    .option('--event-type <type>', 'Only records of this event type')
    .option('--limit <n>', 'Maximum number of records to fetch', String(DEFAULT_LOAD_LIMIT))
    .option('--insecure', 'Skip certificate verification (test servers only)')
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (flags: LoadFlags, command: Command) => {
      await runCommand(runtime, command, async (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const startTime = parseTimeFlag(flags.startTime, '--start-time');
        const endTime = parseTimeFlag(flags.endTime, '--end-time');
        const limit = parseLimit(flags.limit, '--limit');

        const result = await loadAuditLogs({
          env: runtime.env,
          profile: flags.profile,
          endpoint: flags.endpoint,
          startTime,
          endTime,
          eventType: flags.eventType,
          limit,
          transport: runtime.transport,
          tlsProfile: tlsProfileFor(ctx, flags),
          allowInsecure: flags.insecure === true,
          now: ctx.now(),
          signal: ctx.signal,
          log: ctx.log,
        });

        out.printStructured(result);
        out.printText('Loaded %d audit record(s) into %s\n', result.loaded, result.database);
      });
    });
}

// ---------------------------------------------------------------------------
// audit query
// ---------------------------------------------------------------------------

function queryCommand(runtime: CliRuntime): Command {
  return withFilterOptions(
    new Command('query').description('Search the local audit store'),
  )
    .option('--limit <n>', 'Maximum number of records to show', String(DEFAULT_QUERY_LIMIT))
    .option('-f, --format <format>', 'Output format (text|json)', 'text')
    .action(async (flags: QueryFlags, command: Command) => {
      await runCommand(runtime, command, (ctx) => {
        const out = formatterFor(ctx, flags.format);
        const filter = toFilter(flags);
        const limit = parseLimit(flags.limit, '--limit');

        const records = queryAuditLogs({ env: runtime.env, filter, limit });

        out.printStructured(records.map(toAuditRecordJson));
        if (records.length === 0) {
          out.println('No audit records found.');
          return;
        }
        out.printText('%s  %s  %s  %s  %s\n', 'TIMESTAMP'.padEnd(20), 'EVENT'.padEnd(16), 'USER'.padEnd(20), 'RESULT'.padEnd(8), 'MESSAGE');
        for (const record of records) {
          out.printText(
            '%s  %s  %s  %s  %s\n',
            formatRfc3339(record.timestamp).padEnd(20),
            record.eventType.padEnd(16),
            record.username.padEnd(20),
            resultColor(record.result)(record.result.padEnd(8)),
            record.message,
          );
        }
        out.printText('\n%d record(s)\n', records.length);
      });
    });
}

// ---------------------------------------------------------------------------
// audit dump
// ---------------------------------------------------------------------------

function dumpCommand(runtime: CliRuntime): Command {
  return withFilterOptions(
    new Command('dump').description('Export matching audit records to a file'),
  )
    .requiredOption('-o, --output <file>', 'File to write')
    .option('-f, --format <format>', 'Export format (json|csv)', 'json')
    .action(async (flags: DumpFlags, command: Command) => {
      await runCommand(runtime, command, (ctx) => {
        const format = parseExportFormat(flags.format);
        const filter = toFilter(flags);

        const result = dumpAuditLogs({ env: runtime.env, filter, format, output: flags.output });

        createFormatter(OutputFormat.Text, runtime.stdout).printText(
          'Exported %d audit record(s) to %s\n',
          result.written,
          result.output,
        );
        ctx.log.info(`export format: ${format}`);
      });
    });
}

export function auditCommand(runtime: CliRuntime): Command {
  return new Command('audit')
    .description('Import, search and export endpoint audit logs')
    .addCommand(loadCommand(runtime))
    .addCommand(queryCommand(runtime))
    .addCommand(dumpCommand(runtime));
}
