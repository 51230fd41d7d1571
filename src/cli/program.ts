/**
 * surfacewatch — CLI program
 *
 * スケジューラーから呼ばれるサブコマンド群。処理は engine に委ね、ここでは
 * 引数の検証と入出力だけを扱う。
 */

import fs from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import type { Config } from '../config.js';
import { ingestContent, ingestFile, INGEST_PARSERS } from '../engine/ingest.js';
import { createJob, deleteJob, listJobs, selectJobTargets, TARGET_FORMATS } from '../engine/jobs.js';
import {
  alertUnattended,
  cleanUnseen,
  deleteFindings,
  FINDING_FILTERS,
  purgeFindings,
  setPtimeOverride,
  setTriage,
  toFindingSelector,
} from '../engine/lifecycle.js';
import { JiraTracker } from '../engine/jira-tracker.js';
import { extractCsvAddresses, mergeCsv, removeHostsByTag } from '../engine/owner-tools.js';
import { probeResponseCodes, probeWordlist } from '../engine/prober.js';
import {
  deleteDiscovery,
  deleteTarget,
  importTargets,
  reconcileDiscoveries,
  reconcileTargets,
} from '../engine/reconciler.js';
import { closeTicket, dispatchTicket, dispatchTicketsForLevel, type IssueTracker } from '../engine/tickets.js';
import { parseTargetImport, TARGET_IMPORT_FORMATS } from '../parser/target-import-parser.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { RECORD_SETS, ZONES } from '../types/entities.js';
import { WORK_MODES } from '../types/engine.js';

export interface ProgramDeps {
  config: Config;
  openRuntime?: (config: Config) => Runtime;
  /** 標準出力への書き込み */
  write?: (text: string) => void;
  /** ファイル指定が無いときの入力 */
  readStdin?: () => string;
  /** 起票先。省略時は config.tracker から Jira を組み立てる */
  tracker?: IssueTracker;
}

const zoneSchema = z.enum(ZONES);
const modeSchema = z.enum(WORK_MODES);
const parserSchema = z.enum(INGEST_PARSERS);
const recordSetSchema = z.enum(RECORD_SETS);
const formatSchema = z.enum(TARGET_FORMATS);
const importFormatSchema = z.enum(TARGET_IMPORT_FORMATS);
const filterSchema = z.array(z.enum(FINDING_FILTERS));
const idSchema = z.coerce.number().int().positive();

interface SelectorOptions {
  name?: string;
  vulnerability?: string;
  search?: string;
  exclude?: string;
  filter: string[];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function addSelectorOptions(command: Command): Command {
  return command
    .option('--name <name>', 'host name of the findings')
    .option('--vulnerability <id>', 'vulnerability id (with --name)')
    .option('--search <regexp>', 'regex over URI, vulnerability and metadata')
    .option('--exclude <regexp>', 'regex excluding search matches')
    .option('--filter <filter>', `triage filter (${FINDING_FILTERS.join(', ')}), repeatable`, collect, []);
}

function lines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l !== '');
}

export function buildProgram(deps: ProgramDeps): Command {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const readStdin = deps.readStdin ?? (() => fs.readFileSync(0, 'utf-8'));
  const openRuntime = deps.openRuntime ?? createRuntime;
  const trackerConfig = deps.config.tracker;
  const tracker = deps.tracker ?? (trackerConfig === undefined ? undefined : new JiraTracker(trackerConfig));
  const requireTracker = (): IssueTracker => {
    if (tracker === undefined) throw new Error('issue tracker is not configured (SURFACEWATCH_JIRA_URL)');
    return tracker;
  };

  const program = new Command();
  program
    .name('surfacewatch')
    .description('Attack surface finding normalization, reconciliation and delta alerting')
    .version('0.1.0')
    .option('-v, --verbose', 'log at debug level');

  const readInput = (file: string | undefined): string =>
    file === undefined ? readStdin() : fs.readFileSync(file, 'utf-8');

  const print = (value: unknown): void => {
    write(`${typeof value === 'string' ? value : JSON.stringify(value, null, 2)}\n`);
  };

  /** 実行ごとに Runtime を開き、終わったら閉じる */
  const run = async <T>(fn: (rt: Runtime) => T | Promise<T>): Promise<T> => {
    const verbose = program.opts<{ verbose?: boolean }>().verbose === true;
    const config: Config = verbose ? { ...deps.config, logLevel: 'debug' } : deps.config;
    const rt = openRuntime(config);
    try {
      return await fn(rt);
    } finally {
      rt.close();
    }
  };

  // ------------------------------------------------------------
  // ingest
  // ------------------------------------------------------------
  program
    .command('ingest')
    .description(`Ingest scanner output (${INGEST_PARSERS.join(', ')})`)
    .argument('<parser>', 'parser for the input format')
    .argument('[file]', 'input file (stdin when omitted)')
    .option('--zone <zone>', 'external | internal', 'external')
    .option('--host <name>', 'override the host name of port scan results')
    .action(async (parserArg: string, file: string | undefined, opts: { zone: string; host?: string }) => {
      const parser = parserSchema.parse(parserArg);
      const zone = zoneSchema.parse(opts.zone);
      await run(({ ctx }) => {
        const summary =
          file === undefined
            ? ingestContent(ctx, { parser, zone, host: opts.host, content: readStdin() })
            : ingestFile(ctx, { parser, zone, host: opts.host, path: file });
        print(summary);
      });
    });

  // ------------------------------------------------------------
  // targets / discovery
  // ------------------------------------------------------------
  const targets = program.command('targets').description('Manage the target registry');
  targets
    .command('import')
    .argument('[file]', 'input file (stdin when omitted)')
    .option('--zone <zone>', 'external | internal', 'external')
    .option('--tag <tag>', 'batch tag', 'DEFAULT')
    .option('--mode <mode>', WORK_MODES.join(' | '), 'merge')
    .option('--format <format>', `names | ${TARGET_IMPORT_FORMATS.join(' | ')}`, 'names')
    .option('--owner <owner>', 'owner of crt.sh domains')
    .action(
      async (
        file: string | undefined,
        opts: { zone: string; tag: string; mode: string; format: string; owner?: string },
      ) => {
        const zone = zoneSchema.parse(opts.zone);
        const mode = modeSchema.parse(opts.mode);
        const content = readInput(file);
        if (opts.format === 'names') {
          const names = lines(content);
          await run(({ ctx }) => print(reconcileTargets(ctx, { zone, tag: opts.tag, mode, names })));
          return;
        }
        const format = importFormatSchema.parse(opts.format);
        const parsed = parseTargetImport(format, content, { tag: opts.tag, owner: opts.owner });
        await run(({ ctx }) => {
          for (const skip of parsed.skipped) {
            ctx.logger.warn({ line: skip.lineNumber, reason: skip.reason }, 'target import line skipped');
          }
          const result = importTargets(ctx, { zone, tag: opts.tag, mode, records: parsed.records });
          print({ ...result, skipped: result.skipped + parsed.skipped.length });
        });
      },
    );
  targets
    .command('delete')
    .argument('<name>')
    .option('--zone <zone>', 'external | internal', 'external')
    .action(async (name: string, opts: { zone: string }) => {
      const zone = zoneSchema.parse(opts.zone);
      await run(({ ctx }) => deleteTarget(ctx, zone, name));
    });

  const discovery = program.command('discovery').description('Manage discovery results');
  discovery
    .command('import')
    .argument('[file]', 'one name per line (stdin when omitted)')
    .option('--tag <tag>', 'batch tag', 'DEFAULT')
    .option('--mode <mode>', WORK_MODES.join(' | '), 'merge')
    .option('--owner <owner>', 'owner stored on new rows')
    .action(async (file: string | undefined, opts: { tag: string; mode: string; owner?: string }) => {
      const mode = modeSchema.parse(opts.mode);
      const names = lines(readInput(file));
      await run(({ ctx }) =>
        print(reconcileDiscoveries(ctx, { tag: opts.tag, mode, names, owner: opts.owner })),
      );
    });
  discovery
    .command('delete')
    .argument('<name>')
    .action(async (name: string) => {
      await run(({ ctx }) => deleteDiscovery(ctx, name));
    });

  // ------------------------------------------------------------
  // findings
  // ------------------------------------------------------------
  const findings = program.command('findings').description('Vulnerability finding lifecycle');
  findings
    .command('alert')
    .description('Alert findings past their due date')
    .action(async () => {
      await run(({ ctx }) => print(`alerted ${alertUnattended(ctx)}`));
    });
  findings
    .command('clean')
    .description('Delete findings not seen within the retention period')
    .option('--days <days>', 'retention in days')
    .action(async (opts: { days?: string }) => {
      const days = opts.days === undefined ? deps.config.retentionDays : idSchema.parse(opts.days);
      await run(({ ctx }) => print(`deleted ${cleanUnseen(ctx, days)}`));
    });
  findings
    .command('purge')
    .description('Delete every finding')
    .action(async () => {
      await run(({ ctx }) => print(`purged ${purgeFindings(ctx)}`));
    });
  addSelectorOptions(
    findings.command('triage').description('Set triage state').argument('<action>', 'true | false | unset'),
  ).action(async (action: string, opts: SelectorOptions) => {
    const selector = toFindingSelector(opts);
    if (selector === undefined) throw new Error('--name or --search is required');
    const filters = filterSchema.parse(opts.filter);
    await run(({ ctx }) => print(setTriage(ctx, action, selector, filters)));
  });
  addSelectorOptions(
    findings.command('ptime').description('Override the response time').argument('<code>', 'e.g. P1E'),
  ).action(async (code: string, opts: SelectorOptions) => {
    const selector = toFindingSelector(opts);
    if (selector === undefined) throw new Error('--name or --search is required');
    const filters = filterSchema.parse(opts.filter);
    await run(({ ctx }) => print(setPtimeOverride(ctx, code, selector, filters)));
  });
  addSelectorOptions(findings.command('delete').description('Delete findings')).action(
    async (opts: SelectorOptions) => {
      const filters = filterSchema.parse(opts.filter);
      await run(({ ctx }) => print(deleteFindings(ctx, toFindingSelector(opts), filters)));
    },
  );

  findings
    .command('ticket')
    .description('Open an issue tracker ticket for one finding')
    .argument('<id>', 'finding id')
    .action(async (id: string) => {
      const findingId = idSchema.parse(id);
      const issues = requireTracker();
      await run(async ({ ctx }) => {
        const key = await dispatchTicket(ctx, issues, findingId);
        print(key === undefined ? 'ticket not opened' : key);
      });
    });
  findings
    .command('ticket-level')
    .description('Open tickets for every untriaged or confirmed finding of one severity')
    .argument('<level>', 'e.g. critical')
    .action(async (level: string) => {
      const issues = requireTracker();
      await run(async ({ ctx }) => print(await dispatchTicketsForLevel(ctx, issues, level)));
    });
  findings
    .command('close-ticket')
    .argument('<id>', 'finding id')
    .action(async (id: string) => {
      const findingId = idSchema.parse(id);
      const issues = requireTracker();
      await run(async ({ ctx }) => print((await closeTicket(ctx, issues, findingId)) ? 'closed' : 'not closed'));
    });

  // ------------------------------------------------------------
  // probe
  // ------------------------------------------------------------
  /** URL はファイルから、無ければジョブの対象を URL に展開して使う */
  const probeUrls = (rt: Runtime, jobId: number, file: string | undefined): string[] =>
    file === undefined ? selectJobTargets(rt.ctx.db, jobId, 'url') : lines(readInput(file));

  const probe = program.command('probe').description('Live HTTP probes');
  probe
    .command('wordlist')
    .argument('[file]', 'base URLs, one per line (job targets when omitted)')
    .requiredOption('--job <id>', 'job id')
    .requiredOption('--dict <name>', 'word list name (<wordlist dir>/<name>.dict)')
    .action(async (file: string | undefined, opts: { job: string; dict: string }) => {
      const jobId = idSchema.parse(opts.job);
      await run(async (rt) => {
        const summary = await probeWordlist(rt.ctx, {
          jobId,
          urls: probeUrls(rt, jobId, file),
          dictionary: opts.dict,
          wordlistDir: deps.config.wordlistDir,
          timeoutMs: deps.config.probeTimeoutMs,
        });
        print(summary);
      });
    });
  probe
    .command('codes')
    .argument('[file]', 'URLs, one per line (job targets when omitted)')
    .requiredOption('--job <id>', 'job id')
    .option('--codes <codes>', 'status codes to alert on, e.g. 404,5xx', '4xx,5xx')
    .option('--dict <name>', 'label carried on alerts')
    .action(async (file: string | undefined, opts: { job: string; codes: string; dict?: string }) => {
      const jobId = idSchema.parse(opts.job);
      await run(async (rt) => {
        const summary = await probeResponseCodes(rt.ctx, {
          jobId,
          urls: probeUrls(rt, jobId, file),
          codes: opts.codes,
          dictionary: opts.dict,
          timeoutMs: deps.config.probeTimeoutMs,
        });
        print(summary);
      });
    });

  // ------------------------------------------------------------
  // jobs
  // ------------------------------------------------------------
  // ------------------------------------------------------------
  // owners
  // ------------------------------------------------------------
  const owners = program.command('owners').description('Owner ledger helpers');
  owners
    .command('merge-csv')
    .description('Concatenate ledger CSV files without their header lines')
    .argument('<files...>')
    .action((files: string[]) => {
      const merged = mergeCsv(files.map((f) => fs.readFileSync(f, 'utf-8')));
      if (merged.length > 0) print(merged.join('\n'));
    });
  owners
    .command('merge-ip')
    .description('Print the address column of ledger CSV files')
    .argument('<files...>')
    .action((files: string[]) => {
      const addresses = extractCsvAddresses(files.map((f) => fs.readFileSync(f, 'utf-8')));
      if (addresses.length > 0) print(addresses.join('\n'));
    });
  owners
    .command('remove-by-tag')
    .description('List (or with --apply delete) the hosts carrying a tag')
    .requiredOption('--tag <tag>')
    .option('--zone <zone>', 'external | internal', 'external')
    .option('--apply', 'delete the listed hosts')
    .action(async (opts: { tag: string; zone: string; apply?: boolean }) => {
      const zone = zoneSchema.parse(opts.zone);
      await run(({ ctx }) => print(removeHostsByTag(ctx, zone, opts.tag, opts.apply === true)));
    });

  const jobs = program.command('jobs').description('Manage scan jobs');
  jobs
    .command('create')
    .argument('<name>')
    .requiredOption('--input <set>', RECORD_SETS.join(' | '))
    .option('--module <module>')
    .option('--regexp <regexp>')
    .option('--exclude <regexp>')
    .option('--tag <tag>')
    .option('--info <info>')
    .action(
      async (
        name: string,
        opts: { input: string; module?: string; regexp?: string; exclude?: string; tag?: string; info?: string },
      ) => {
        const input = recordSetSchema.parse(opts.input);
        await run(({ ctx }) => print(createJob(ctx.db, { ...opts, name, input }, ctx.now())));
      },
    );
  jobs.command('list').action(async () => {
    await run(({ ctx }) => print(listJobs(ctx.db)));
  });
  jobs
    .command('delete')
    .argument('<id>')
    .action(async (id: string) => {
      const jobId = idSchema.parse(id);
      await run(({ ctx }) => deleteJob(ctx.db, jobId));
    });
  jobs
    .command('targets')
    .argument('<id>')
    .option('--format <format>', TARGET_FORMATS.join(' | '), 'host')
    .action(async (id: string, opts: { format: string }) => {
      const jobId = idSchema.parse(id);
      const format = formatSchema.parse(opts.format);
      await run(({ ctx }) => {
        const selected = selectJobTargets(ctx.db, jobId, format);
        if (selected.length > 0) print(selected.join('\n'));
      });
    });

  return program;
}
