#!/usr/bin/env node
/**
 * preprint-shelf CLI
 *
 * Usage (via tsx):
 *   tsx src/commands/shelf.ts info
 *   tsx src/commands/shelf.ts add <id-or-url>... [--tag ml]...
 *   tsx src/commands/shelf.ts remove <id-or-url>...
 *   tsx src/commands/shelf.ts update
 *   tsx src/commands/shelf.ts download [--save-path DIR] [--article ID]... [--no-check]
 *   tsx src/commands/shelf.ts import-pocket --file export.csv [--tag t]...
 *   tsx src/commands/shelf.ts import-file --file ids.txt [--sep ,] [--tag t]...
 *   tsx src/commands/shelf.ts dump-shiori [--address URL --user NAME --password PW]
 *   tsx src/commands/shelf.ts upload-shiori [--prune] [--dry-run] [--address URL --user NAME --password PW]
 *
 * Global options: --db-path FILE.json, --ids-per-request N
 */

import fs from 'node:fs';

import {
  flagValue,
  flagValues,
  hasFlag,
  intFlag,
  parseArgs,
  rejectUnknownFlags,
  UsageError,
  type ParsedArgs,
} from '../lib/args.js';
import { parseArxivRef } from '../lib/arxiv.js';
import { loadConfig } from '../lib/config.js';
import { parsePocketCsv, parseIdList } from '../lib/imports.js';
import { addPreprints, refreshPreprints, removePreprints, resolveRefs, summarizeStore, type AddResult } from '../lib/library.js';
import { runPdfDownloads } from '../lib/runners/download-pdfs.js';
import { loginShiori, type ShioriCredentials, type ShioriSession } from '../lib/shiori/client.js';
import { resolveUserPath } from '../lib/storage.js';
import { openStore, saveStore, type Store } from '../lib/store.js';
import { runDump } from '../lib/sync/dump.js';
import { runUpload } from '../lib/sync/upload.js';
import type { AppConfig } from '../lib/types.js';

const USAGE = `Usage: preprint-shelf <command> [args] [--flags]

Commands:
  info                                   summary of the local DB
  add <id-or-url>... [--tag t]...        add preprints
  remove <id-or-url>...                  remove preprints
  update                                 refresh metadata of every preprint
  download [--save-path DIR] [--article ID]... [--no-check]
  import-pocket --file CSV [--tag t]...  add arXiv links from a Pocket export
  import-file --file TXT [--sep ,] [--tag t]...
  dump-shiori                            Shiori bookmarks -> local DB
  upload-shiori [--prune] [--dry-run]    local DB -> Shiori bookmarks

Options:
  --db-path FILE.json        overrides storage.dbPath
  --ids-per-request N        overrides arxiv.idsPerRequest (1-100)
  --address, --user, --password   Shiori login, overrides config.yml`;

const BOOLEAN_FLAGS = ['prune', 'dry-run', 'no-check', 'help'] as const;
const GLOBAL_FLAGS = ['db-path', 'ids-per-request', 'help'] as const;
const SHIORI_FLAGS = ['address', 'user', 'password'] as const;

interface Context {
  config: AppConfig;
  store: Store;
  args: ParsedArgs;
}

// ── Helpers ────────────────────────────────────────────────────────────

function loadContext(args: ParsedArgs): Context {
  const config = loadConfig(process.cwd());

  const dbPath = flagValue(args, 'db-path');
  if (dbPath !== undefined) config.storage.dbPath = resolveUserPath(dbPath);

  const idsPerRequest = intFlag(args, 'ids-per-request');
  if (idsPerRequest !== undefined) {
    if (idsPerRequest < 1 || idsPerRequest > 100) throw new UsageError('--ids-per-request must be between 1 and 100');
    config.arxiv.idsPerRequest = idsPerRequest;
  }

  return { config, store: openStore(config.storage.dbPath), args };
}

function libraryOptions(ctx: Context) {
  return {
    idsPerRequest: ctx.config.arxiv.idsPerRequest,
    delayMs: ctx.config.arxiv.politenessDelayMs,
    tags: flagValues(ctx.args, 'tag'),
  };
}

function reportAdd(ctx: Context, res: AddResult): number {
  if (res.added.length > 0) saveStore(ctx.store);
  for (const input of res.invalid) console.warn(`Not an arXiv id or URL: ${input}`);
  for (const id of res.notFound) console.warn(`Not found on arXiv: ${id}`);
  console.log(`Added ${res.added.length} preprints (${res.alreadyKnown.length} already in DB). Total: ${ctx.store.records.size}`);
  return res.invalid.length + res.notFound.length > 0 ? 1 : 0;
}

function readInputFile(ctx: Context): string {
  const file = flagValue(ctx.args, 'file');
  if (!file) throw new UsageError('--file is required');
  return fs.readFileSync(resolveUserPath(file), 'utf8');
}

async function shioriSession(ctx: Context): Promise<{ session: ShioriSession; settings: AppConfig['shiori'] }> {
  const settings = ctx.config.shiori;
  const creds: Partial<ShioriCredentials> = {
    address: flagValue(ctx.args, 'address') ?? settings?.address,
    username: flagValue(ctx.args, 'user') ?? settings?.username,
    password: flagValue(ctx.args, 'password') ?? settings?.password,
  };
  const { address, username, password } = creds;
  if (!address || !username || !password) {
    throw new UsageError('Shiori address, user and password are required (config.yml "shiori" section or --address/--user/--password)');
  }
  const session = await loginShiori({ address, username, password });
  console.log(`Logged in to Shiori at ${session.address}`);
  return { session, settings };
}

// ── Commands ───────────────────────────────────────────────────────────

function cmdInfo(ctx: Context): number {
  const s = summarizeStore(ctx.store);
  console.log(`DB: ${ctx.store.path}`);
  console.log(`${s.count} preprints`);
  if (s.oldest && s.newest) console.log(`Published: ${s.oldest.slice(0, 10)} .. ${s.newest.slice(0, 10)}`);
  if (s.tags.length > 0) console.log(`Tags: ${s.tags.map((t) => `${t.tag} (${t.count})`).join(', ')}`);
  return 0;
}

async function cmdAdd(ctx: Context): Promise<number> {
  const inputs = ctx.args.positional.slice(1);
  if (inputs.length === 0) throw new UsageError('add needs at least one arXiv id or URL');
  return reportAdd(ctx, await addPreprints(ctx.store, inputs, libraryOptions(ctx)));
}

function cmdRemove(ctx: Context): number {
  const inputs = ctx.args.positional.slice(1);
  if (inputs.length === 0) throw new UsageError('remove needs at least one arXiv id or URL');

  const res = removePreprints(ctx.store, inputs);
  if (res.removed.length > 0) saveStore(ctx.store);
  for (const input of res.invalid) console.warn(`Not an arXiv id or URL: ${input}`);
  for (const id of res.unknown) console.warn(`Not in DB: ${id}`);
  console.log(`Removed ${res.removed.length} preprints. Total: ${ctx.store.records.size}`);
  return res.invalid.length + res.unknown.length > 0 ? 1 : 0;
}

async function cmdUpdate(ctx: Context): Promise<number> {
  const res = await refreshPreprints(ctx.store, libraryOptions(ctx));
  if (res.refreshed.length > 0) saveStore(ctx.store);
  for (const id of res.notFound) console.warn(`Not found on arXiv: ${id}`);
  console.log(`Refreshed ${res.refreshed.length} preprints, ${res.newVersions.length} with a new version`);
  return res.notFound.length > 0 ? 1 : 0;
}

async function cmdDownload(ctx: Context): Promise<number> {
  const folder = resolveUserPath(flagValue(ctx.args, 'save-path') ?? ctx.config.storage.pdfDir);
  const articles = flagValues(ctx.args, 'article');

  let failed = 0;
  let ids: string[] | undefined;
  if (articles.length > 0) {
    const added = await addPreprints(ctx.store, articles, libraryOptions(ctx));
    failed += reportAdd(ctx, added);
    ids = resolveRefs(articles).ids;
  }

  const res = await runPdfDownloads({
    store: ctx.store,
    folder,
    ids,
    checkExisting: !hasFlag(ctx.args, 'no-check'),
  });
  for (const id of res.unknown) console.warn(`Not in DB: ${id}`);
  return failed + res.failed.length + res.unknown.length > 0 ? 1 : 0;
}

async function cmdImportPocket(ctx: Context): Promise<number> {
  const urls = parsePocketCsv(readInputFile(ctx));
  const arxivUrls = urls.filter((u) => parseArxivRef(u) !== null);
  console.log(`${arxivUrls.length} of ${urls.length} saved links point at arXiv`);
  if (arxivUrls.length === 0) return 0;
  return reportAdd(ctx, await addPreprints(ctx.store, arxivUrls, libraryOptions(ctx)));
}

async function cmdImportFile(ctx: Context): Promise<number> {
  const ids = parseIdList(readInputFile(ctx), flagValue(ctx.args, 'sep') ?? ',');
  if (ids.length === 0) {
    console.log('No ids in file');
    return 0;
  }
  return reportAdd(ctx, await addPreprints(ctx.store, ids, libraryOptions(ctx)));
}

async function cmdDumpShiori(ctx: Context): Promise<number> {
  const { session, settings } = await shioriSession(ctx);
  const res = await runDump({
    session,
    store: ctx.store,
    idsPerRequest: ctx.config.arxiv.idsPerRequest,
    delayMs: ctx.config.arxiv.politenessDelayMs,
    ignoreTags: settings?.tags ?? [],
  });

  if (res.added.length + res.tagged.length > 0) saveStore(ctx.store);
  for (const id of res.notFound) console.warn(`Not found on arXiv: ${id}`);
  console.log(
    `Scanned ${res.scanned} bookmarks: ${res.added.length} preprints added, ${res.tagged.length} got new tags. ` +
      `Total: ${ctx.store.records.size}`,
  );
  return res.notFound.length > 0 ? 1 : 0;
}

async function cmdUploadShiori(ctx: Context): Promise<number> {
  const { session, settings } = await shioriSession(ctx);
  const prune = hasFlag(ctx.args, 'prune');
  const res = await runUpload({
    session,
    store: ctx.store,
    prune,
    dryRun: hasFlag(ctx.args, 'dry-run'),
    createArchive: settings?.createArchive,
    public: settings?.public,
    extraTags: settings?.tags,
  });

  if (res.dryRun) {
    for (const id of res.planned.toCreate) console.log(`would upload ${id}`);
    if (prune) {
      for (const id of [...res.planned.stale, ...res.planned.duplicates]) console.log(`would delete bookmark ${id}`);
    }
    return 0;
  }

  console.log(`Uploaded ${res.created.length} preprints, deleted ${res.deleted.length} bookmarks`);
  if (res.failures.length > 0) console.warn(`${res.failures.length} Shiori operations failed; rerun to retry`);
  return res.failures.length > 0 ? 1 : 0;
}

// ── Main ───────────────────────────────────────────────────────────────

const COMMAND_FLAGS: Record<string, readonly string[]> = {
  info: [],
  add: ['tag'],
  remove: [],
  update: [],
  download: ['save-path', 'article', 'no-check', 'tag'],
  'import-pocket': ['file', 'tag'],
  'import-file': ['file', 'sep', 'tag'],
  'dump-shiori': SHIORI_FLAGS,
  'upload-shiori': [...SHIORI_FLAGS, 'prune', 'dry-run'],
};

async function run(ctx: Context, command: string): Promise<number> {
  switch (command) {
    case 'info':
      return cmdInfo(ctx);
    case 'add':
      return cmdAdd(ctx);
    case 'remove':
      return cmdRemove(ctx);
    case 'update':
      return cmdUpdate(ctx);
    case 'download':
      return cmdDownload(ctx);
    case 'import-pocket':
      return cmdImportPocket(ctx);
    case 'import-file':
      return cmdImportFile(ctx);
    case 'dump-shiori':
      return cmdDumpShiori(ctx);
    case 'upload-shiori':
      return cmdUploadShiori(ctx);
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/** Null when only the usage text was asked for. */
function parseCommandLine(argv: string[]): { args: ParsedArgs; command: string } | null {
  const args = parseArgs(argv, BOOLEAN_FLAGS);
  const command = args.positional[0];
  if (!command || hasFlag(args, 'help')) return null;

  const allowed = COMMAND_FLAGS[command];
  if (!allowed) throw new UsageError(`Unknown command: ${command}`);
  rejectUnknownFlags(args, [...GLOBAL_FLAGS, ...allowed]);
  return { args, command };
}

async function main(): Promise<number> {
  let cli: { args: ParsedArgs; command: string } | null;
  try {
    cli = parseCommandLine(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`${e.message}\n\n${USAGE}`);
    return 1;
  }
  if (!cli) {
    console.log(USAGE);
    return 0;
  }

  try {
    return await run(loadContext(cli.args), cli.command);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`${cli.command}: ${e.message}`);
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
