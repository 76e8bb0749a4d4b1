import { fetchEntries, parseArxivRef } from './arxiv.js';
import { recordFromEntry } from './record.js';
import { upsertRecords, removeRecords, type Store } from './store.js';
import type { PreprintRecord } from './types.js';

export interface LibraryOptions {
  idsPerRequest: number;
  delayMs?: number;
  /** Tags attached to newly added records. */
  tags?: string[];
  now?: Date;
}

export interface AddResult {
  added: string[];
  alreadyKnown: string[];
  invalid: string[];
  /** Requested ids arXiv returned no entry for. */
  notFound: string[];
}

export function resolveRefs(inputs: string[]): { ids: string[]; invalid: string[] } {
  const ids: string[] = [];
  const invalid: string[] = [];
  for (const input of inputs) {
    const ref = parseArxivRef(input);
    if (!ref) {
      if (input.trim()) invalid.push(input);
      continue;
    }
    if (!ids.includes(ref.arxivId)) ids.push(ref.arxivId);
  }
  return { ids, invalid };
}

/**
 * Add preprints given as ids or arXiv URLs. Known ids are not re-requested;
 * new records are inserted in publication order.
 */
export async function addPreprints(store: Store, inputs: string[], opts: LibraryOptions): Promise<AddResult> {
  const { ids, invalid } = resolveRefs(inputs);
  const alreadyKnown = ids.filter((id) => store.records.has(id));
  const wanted = ids.filter((id) => !store.records.has(id));

  if (wanted.length === 0) {
    return { added: [], alreadyKnown, invalid, notFound: [] };
  }

  console.log(`${wanted.length} entries will be added to DB`);
  if (alreadyKnown.length) console.log(`${alreadyKnown.length} entries already known.`);

  const entries = await fetchEntries(wanted, { idsPerRequest: opts.idsPerRequest, delayMs: opts.delayMs });
  const now = opts.now ?? new Date();
  const records = entries
    .filter((e) => wanted.includes(e.arxivId))
    .sort((a, b) => a.publishedAt.localeCompare(b.publishedAt))
    .map((e) => ({ ...recordFromEntry(e, now), tags: [...(opts.tags ?? [])] }));

  const { added } = upsertRecords(store, records);
  const returned = new Set(records.map((r) => r.arxivId));
  const notFound = wanted.filter((id) => !returned.has(id));

  return { added, alreadyKnown, invalid, notFound };
}

export interface RefreshResult {
  refreshed: string[];
  newVersions: string[];
  notFound: string[];
}

export async function refreshPreprints(store: Store, opts: LibraryOptions): Promise<RefreshResult> {
  const ids = Array.from(store.records.keys());
  if (ids.length === 0) {
    console.log('DB is empty, nothing to update!');
    return { refreshed: [], newVersions: [], notFound: [] };
  }

  const entries = await fetchEntries(ids, { idsPerRequest: opts.idsPerRequest, delayMs: opts.delayMs });
  const now = opts.now ?? new Date();
  const newVersions: string[] = [];
  const records: PreprintRecord[] = [];

  for (const e of entries) {
    const existing = store.records.get(e.arxivId);
    if (!existing) continue;
    if (existing.version !== e.version) newVersions.push(e.arxivId);
    records.push(recordFromEntry(e, now));
  }

  const { updated } = upsertRecords(store, records);
  const seen = new Set(updated);
  return { refreshed: updated, newVersions, notFound: ids.filter((id) => !seen.has(id)) };
}

export function removePreprints(store: Store, inputs: string[]): { removed: string[]; unknown: string[]; invalid: string[] } {
  const { ids, invalid } = resolveRefs(inputs);
  return { ...removeRecords(store, ids), invalid };
}

export interface StoreSummary {
  count: number;
  oldest: string | null;
  newest: string | null;
  tags: Array<{ tag: string; count: number }>;
}

export function summarizeStore(store: Store): StoreSummary {
  const records = Array.from(store.records.values());
  const dates = records.map((r) => r.publishedAt).filter(Boolean).sort();
  const tagCounts = new Map<string, number>();
  for (const r of records) {
    for (const t of r.tags) tagCounts.set(t, (tagCounts.get(t) ?? 0) + 1);
  }

  return {
    count: records.length,
    oldest: dates[0] ?? null,
    newest: dates[dates.length - 1] ?? null,
    tags: Array.from(tagCounts, ([tag, count]) => ({ tag, count })).sort(
      (a, b) => b.count - a.count || a.tag.localeCompare(b.tag),
    ),
  };
}
