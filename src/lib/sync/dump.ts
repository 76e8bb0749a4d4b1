import { fetchEntries } from '../arxiv.js';
import { recordFromEntry } from '../record.js';
import { listAllBookmarks, type ShioriSession } from '../shiori/client.js';
import { addTags, upsertRecords, type Store } from '../store.js';
import { indexBookmarks } from './plan.js';

export interface DumpOptions {
  session: ShioriSession;
  store: Store;
  idsPerRequest: number;
  delayMs?: number;
  /** Tags that only mark uploads (e.g. "arxiv") and are not copied back. */
  ignoreTags?: string[];
  now?: Date;
}

export interface DumpResult {
  scanned: number;
  arxivBookmarks: number;
  added: string[];
  tagged: string[];
  notFound: string[];
}

/**
 * Pull arXiv bookmarks from Shiori into the local store: unknown ids are
 * fetched from arXiv and added with the bookmark's tags, known ones only
 * gain missing tags.
 */
export async function runDump(opts: DumpOptions): Promise<DumpResult> {
  const { session, store, idsPerRequest, delayMs, ignoreTags = [], now = new Date() } = opts;

  const bookmarks = await listAllBookmarks(session);
  const { byArxivId } = indexBookmarks(bookmarks);

  const remoteTags = new Map<string, string[]>();
  for (const [arxivId, list] of byArxivId) {
    const tags = new Set(list.flatMap((b) => b.tags));
    remoteTags.set(arxivId, Array.from(tags).filter((t) => !ignoreTags.includes(t)));
  }

  const tagged: string[] = [];
  const missing: string[] = [];
  for (const [arxivId, tags] of remoteTags) {
    if (store.records.has(arxivId)) {
      if (addTags(store, arxivId, tags)) tagged.push(arxivId);
    } else {
      missing.push(arxivId);
    }
  }

  console.log(`Shiori: ${bookmarks.length} bookmarks scanned, ${byArxivId.size} preprints, ${missing.length} new`);

  let added: string[] = [];
  if (missing.length > 0) {
    const entries = await fetchEntries(missing, { idsPerRequest, delayMs });
    const records = entries
      .filter((e) => remoteTags.has(e.arxivId))
      .map((e) => ({ ...recordFromEntry(e, now), tags: remoteTags.get(e.arxivId) ?? [] }));
    added = upsertRecords(store, records).added;
  }

  const got = new Set(added);
  return {
    scanned: bookmarks.length,
    arxivBookmarks: byArxivId.size,
    added,
    tagged,
    notFound: missing.filter((id) => !got.has(id)),
  };
}
