import { absUrl } from '../record.js';
import { createBookmark, deleteBookmarks, listAllBookmarks, type NewBookmark, type ShioriSession } from '../shiori/client.js';
import { sleep } from '../backoff.js';
import { sortedRecords, type Store } from '../store.js';
import type { PreprintRecord } from '../types.js';
import { planUpload } from './plan.js';

export interface UploadOptions {
  session: ShioriSession;
  store: Store;
  /** Delete stale and duplicate arXiv bookmarks. */
  prune?: boolean;
  dryRun?: boolean;
  createArchive?: boolean;
  public?: boolean;
  /** Added to every created bookmark on top of the record's own tags. */
  extraTags?: string[];
  delayMs?: number;
}

export type SyncFailure =
  | { kind: 'create'; arxivId: string; error: string }
  | { kind: 'delete'; bookmarkIds: number[]; error: string };

export interface UploadResult {
  dryRun: boolean;
  planned: { toCreate: string[]; present: number; stale: number[]; duplicates: number[] };
  created: string[];
  deleted: number[];
  failures: SyncFailure[];
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function bookmarkFor(record: PreprintRecord, opts: Pick<UploadOptions, 'createArchive' | 'public' | 'extraTags'>): NewBookmark {
  return {
    url: absUrl(record.arxivId),
    title: record.title,
    excerpt: record.summary,
    tags: Array.from(new Set([...record.tags, ...(opts.extraTags ?? [])])),
    createArchive: opts.createArchive ?? true,
    public: opts.public ?? true,
  };
}

/**
 * Push local records to Shiori. Records already bookmarked (matched by arXiv
 * id) are left alone, so a second run creates nothing. A failed create is
 * recorded and the run continues; the next run picks the record up again.
 */
export async function runUpload(opts: UploadOptions): Promise<UploadResult> {
  const { session, store, prune = false, dryRun = false, delayMs = 250 } = opts;

  const remote = await listAllBookmarks(session);
  const records = sortedRecords(store);
  const plan = planUpload(records, remote);

  const result: UploadResult = {
    dryRun,
    planned: {
      toCreate: plan.toCreate.map((r) => r.arxivId),
      present: plan.present.length,
      stale: plan.stale.map((b) => b.id),
      duplicates: plan.duplicates.map((b) => b.id),
    },
    created: [],
    deleted: [],
    failures: [],
  };

  console.log(
    `Shiori: ${remote.length} bookmarks, ${plan.present.length} preprints already present, ` +
      `${plan.toCreate.length} to upload, ${plan.stale.length} stale, ${plan.duplicates.length} duplicates`,
  );
  if (dryRun) return result;

  for (const [i, record] of plan.toCreate.entries()) {
    if (i > 0 && delayMs > 0) await sleep(delayMs);
    try {
      await createBookmark(session, bookmarkFor(record, opts));
      result.created.push(record.arxivId);
    } catch (e) {
      const error = errorMessage(e);
      console.warn(`Upload failed for ${record.arxivId}: ${error}`);
      result.failures.push({ kind: 'create', arxivId: record.arxivId, error });
    }
  }

  if (prune) {
    const ids = [...plan.stale, ...plan.duplicates].map((b) => b.id);
    try {
      await deleteBookmarks(session, ids);
      result.deleted.push(...ids);
    } catch (e) {
      const error = errorMessage(e);
      console.warn(`Pruning ${ids.length} bookmarks failed: ${error}`);
      result.failures.push({ kind: 'delete', bookmarkIds: ids, error });
    }
  }

  return result;
}
