import { matchBookmarkUrl } from '../arxiv.js';
import type { ShioriBookmark } from '../shiori/client.js';
import type { PreprintRecord } from '../types.js';

export interface RemoteIndex {
  /** arXiv id -> bookmarks pointing at it, arxiv.org links first, then lowest bookmark id */
  byArxivId: Map<string, ShioriBookmark[]>;
  /** ids of bookmarks on mirror sites (alphaxiv, Hugging Face); never deleted */
  mirrored: Set<number>;
  /** bookmarks that are not arXiv preprints; never touched */
  foreign: ShioriBookmark[];
}

export function indexBookmarks(bookmarks: ShioriBookmark[]): RemoteIndex {
  const byArxivId = new Map<string, ShioriBookmark[]>();
  const mirrored = new Set<number>();
  const foreign: ShioriBookmark[] = [];

  for (const b of [...bookmarks].sort((x, y) => x.id - y.id)) {
    const match = matchBookmarkUrl(b.url);
    if (!match) {
      foreign.push(b);
      continue;
    }
    if (match.mirror) mirrored.add(b.id);
    const list = byArxivId.get(match.arxivId);
    if (list) list.push(b);
    else byArxivId.set(match.arxivId, [b]);
  }

  const rank = (b: ShioriBookmark) => (mirrored.has(b.id) ? 1 : 0);
  for (const list of byArxivId.values()) list.sort((x, y) => rank(x) - rank(y));

  return { byArxivId, mirrored, foreign };
}

export interface UploadPlan {
  toCreate: PreprintRecord[];
  present: Array<{ record: PreprintRecord; bookmark: ShioriBookmark }>;
  /** arxiv.org bookmarks whose id is not in the local store */
  stale: ShioriBookmark[];
  /** further arxiv.org bookmarks for an id that already has a kept one */
  duplicates: ShioriBookmark[];
}

export function planUpload(records: PreprintRecord[], bookmarks: ShioriBookmark[]): UploadPlan {
  const { byArxivId, mirrored } = indexBookmarks(bookmarks);
  const local = new Set(records.map((r) => r.arxivId));
  const deletable = (b: ShioriBookmark) => !mirrored.has(b.id);

  const toCreate: PreprintRecord[] = [];
  const present: UploadPlan['present'] = [];
  for (const record of records) {
    const kept = byArxivId.get(record.arxivId)?.[0];
    if (kept) present.push({ record, bookmark: kept });
    else toCreate.push(record);
  }

  const stale: ShioriBookmark[] = [];
  const duplicates: ShioriBookmark[] = [];
  for (const [arxivId, list] of byArxivId) {
    if (!local.has(arxivId)) {
      stale.push(...list.filter(deletable));
      continue;
    }
    duplicates.push(...list.slice(1).filter(deletable));
  }

  return { toCreate, present, stale, duplicates };
}
