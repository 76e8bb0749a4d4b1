import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import { ensureDir } from './storage.js';
import type { PreprintRecord } from './types.js';

export interface Store {
  path: string;
  records: Map<string, PreprintRecord>;
}

const RecordSchema = z.object({
  arxivId: z.string().min(1),
  version: z.string().regex(/^v\d+$/),
  title: z.string(),
  authors: z.array(z.string()),
  summary: z.string(),
  url: z.string(),
  absUrl: z.string(),
  categories: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  publishedAt: z.string(),
  updatedAt: z.string(),
  addedAt: z.string(),
});

const RecordFileSchema = z.array(RecordSchema);

export function openStore(dbPath: string): Store {
  if (path.extname(dbPath) !== '.json') {
    throw new Error(`Database should be in JSON format: ${dbPath}`);
  }

  const records = new Map<string, PreprintRecord>();
  if (fs.existsSync(dbPath)) {
    const raw: unknown = JSON.parse(fs.readFileSync(dbPath, 'utf8'));
    for (const r of RecordFileSchema.parse(raw)) records.set(r.arxivId, r);
  }
  return { path: dbPath, records };
}

function compareRecords(a: PreprintRecord, b: PreprintRecord): number {
  if (a.publishedAt !== b.publishedAt) return a.publishedAt < b.publishedAt ? -1 : 1;
  if (a.arxivId === b.arxivId) return 0;
  return a.arxivId < b.arxivId ? -1 : 1;
}

export function sortedRecords(store: Store): PreprintRecord[] {
  return Array.from(store.records.values()).sort(compareRecords);
}

export function saveStore(store: Store): void {
  ensureDir(path.dirname(store.path));
  const tmpPath = `${store.path}.tmp`;
  fs.writeFileSync(tmpPath, JSON.stringify(sortedRecords(store), null, 2) + '\n');
  fs.renameSync(tmpPath, store.path);
}

function mergeTags(a: string[], b: string[]): string[] {
  return Array.from(new Set([...a, ...b]));
}

export interface UpsertResult {
  added: string[];
  updated: string[];
}

/**
 * Insert new records; replace known ones while keeping their tags (merged
 * with the incoming ones) and their original addedAt.
 */
export function upsertRecords(store: Store, records: PreprintRecord[]): UpsertResult {
  const added: string[] = [];
  const updated: string[] = [];

  for (const r of records) {
    const existing = store.records.get(r.arxivId);
    if (existing) {
      store.records.set(r.arxivId, { ...r, tags: mergeTags(existing.tags, r.tags), addedAt: existing.addedAt });
      updated.push(r.arxivId);
    } else {
      store.records.set(r.arxivId, r);
      added.push(r.arxivId);
    }
  }

  return { added, updated };
}

/** True when the record's tag list grew. */
export function addTags(store: Store, arxivId: string, tags: string[]): boolean {
  const existing = store.records.get(arxivId);
  if (!existing) return false;
  const merged = mergeTags(existing.tags, tags);
  if (merged.length === existing.tags.length) return false;
  store.records.set(arxivId, { ...existing, tags: merged });
  return true;
}

export function removeRecords(store: Store, ids: string[]): { removed: string[]; unknown: string[] } {
  const removed: string[] = [];
  const unknown: string[] = [];
  for (const id of ids) {
    if (store.records.delete(id)) removed.push(id);
    else unknown.push(id);
  }
  return { removed, unknown };
}
