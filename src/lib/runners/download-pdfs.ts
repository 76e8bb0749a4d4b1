import fs from 'node:fs';
import path from 'node:path';

import { jitter, sleep } from '../backoff.js';
import { downloadToFile } from '../download.js';
import { isPdfFileValid, pdfKey, scanPdfFolder } from '../pdf.js';
import { pdfFilename, pdfUrl } from '../record.js';
import { ensureDir } from '../storage.js';
import { sortedRecords, type Store } from '../store.js';
import type { PreprintRecord } from '../types.js';

export interface PdfRunOptions {
  store: Store;
  folder: string;
  /** Only these arXiv ids; default is every record in the store. */
  ids?: string[];
  /** Skip records that already have a valid PDF in the folder. */
  checkExisting?: boolean;
  jitterMs?: { min: number; max: number };
}

export interface PdfRunResult {
  downloaded: string[];
  skippedExisting: string[];
  corruptRedownloads: string[];
  unknown: string[];
  failed: string[];
}

function selectRecords(store: Store, ids: string[] | undefined, unknown: string[]): PreprintRecord[] {
  if (!ids) return sortedRecords(store);
  const out: PreprintRecord[] = [];
  for (const id of new Set(ids)) {
    const r = store.records.get(id);
    if (r) out.push(r);
    else unknown.push(id);
  }
  return out;
}

export async function runPdfDownloads(opts: PdfRunOptions): Promise<PdfRunResult> {
  const { store, folder, ids, checkExisting = true, jitterMs = { min: 1100, max: 2950 } } = opts;

  ensureDir(folder);
  const result: PdfRunResult = { downloaded: [], skippedExisting: [], corruptRedownloads: [], unknown: [], failed: [] };
  const records = selectRecords(store, ids, result.unknown);
  const existing = checkExisting ? scanPdfFolder(folder) : new Map<string, string>();

  let attempts = 0;
  for (const r of records) {
    const existingPath = existing.get(pdfKey(r.arxivId, r.version));
    if (existingPath) {
      if (isPdfFileValid(existingPath)) {
        result.skippedExisting.push(r.arxivId);
        continue;
      }
      fs.rmSync(existingPath, { force: true });
      result.corruptRedownloads.push(r.arxivId);
    }

    const filename = pdfFilename(r);
    if (attempts > 0) await sleep(jitter(jitterMs.min, jitterMs.max));
    attempts += 1;

    try {
      await downloadToFile(pdfUrl(r), path.join(folder, filename));
      result.downloaded.push(r.arxivId);
      console.log(`Downloaded ${filename}`);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      console.warn(`PDF download failed for ${r.arxivId}: ${msg}`);
      result.failed.push(r.arxivId);
    }
  }

  console.log(
    `PDFs: ${result.downloaded.length} downloaded, ${result.skippedExisting.length} already present, ` +
      `${result.failed.length} failed`,
  );
  return result;
}
