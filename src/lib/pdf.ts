import fs from 'node:fs';
import path from 'node:path';

import { parsePdfFilename } from './record.js';

export function isPdfFileValid(pdfPath: string): boolean {
  try {
    const fd = fs.openSync(pdfPath, 'r');
    const buf = Buffer.alloc(5);
    fs.readSync(fd, buf, 0, 5, 0);
    fs.closeSync(fd);
    return buf.toString('utf8') === '%PDF-';
  } catch {
    return false;
  }
}

export function pdfKey(arxivId: string, version: string | null): string {
  return `${arxivId}${version ?? ''}`;
}

/**
 * Map "<id><version>" -> path for every downloaded preprint in `dir`,
 * recognised by the "[id+version] ..." filename prefix.
 */
export function scanPdfFolder(dir: string): Map<string, string> {
  const found = new Map<string, string>();
  if (!fs.existsSync(dir)) return found;

  for (const name of fs.readdirSync(dir)) {
    if (path.extname(name).toLowerCase() !== '.pdf') continue;
    const ref = parsePdfFilename(name);
    if (!ref) continue;
    found.set(pdfKey(ref.arxivId, ref.version), path.join(dir, name));
  }
  return found;
}
