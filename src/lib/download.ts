import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';

import { USER_AGENT } from './http.js';
import { ensureDir } from './storage.js';

export interface DownloadResult {
  bytes: number;
  sha256: string;
}

const MAX_REDIRECTS = 3;

function headerValue(h: string | string[] | undefined): string {
  return Array.isArray(h) ? (h[0] ?? '') : (h ?? '');
}

// arXiv answers http:// links with a redirect to https://
async function requestFollowingRedirects(url: string, timeoutMs: number): Promise<Dispatcher.ResponseData> {
  let current = url;
  for (let hop = 0; ; hop += 1) {
    const res = await request(current, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      bodyTimeout: timeoutMs,
      headersTimeout: timeoutMs,
    });
    const location = headerValue(res.headers['location']);
    if (res.statusCode < 300 || res.statusCode >= 400 || !location) return res;

    await res.body.dump();
    if (hop >= MAX_REDIRECTS) throw new Error(`Download failed: too many redirects for ${url}`);
    current = new URL(location, current).toString();
  }
}

export async function downloadToFile(url: string, outPath: string, timeoutMs = 60_000): Promise<DownloadResult> {
  ensureDir(path.dirname(outPath));

  const tmpPath = `${outPath}.tmp`;
  const { body, statusCode, headers } = await requestFollowingRedirects(url, timeoutMs);

  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new Error(`Download failed: ${statusCode} for ${url}`);
  }

  const ct = headerValue(headers['content-type']);
  // arXiv serves an HTML page while a PDF is still being generated.
  if (ct && !ct.includes('pdf') && !ct.includes('octet-stream')) {
    await body.dump();
    throw new Error(`Unexpected content-type for ${url}: ${ct}`);
  }

  const hash = crypto.createHash('sha256');
  let bytes = 0;
  const hashTap = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length;
      hash.update(chunk);
      callback(null, chunk);
    },
  });

  // open/write errors (ENAMETOOLONG, ENOSPC) reject the pipeline
  try {
    await pipeline(body, hashTap, fs.createWriteStream(tmpPath));
  } catch (e) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath);
    throw e;
  }

  const head = Buffer.alloc(5);
  const fd = fs.openSync(tmpPath, 'r');
  fs.readSync(fd, head, 0, 5, 0);
  fs.closeSync(fd);
  if (head.toString('utf8') !== '%PDF-') {
    fs.rmSync(tmpPath, { force: true });
    throw new Error(`Downloaded file is not a valid PDF (missing %PDF- header): ${url}`);
  }

  const sha256 = hash.digest('hex');
  fs.renameSync(tmpPath, outPath);

  return { bytes, sha256 };
}
