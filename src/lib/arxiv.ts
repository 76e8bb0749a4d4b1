import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';

import { sleep } from './backoff.js';
import { fetchWithRetry } from './http.js';

export interface ArxivEntry {
  arxivId: string; // canonical, no version
  version: string; // v1, v2, ...
  title: string;
  summary: string;
  authors: string[];
  categories: string[];
  publishedAt: string;
  updatedAt: string;
  pdfUrl: string | null;
  absUrl: string | null;
  rawIdUrl: string;
}

export interface ArxivRef {
  arxivId: string;
  version: string | null;
}

const ARRAY_PATHS = new Set(['feed.entry', 'feed.entry.author', 'feed.entry.category', 'feed.entry.link']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  // keep "2024" titles as strings
  parseTagValue: false,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

function text(x: unknown): string {
  if (typeof x === 'string') return x;
  if (x && typeof x === 'object' && '#text' in x && typeof x['#text'] === 'string') return x['#text'];
  return '';
}

const TextField = z.unknown().transform(text);

const AtomEntrySchema = z.object({
  id: TextField,
  title: TextField,
  summary: TextField,
  published: TextField,
  updated: TextField,
  author: z.array(z.object({ name: TextField })).default([]),
  category: z.array(z.object({ '@_term': TextField })).default([]),
  link: z.array(z.object({ '@_href': TextField, '@_type': TextField })).default([]),
});

const AtomFeedSchema = z.object({
  feed: z.object({
    entry: z.array(z.unknown()).default([]),
  }),
});

const ID = String.raw`(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?`;
const BARE_REF = new RegExp(`^(?:arxiv:)?${ID}$`, 'i');
const URL_REF = new RegExp(
  String.raw`^(?:https?://)?(?:www\.|export\.)?arxiv\.org/(?:abs|pdf|html)/${ID}(?:\.pdf)?/?(?:[?#].*)?$`,
  'i',
);
const MIRROR_REF = new RegExp(
  String.raw`^(?:https?://)?(?:www\.)?(?:alphaxiv\.org/(?:abs|overview)|huggingface\.co/papers)/${ID}/?(?:[?#].*)?$`,
  'i',
);

function toRef(m: RegExpMatchArray | null): ArxivRef | null {
  const arxivId = m?.groups?.id;
  if (!arxivId) return null;
  const v = m?.groups?.v;
  return { arxivId, version: v ? v.toLowerCase() : null };
}

/**
 * Recognise a user-supplied reference to an arXiv preprint: a bare id
 * (`2401.12345`, `2401.12345v2`), an `arxiv:` prefixed id, an abs/pdf/html
 * URL, or a paper page on alphaxiv.org or huggingface.co.
 */
export function parseArxivRef(input: string): ArxivRef | null {
  const s = input.trim();
  return toRef(s.match(BARE_REF) ?? s.match(URL_REF) ?? s.match(MIRROR_REF));
}

/** arXiv id a bookmarked URL points at; `mirror` marks pages outside arxiv.org. */
export function matchBookmarkUrl(url: string): { arxivId: string; mirror: boolean } | null {
  const s = url.trim();
  const direct = toRef(s.match(URL_REF));
  if (direct) return { arxivId: direct.arxivId, mirror: false };
  const mirrored = toRef(s.match(MIRROR_REF));
  return mirrored ? { arxivId: mirrored.arxivId, mirror: true } : null;
}

// Example id URL: http://arxiv.org/abs/2502.12345v2
export function parseArxivId(idUrl: string): { arxivId: string; version: string } {
  const m = idUrl.match(/arxiv\.org\/abs\/(.+)$/);
  const tail = m?.[1] ?? idUrl;
  const mv = tail.match(/^(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?$/);
  const arxivId = mv?.groups?.id ?? tail.replace(/v\d+$/, '');
  const version = mv?.groups?.v ?? 'v1';
  return { arxivId, version };
}

function normalizeWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export async function fetchAtomByIds(ids: string[]): Promise<string> {
  if (ids.length === 0) throw new Error('fetchAtomByIds: no ids given');
  const idList = ids.map(encodeURIComponent).join(',');
  const url = `https://export.arxiv.org/api/query?id_list=${idList}&start=0&max_results=${ids.length}`;
  const res = await fetchWithRetry(url, {}, { label: 'arXiv fetch' });
  return await res.text();
}

export function parseAtom(xml: string): ArxivEntry[] {
  const doc: unknown = parser.parse(xml);
  const feed = AtomFeedSchema.safeParse(doc);
  if (!feed.success) return [];

  const out: ArxivEntry[] = [];
  for (const raw of feed.data.feed.entry) {
    const parsed = AtomEntrySchema.safeParse(raw);
    if (!parsed.success) continue;
    const e = parsed.data;

    // arXiv reports bad ids as entries under /api/errors
    if (!/arxiv\.org\/abs\//.test(e.id)) continue;

    const { arxivId, version } = parseArxivId(e.id);
    const hrefs = e.link.map((l) => l['@_href']);

    out.push({
      arxivId,
      version,
      title: normalizeWhitespace(e.title),
      summary: normalizeWhitespace(e.summary),
      authors: e.author.map((a) => normalizeWhitespace(a.name)).filter(Boolean),
      categories: e.category.map((c) => c['@_term']).filter(Boolean),
      publishedAt: e.published,
      updatedAt: e.updated,
      pdfUrl: e.link.find((l) => l['@_type'] === 'application/pdf')?.['@_href'] ?? null,
      absUrl: hrefs.find((href) => href.includes('/abs/')) ?? null,
      rawIdUrl: e.id,
    });
  }
  return out;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

export interface FetchEntriesOptions {
  idsPerRequest: number;
  /** Pause between consecutive requests. */
  delayMs?: number;
}

export async function fetchEntries(ids: string[], opts: FetchEntriesOptions): Promise<ArxivEntry[]> {
  const { idsPerRequest, delayMs = 3000 } = opts;
  const entries: ArxivEntry[] = [];
  const batches = chunk(ids, idsPerRequest);

  for (const [i, batch] of batches.entries()) {
    if (i > 0) await sleep(delayMs);
    const xml = await fetchAtomByIds(batch);
    entries.push(...parseAtom(xml));
    console.log(`arXiv: ${Math.min((i + 1) * idsPerRequest, ids.length)}/${ids.length} ids requested`);
  }

  return entries;
}
