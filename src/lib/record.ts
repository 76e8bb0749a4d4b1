import type { ArxivEntry } from './arxiv.js';
import type { PreprintRecord } from './types.js';

export function absUrl(arxivId: string): string {
  return `https://arxiv.org/abs/${arxivId}`;
}

export function pdfUrl(record: Pick<PreprintRecord, 'arxivId' | 'version' | 'url'>): string {
  return record.url || `https://arxiv.org/pdf/${record.arxivId}${record.version}`;
}

export function recordFromEntry(entry: ArxivEntry, now = new Date()): PreprintRecord {
  return {
    arxivId: entry.arxivId,
    version: entry.version,
    title: entry.title,
    authors: entry.authors,
    summary: entry.summary,
    url: entry.pdfUrl ?? `https://arxiv.org/pdf/${entry.arxivId}${entry.version}`,
    absUrl: entry.absUrl ?? absUrl(entry.arxivId),
    categories: entry.categories,
    tags: [],
    publishedAt: entry.publishedAt,
    updatedAt: entry.updatedAt,
    addedAt: now.toISOString(),
  };
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
}

// "Alice B. Smith" -> "Smith, A."
function shortAuthor(name: string): string {
  const parts = name.trim().split(/\s+/);
  const surname = capitalize(parts[parts.length - 1] ?? '');
  const initial = (parts[0] ?? '').charAt(0).toUpperCase();
  return parts.length > 1 ? `${surname}, ${initial}.` : surname;
}

export function prettyAuthors(authors: string[]): string {
  const named = authors.filter((a) => a.trim());
  const short = named.slice(0, 3).map(shortAuthor);
  if (named.length > 3) short.push('etc.');
  return short.join(', ');
}

export function pdfFilename(record: Pick<PreprintRecord, 'arxivId' | 'version' | 'authors' | 'title'>): string {
  let title = record.title
    .replace(/:/g, '.')
    .replace(/[\t/]/g, ' ')
    .replace(/\n/g, '');
  if (title.endsWith('.')) title = title.slice(0, -1);

  const parts = [`[${record.arxivId}${record.version}]`, prettyAuthors(record.authors), title].filter(Boolean);
  const base = truncateUtf8(parts.join(' '), MAX_FILENAME_BYTES - Buffer.byteLength('.pdf')).trimEnd();
  return `${base}.pdf`;
}

// Most filesystems cap a name at 255 bytes; the download also needs room for ".tmp".
const MAX_FILENAME_BYTES = 200;

function truncateUtf8(s: string, maxBytes: number): string {
  let out = '';
  let used = 0;
  for (const ch of s) {
    const n = Buffer.byteLength(ch);
    if (used + n > maxBytes) break;
    out += ch;
    used += n;
  }
  return out;
}

// "[2401.12345v2] Smith, A. Title.pdf" -> { arxivId: '2401.12345', version: 'v2' }
export function parsePdfFilename(name: string): { arxivId: string; version: string | null } | null {
  const m = name.match(/^\[(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?\]/);
  const arxivId = m?.groups?.id;
  if (!arxivId) return null;
  return { arxivId, version: m?.groups?.v ?? null };
}
