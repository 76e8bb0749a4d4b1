import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { RequestOptions } from '../http.js';
import { upsertRecords, type Store } from '../store.js';
import type { PreprintRecord } from '../types.js';
import { bookmarkFor, runUpload } from './upload.js';

interface RemoteBookmark {
  id: number;
  url: string;
  title: string;
  excerpt: string;
  tags: Array<{ name: string }>;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** In-memory Shiori answering list, create and delete. */
function fakeShiori(initial: Array<Pick<RemoteBookmark, 'id' | 'url'>>, failUrls: string[] = []) {
  const bookmarks: RemoteBookmark[] = initial.map((b) => ({ ...b, title: '', excerpt: '', tags: [] }));
  let nextId = bookmarks.reduce((m, b) => Math.max(m, b.id), 0) + 1;
  const posted: unknown[] = [];
  const deleted: unknown[] = [];

  const fetchMock = vi.fn(async (_url: string, init: RequestOptions = {}): Promise<Response> => {
    const method = init.method ?? 'GET';
    if (method === 'GET') return json({ bookmarks, page: 1, maxPage: 1 });
    if (method === 'POST') {
      const body: Omit<RemoteBookmark, 'id'> = JSON.parse(init.body ?? '{}');
      posted.push(body);
      if (failUrls.includes(body.url)) return json({ message: 'archive failed' }, 500);
      const created = { id: nextId++, url: body.url, title: body.title, excerpt: body.excerpt, tags: body.tags };
      bookmarks.push(created);
      return json(created);
    }
    const ids: number[] = JSON.parse(init.body ?? '[]');
    deleted.push(ids);
    for (const id of ids) {
      const i = bookmarks.findIndex((b) => b.id === id);
      if (i >= 0) bookmarks.splice(i, 1);
    }
    return json({ ok: true });
  });

  return { bookmarks, posted, deleted, fetchMock };
}

function rec(arxivId: string, publishedAt: string, tags: string[] = []): PreprintRecord {
  return {
    arxivId,
    version: 'v1',
    title: `Paper ${arxivId}`,
    authors: ['Alice Smith'],
    summary: `About ${arxivId}.`,
    url: `http://arxiv.org/pdf/${arxivId}v1`,
    absUrl: `http://arxiv.org/abs/${arxivId}v1`,
    categories: [],
    tags,
    publishedAt,
    updatedAt: publishedAt,
    addedAt: '2025-01-01T00:00:00.000Z',
  };
}

const session = { address: 'http://shiori.test', sessionId: 'test-session' };

describe('runUpload', () => {
  let store: Store;

  beforeEach(() => {
    store = { path: 'unused.json', records: new Map() };
    upsertRecords(store, [
      rec('2401.00002', '2024-01-02T00:00:00Z', ['rl']),
      rec('2401.00001', '2024-01-01T00:00:00Z', ['ml']),
    ]);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('builds the bookmark from the record and configured tags', () => {
    expect(
      bookmarkFor(rec('2401.00001', '2024-01-01T00:00:00Z', ['ml', 'arxiv']), {
        extraTags: ['arxiv', 'papers'],
        createArchive: false,
        public: false,
      }),
    ).toEqual({
      url: 'https://arxiv.org/abs/2401.00001',
      title: 'Paper 2401.00001',
      excerpt: 'About 2401.00001.',
      tags: ['ml', 'arxiv', 'papers'],
      createArchive: false,
      public: false,
    });
  });

  it('creates only the missing bookmarks, oldest first', async () => {
    const remote = fakeShiori([
      { id: 1, url: 'https://arxiv.org/abs/2401.00002v1' },
      { id: 2, url: 'https://example.com/not-a-paper' },
    ]);
    vi.stubGlobal('fetch', remote.fetchMock);

    const res = await runUpload({ session, store, extraTags: ['arxiv'], public: false, delayMs: 0 });

    expect(res.created).toEqual(['2401.00001']);
    expect(res.planned).toEqual({ toCreate: ['2401.00001'], present: 1, stale: [], duplicates: [] });
    expect(res.failures).toEqual([]);
    expect(remote.posted).toEqual([
      {
        url: 'https://arxiv.org/abs/2401.00001',
        title: 'Paper 2401.00001',
        excerpt: 'About 2401.00001.',
        tags: [{ name: 'ml' }, { name: 'arxiv' }],
        createArchive: true,
        public: 0,
      },
    ]);
    expect(remote.deleted).toEqual([]);
  });

  it('creates nothing on a second run', async () => {
    const remote = fakeShiori([]);
    vi.stubGlobal('fetch', remote.fetchMock);

    const first = await runUpload({ session, store, delayMs: 0 });
    const second = await runUpload({ session, store, delayMs: 0 });

    expect(first.created).toEqual(['2401.00001', '2401.00002']);
    expect(second.created).toEqual([]);
    expect(second.planned.present).toBe(2);
    expect(remote.bookmarks.map((b) => b.url)).toEqual([
      'https://arxiv.org/abs/2401.00001',
      'https://arxiv.org/abs/2401.00002',
    ]);
  });

  it('prunes stale and duplicate bookmarks in one call and leaves other links alone', async () => {
    const remote = fakeShiori([
      { id: 1, url: 'https://arxiv.org/abs/2401.00001' },
      { id: 2, url: 'https://example.com/not-a-paper' },
      { id: 3, url: 'https://arxiv.org/abs/2312.00005' },
      { id: 4, url: 'https://arxiv.org/pdf/2401.00001v1.pdf' },
    ]);
    vi.stubGlobal('fetch', remote.fetchMock);

    const res = await runUpload({ session, store, prune: true, delayMs: 0 });

    expect(res.created).toEqual(['2401.00002']);
    expect(res.deleted).toEqual([3, 4]);
    expect(remote.deleted).toEqual([[3, 4]]);
    expect(remote.bookmarks.map((b) => b.id)).toEqual([1, 2, 5]);
  });

  it('keeps stale bookmarks without prune', async () => {
    const remote = fakeShiori([{ id: 3, url: 'https://arxiv.org/abs/2312.00005' }]);
    vi.stubGlobal('fetch', remote.fetchMock);

    const res = await runUpload({ session, store, delayMs: 0 });

    expect(res.planned.stale).toEqual([3]);
    expect(res.deleted).toEqual([]);
    expect(remote.deleted).toEqual([]);
  });

  it('writes nothing on a dry run', async () => {
    const remote = fakeShiori([{ id: 3, url: 'https://arxiv.org/abs/2312.00005' }]);
    vi.stubGlobal('fetch', remote.fetchMock);

    const res = await runUpload({ session, store, prune: true, dryRun: true, delayMs: 0 });

    expect(res.dryRun).toBe(true);
    expect(res.planned).toEqual({ toCreate: ['2401.00001', '2401.00002'], present: 0, stale: [3], duplicates: [] });
    expect(res.created).toEqual([]);
    expect(res.deleted).toEqual([]);
    expect(remote.fetchMock).toHaveBeenCalledTimes(1);
  });

  it('records a failed create and carries on', async () => {
    const remote = fakeShiori([], ['https://arxiv.org/abs/2401.00001']);
    vi.stubGlobal('fetch', remote.fetchMock);

    const res = await runUpload({ session, store, delayMs: 0 });

    expect(res.created).toEqual(['2401.00002']);
    expect(res.failures).toHaveLength(1);
    expect(res.failures[0]).toMatchObject({ kind: 'create', arxivId: '2401.00001' });
    expect(res.failures[0]?.error).toContain('Shiori create bookmark failed: 500');
    expect(remote.posted).toHaveLength(2);
  });
});
