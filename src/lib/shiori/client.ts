/**
 * Shiori REST client
 *
 * Thin wrapper over the bookmark endpoints of a self-hosted Shiori instance:
 *   POST   /api/v1/auth/login   -> session id
 *   GET    /api/bookmarks?page=N
 *   POST   /api/bookmarks
 *   DELETE /api/bookmarks       (body: [id, ...])
 *
 * Every call after login carries the session in the X-Session-Id header.
 */

import { z } from 'zod';

import { fetchWithRetry } from '../http.js';

export interface ShioriCredentials {
  address: string;
  username: string;
  password: string;
}

export interface ShioriSession {
  address: string; // no trailing slash
  sessionId: string;
}

const TagSchema = z.object({ name: z.string() });

const BookmarkSchema = z.object({
  id: z.number().int(),
  url: z.string(),
  title: z.string().default(''),
  excerpt: z.string().default(''),
  tags: z
    .array(TagSchema)
    .nullish()
    .transform((t) => (t ?? []).map((x) => x.name)),
});

export type ShioriBookmark = z.output<typeof BookmarkSchema>;

const LoginResponseSchema = z.object({
  message: z.object({ session: z.string().min(1) }),
});

const BookmarkPageSchema = z.object({
  bookmarks: z.array(BookmarkSchema).nullish().transform((b) => b ?? []),
  page: z.number().int().default(1),
  maxPage: z.number().int().default(1),
});

export type BookmarkPage = z.output<typeof BookmarkPageSchema>;

export interface NewBookmark {
  url: string;
  title: string;
  excerpt: string;
  tags: string[];
  createArchive: boolean;
  public: boolean;
}

function jsonHeaders(session?: ShioriSession): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (session) headers['X-Session-Id'] = session.sessionId;
  return headers;
}

export async function loginShiori(creds: ShioriCredentials): Promise<ShioriSession> {
  const address = creds.address.replace(/\/+$/, '');
  const res = await fetchWithRetry(
    `${address}/api/v1/auth/login`,
    {
      method: 'POST',
      headers: jsonHeaders(),
      body: JSON.stringify({ username: creds.username, password: creds.password, remember: true, owner: true }),
    },
    { label: 'Shiori login' },
  );
  const body = LoginResponseSchema.parse(await res.json());
  return { address, sessionId: body.message.session };
}

export async function listBookmarksPage(session: ShioriSession, page: number): Promise<BookmarkPage> {
  const res = await fetchWithRetry(
    `${session.address}/api/bookmarks?keyword=&tags=&exclude=&page=${page}`,
    { headers: jsonHeaders(session) },
    { label: 'Shiori list bookmarks' },
  );
  return BookmarkPageSchema.parse(await res.json());
}

export async function listAllBookmarks(session: ShioriSession): Promise<ShioriBookmark[]> {
  const first = await listBookmarksPage(session, 1);
  const all = [...first.bookmarks];
  for (let page = 2; page <= first.maxPage; page++) {
    const next = await listBookmarksPage(session, page);
    all.push(...next.bookmarks);
  }
  return all;
}

/** Not retried: a POST that timed out may still have created the bookmark. */
export async function createBookmark(session: ShioriSession, input: NewBookmark): Promise<ShioriBookmark> {
  const res = await fetchWithRetry(
    `${session.address}/api/bookmarks`,
    {
      method: 'POST',
      headers: jsonHeaders(session),
      body: JSON.stringify({
        url: input.url,
        title: input.title,
        excerpt: input.excerpt,
        tags: input.tags.map((name) => ({ name })),
        createArchive: input.createArchive,
        public: input.public ? 1 : 0,
      }),
    },
    { label: 'Shiori create bookmark', maxAttempts: 1 },
  );
  return BookmarkSchema.parse(await res.json());
}

export async function deleteBookmarks(session: ShioriSession, ids: number[]): Promise<void> {
  if (ids.length === 0) return;
  await fetchWithRetry(
    `${session.address}/api/bookmarks`,
    { method: 'DELETE', headers: jsonHeaders(session), body: JSON.stringify(ids) },
    { label: 'Shiori delete bookmarks' },
  );
}
