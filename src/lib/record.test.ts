import { describe, expect, it } from 'vitest';
import type { ArxivEntry } from './arxiv.js';
import { absUrl, parsePdfFilename, pdfFilename, pdfUrl, prettyAuthors, recordFromEntry } from './record.js';

const entry: ArxivEntry = {
  arxivId: '2401.12345',
  version: 'v2',
  title: 'Attention: All You Need.',
  summary: 'We propose things.',
  authors: ['Ashish Vaswani', 'Noam Shazeer'],
  categories: ['cs.CL'],
  publishedAt: '2024-01-09T09:00:00Z',
  updatedAt: '2024-01-10T10:00:00Z',
  pdfUrl: 'http://arxiv.org/pdf/2401.12345v2',
  absUrl: 'http://arxiv.org/abs/2401.12345v2',
  rawIdUrl: 'http://arxiv.org/abs/2401.12345v2',
};

describe('recordFromEntry', () => {
  it('copies metadata and stamps addedAt', () => {
    const r = recordFromEntry(entry, new Date('2026-01-01T00:00:00Z'));
    expect(r).toEqual({
      arxivId: '2401.12345',
      version: 'v2',
      title: 'Attention: All You Need.',
      authors: ['Ashish Vaswani', 'Noam Shazeer'],
      summary: 'We propose things.',
      url: 'http://arxiv.org/pdf/2401.12345v2',
      absUrl: 'http://arxiv.org/abs/2401.12345v2',
      categories: ['cs.CL'],
      tags: [],
      publishedAt: '2024-01-09T09:00:00Z',
      updatedAt: '2024-01-10T10:00:00Z',
      addedAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('falls back to canonical URLs when the feed has no links', () => {
    const r = recordFromEntry({ ...entry, pdfUrl: null, absUrl: null });
    expect(r.url).toBe('https://arxiv.org/pdf/2401.12345v2');
    expect(r.absUrl).toBe('https://arxiv.org/abs/2401.12345');
  });
});

describe('pdfUrl / absUrl', () => {
  it('prefers the stored url', () => {
    expect(pdfUrl({ arxivId: '2401.12345', version: 'v1', url: 'https://x/y.pdf' })).toBe('https://x/y.pdf');
    expect(pdfUrl({ arxivId: '2401.12345', version: 'v1', url: '' })).toBe('https://arxiv.org/pdf/2401.12345v1');
    expect(absUrl('2401.12345')).toBe('https://arxiv.org/abs/2401.12345');
  });
});

describe('prettyAuthors', () => {
  it('formats up to three authors', () => {
    expect(prettyAuthors(['ashish vaswani', 'Noam M. Shazeer'])).toBe('Vaswani, A., Shazeer, N.');
  });

  it('appends etc. past three', () => {
    expect(prettyAuthors(['A One', 'B Two', 'C Three', 'D Four'])).toBe('One, A., Two, B., Three, C., etc.');
  });

  it('keeps single-word names as is', () => {
    expect(prettyAuthors(['Plato', ''])).toBe('Plato');
  });
});

describe('pdfFilename', () => {
  it('builds "[id+version] authors title.pdf"', () => {
    expect(pdfFilename(entry)).toBe('[2401.12345v2] Vaswani, A., Shazeer, N. Attention. All You Need.pdf');
  });

  it('replaces path separators and tabs, drops newlines', () => {
    const name = pdfFilename({ arxivId: '2401.00001', version: 'v1', authors: [], title: 'In/Out\tof\nscope' });
    expect(name).toBe('[2401.00001v1] In Out ofscope.pdf');
  });

  it('shortens long titles to 200 bytes and keeps the id prefix', () => {
    const name = pdfFilename({ arxivId: '2401.00001', version: 'v1', authors: ['Alice Smith'], title: 'T'.repeat(300) });
    expect(name).toBe(`[2401.00001v1] Smith, A. ${'T'.repeat(171)}.pdf`);
    expect(Buffer.byteLength(name)).toBe(200);
    expect(parsePdfFilename(name)).toEqual({ arxivId: '2401.00001', version: 'v1' });
  });

  it('never cuts a multi-byte character in half', () => {
    const name = pdfFilename({ arxivId: '2401.00001', version: 'v1', authors: ['Alice Smith'], title: 'é'.repeat(200) });
    expect(name).toBe(`[2401.00001v1] Smith, A. ${'é'.repeat(85)}.pdf`);
    expect(Buffer.byteLength(name)).toBe(199);
  });
});

describe('parsePdfFilename', () => {
  it('recovers id and version', () => {
    expect(parsePdfFilename('[2401.12345v2] Vaswani, A. Attention.pdf')).toEqual({ arxivId: '2401.12345', version: 'v2' });
    expect(parsePdfFilename('[2401.12345] x.pdf')).toEqual({ arxivId: '2401.12345', version: null });
  });

  it('ignores other files', () => {
    expect(parsePdfFilename('notes.pdf')).toBeNull();
  });

  it('round-trips names it produced', () => {
    expect(parsePdfFilename(pdfFilename(entry))).toEqual({ arxivId: '2401.12345', version: 'v2' });
  });
});
