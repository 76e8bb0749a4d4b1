/**
 * Readers for the bulk-import formats: a Pocket CSV export
 * (title,url,time_added,tags,status) and plain text id lists.
 */

// RFC 4180: quoted fields may hold commas, newlines and doubled quotes.
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field || row.length) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function parsePocketCsv(text: string): string[] {
  const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ''));
  if (!header) return [];
  const urlCol = header.findIndex((h) => h.trim().toLowerCase() === 'url');
  if (urlCol < 0) throw new Error('Pocket export has no "url" column');

  return rows.map((r) => (r[urlCol] ?? '').trim()).filter(Boolean);
}

export function parseIdList(text: string, sep = ','): string[] {
  return text
    .split(sep)
    .map((s) => s.trim())
    .filter(Boolean);
}
