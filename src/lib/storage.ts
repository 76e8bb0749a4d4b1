import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

// "~/papers" -> "/home/me/papers"; relative paths resolve against baseDir.
export function resolveUserPath(p: string, baseDir = process.cwd()): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return path.resolve(baseDir, p);
}
