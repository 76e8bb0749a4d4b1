import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { resolveUserPath } from './storage.js';
import type { AppConfig } from './types.js';

const jsonPath = z
  .string()
  .min(1)
  .refine((p) => path.extname(p) === '.json', 'Database should be in JSON format');

const AppConfigSchema = z.object({
  storage: z
    .object({
      dbPath: jsonPath.default('arxiv_db.json'),
      pdfDir: z.string().min(1).default('pdfs'),
    })
    .default({}),
  arxiv: z
    .object({
      idsPerRequest: z.number().int().min(1).max(100).default(10),
      politenessDelayMs: z.number().int().min(0).default(3000),
    })
    .default({}),
  shiori: z
    .object({
      // any of these may come from --address/--user/--password instead
      address: z.string().url().optional(),
      username: z.string().min(1).optional(),
      password: z.string().min(1).optional(),
      createArchive: z.boolean().default(true),
      public: z.boolean().default(true),
      tags: z.array(z.string().min(1)).default([]),
    })
    .optional(),
});

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  // An empty file parses to null; treat it as "all defaults".
  return YAML.parse(raw) ?? {};
}

export function parseConfig(raw: unknown, baseDir: string): AppConfig {
  const parsed = AppConfigSchema.parse(raw);
  return {
    ...parsed,
    storage: {
      dbPath: resolveUserPath(parsed.storage.dbPath, baseDir),
      pdfDir: resolveUserPath(parsed.storage.pdfDir, baseDir),
    },
  };
}

export function loadConfig(repoRoot: string): AppConfig {
  const configPath = path.join(repoRoot, 'config.yml');
  if (!fs.existsSync(configPath)) {
    throw new Error(`Missing config.yml at ${configPath}. Copy config.example.yml → config.yml and edit.`);
  }
  return parseConfig(loadYamlFile(configPath), repoRoot);
}
