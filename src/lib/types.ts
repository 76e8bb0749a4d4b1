export type IsoDateTime = string;

export interface ShioriConfig {
  address?: string;
  username?: string;
  password?: string;
  createArchive: boolean;
  public: boolean;
  tags: string[];
}

export interface AppConfig {
  storage: {
    dbPath: string; // absolute after loadConfig
    pdfDir: string;
  };
  arxiv: {
    idsPerRequest: number;
    politenessDelayMs: number;
  };
  shiori?: ShioriConfig;
}

export interface PreprintRecord {
  arxivId: string; // canonical, no version
  version: string; // v1, v2, ...
  title: string;
  authors: string[];
  summary: string;
  url: string; // pdf
  absUrl: string;
  categories: string[];
  tags: string[];
  publishedAt: IsoDateTime;
  updatedAt: IsoDateTime;
  addedAt: IsoDateTime;
}
