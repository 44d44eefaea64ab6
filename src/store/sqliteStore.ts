import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { joinAuthors, PaperRecord, splitStoredAuthors, StoredPaperRow } from "../types";
import { RecordStore, RecordStoreOptions, StoreStats } from "./types";

const MEMORY_PATH = ":memory:";

type PaperRow = {
  id: number;
  title: string;
  authors: string | null;
  pub_date: string | null;
  page: number | null;
  file_name: string | null;
  created_at: string;
};

export class SqliteRecordStore implements RecordStore {
  private readonly db: Database.Database;
  private readonly options: RecordStoreOptions;

  constructor(options: RecordStoreOptions) {
    this.options = options;
    if (options.path === MEMORY_PATH) {
      this.db = new Database(MEMORY_PATH);
    } else {
      const absolutePath = path.resolve(options.path);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }

    try {
      this.initializeSchema();
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  save(record: PaperRecord, createdAt: string): number {
    const params = {
      title: record.title,
      authors: joinAuthors(record.authors),
      pubDate: record.pubDate,
      page: record.page,
      fileName: record.fileName ?? null,
    };

    if (this.options.duplicatePolicy === "upsert_by_title") {
      const existing = this.db
        .prepare("SELECT id FROM papers WHERE title = ? ORDER BY id DESC LIMIT 1")
        .get(record.title) as { id: number } | undefined;
      if (existing) {
        this.db
          .prepare(
            `
            UPDATE papers
            SET
              authors = @authors,
              pub_date = @pubDate,
              page = @page,
              file_name = COALESCE(@fileName, file_name)
            WHERE id = @id
          `,
          )
          .run({ ...params, id: existing.id });
        return existing.id;
      }
    }

    const result = this.db
      .prepare(
        `
        INSERT INTO papers (title, authors, pub_date, page, file_name, created_at)
        VALUES (@title, @authors, @pubDate, @page, @fileName, @createdAt)
      `,
      )
      .run({ ...params, createdAt });
    return Number(result.lastInsertRowid);
  }

  listRecords(limit = 1000): StoredPaperRow[] {
    const rows = this.db
      .prepare(
        `
        SELECT id, title, authors, pub_date, page, file_name, created_at
        FROM papers
        ORDER BY id ASC
        LIMIT ?
      `,
      )
      .all(limit) as PaperRow[];

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      authors: splitStoredAuthors(row.authors ?? ""),
      pubDate: row.pub_date ?? "",
      page: row.page ?? 0,
      fileName: row.file_name,
      createdAt: row.created_at,
    }));
  }

  getStats(): StoreStats {
    const row = this.db
      .prepare(
        `
        SELECT
          COUNT(*) AS totalRecords,
          COUNT(file_name) AS withFile,
          COUNT(DISTINCT title) AS distinctTitles
        FROM papers
      `,
      )
      .get() as StoreStats;
    return {
      totalRecords: row.totalRecords,
      withFile: row.withFile,
      distinctTitles: row.distinctTitles,
    };
  }

  close(): void {
    this.db.close();
  }

  private initializeSchema(): void {
    if (this.options.resetOnOpen) {
      this.db.exec("DROP TABLE IF EXISTS papers");
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS papers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        authors TEXT,
        pub_date TEXT,
        page INTEGER,
        file_name TEXT,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_papers_title ON papers(title);
    `);
  }
}
