import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import { AuditResult, AuditRun, BatchSummary, InvoiceRecord } from './types';

const runRowsSchema = z.array(
  z.object({
    id: z.number(),
    startedAt: z.string(),
    pdfFolder: z.string(),
    poCsv: z.string(),
    outputPath: z.string(),
    processed: z.number().nullable(),
    matched: z.number().nullable(),
    failed: z.number().nullable(),
  })
);

const resultRowsSchema = z.array(
  z
    .object({
      runId: z.number(),
      file: z.string(),
      invoiceNumber: z.string().nullable(),
      vendor: z.string().nullable(),
      date: z.string().nullable(),
      total: z.string().nullable(),
      matched: z.number(), // SQLite has no boolean type
    })
    .transform(row => ({ ...row, matched: row.matched === 1 }))
);

/** SQLite history of batch runs, one row per processed document. */
export class AuditStore {
  private db: sqlite3.Database;
  private ready: Promise<void>;

  constructor(filePath: string = 'audit/runs.sqlite') {
    if (filePath !== ':memory:') {
      // Ensure directory exists
      const dir = path.dirname(filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    let settle: (err: Error | null) => void = () => undefined;
    const opened = new Promise<void>((resolve, reject) => {
      settle = err => (err ? reject(err) : resolve());
    });
    this.db = new sqlite3.Database(filePath, err => settle(err));
    this.ready = this.init(opened);
    // Marked handled here; the failure is raised by open() or the first query
    this.ready.catch(() => undefined);
  }

  /** Opens the store and creates its tables; rejects when the file cannot be opened. */
  static async open(filePath: string): Promise<AuditStore> {
    const store = new AuditStore(filePath);
    await store.ready;
    return store;
  }

  private async init(opened: Promise<void>): Promise<void> {
    await opened;
    await this.execute(`
      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        startedAt TEXT,
        pdfFolder TEXT,
        poCsv TEXT,
        outputPath TEXT,
        processed INTEGER,
        matched INTEGER,
        failed INTEGER
      )
    `);
    await this.execute(`
      CREATE TABLE IF NOT EXISTS results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        runId INTEGER REFERENCES runs(id),
        file TEXT,
        invoiceNumber TEXT,
        vendor TEXT,
        date TEXT,
        total TEXT,
        matched INTEGER
      )
    `);
  }

  // Helpers to wrap the callback API in Promises
  private execute(sql: string, params: unknown[] = []): Promise<number> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (err) {
        if (err) reject(err);
        else resolve(this.lastID);
      });
    });
  }

  private query(sql: string, params: unknown[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }

  async startRun(pdfFolder: string, poCsv: string, outputPath: string): Promise<number> {
    await this.ready;
    return this.execute(
      `INSERT INTO runs (startedAt, pdfFolder, poCsv, outputPath) VALUES (?, ?, ?, ?)`,
      [new Date().toISOString(), pdfFolder, poCsv, outputPath]
    );
  }

  async addResult(runId: number, record: InvoiceRecord): Promise<void> {
    await this.ready;
    await this.execute(
      `INSERT INTO results (runId, file, invoiceNumber, vendor, date, total, matched) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [runId, record.file, record.invoice_number, record.vendor, record.date, record.total, record.matched ? 1 : 0]
    );
  }

  async finishRun(runId: number, summary: BatchSummary): Promise<void> {
    await this.ready;
    await this.execute(
      `UPDATE runs SET processed = ?, matched = ?, failed = ? WHERE id = ?`,
      [summary.processed, summary.matched, summary.failed, runId]
    );
  }

  async getRun(runId: number): Promise<AuditRun | null> {
    await this.ready;
    const rows = runRowsSchema.parse(await this.query(
      `SELECT id, startedAt, pdfFolder, poCsv, outputPath, processed, matched, failed FROM runs WHERE id = ?`,
      [runId]
    ));
    return rows[0] ?? null;
  }

  async getRunResults(runId: number): Promise<AuditResult[]> {
    await this.ready;
    return resultRowsSchema.parse(await this.query(
      `SELECT runId, file, invoiceNumber, vendor, date, total, matched FROM results WHERE runId = ? ORDER BY id`,
      [runId]
    ));
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
