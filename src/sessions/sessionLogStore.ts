import fs from "fs/promises";
import path from "path";

import { isMissingFile } from "../utils/fsErrors";
import { logger } from "../utils/logger";
import { sessionRecordSchema, type SessionRecord } from "./sessionRecord";

export interface ParsedSessionLog {
  sessions: SessionRecord[];
  skipped: number;
}

/**
 * Completed sessions kept as one JSON array on disk. Appends are serialized
 * and written through a temp file, so readers never see a partial array.
 */
export class SessionLogStore {
  private readonly logFile: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(logFile: string) {
    this.logFile = logFile;
  }

  getPath(): string {
    return this.logFile;
  }

  async readRaw(): Promise<unknown[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.logFile, "utf8");
    } catch (err: unknown) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    if (!raw.trim()) return [];

    const data: unknown = JSON.parse(raw);
    if (!Array.isArray(data)) {
      throw new Error(`Session log ${this.logFile} does not contain a JSON array`);
    }
    return data;
  }

  /**
   * Records that fail validation are dropped and counted.
   */
  async readSessions(): Promise<ParsedSessionLog> {
    const entries = await this.readRaw();
    const sessions: SessionRecord[] = [];
    let skipped = 0;

    entries.forEach((entry, index) => {
      const parsed = sessionRecordSchema.safeParse(entry);
      if (parsed.success) {
        sessions.push(parsed.data);
      } else {
        skipped += 1;
        logger.warn({ index, issues: parsed.error.issues.length }, "session_record_skipped");
      }
    });

    return { sessions, skipped };
  }

  async append(record: SessionRecord): Promise<void> {
    const next = this.writeChain.then(async () => {
      const existing = await this.readRaw();
      existing.push(record);
      await this.rewriteFile(existing);
      logger.info({ sessionId: record.sessionId, total: existing.length }, "session_record_appended");
    });

    // Keep the chain usable after a failed write; the caller still sees the error.
    this.writeChain = next.catch((err: unknown) => {
      logger.error({ err, logFile: this.logFile }, "session_log_append_failed");
    });

    await next;
  }

  private async rewriteFile(entries: unknown[]): Promise<void> {
    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
    const tmp = `${this.logFile}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(entries, null, 2) + "\n", "utf8");
    await fs.rename(tmp, this.logFile);
  }
}
