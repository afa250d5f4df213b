/**
 * AuditTrail
 * Append-only operation log, one JSONL file per UTC day (audit_YYYYMMDD.jsonl).
 * Entries are never updated or deleted.
 */

import { Mutex } from 'async-mutex';
import { createHash, randomBytes } from 'crypto';
import { existsSync } from 'fs';
import { appendFile, mkdir, open, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { lock } from 'proper-lockfile';
import { z } from 'zod';
import { AuditWriteError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

export type AuditStatus = 'completed' | 'failed' | 'denied';

export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  operationType: z.string(),
  agent: z.string(),
  inputs: z.record(z.unknown()),
  outputs: z.record(z.unknown()),
  citations: z.array(z.string()),
  status: z.enum(['completed', 'failed', 'denied']),
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export interface AuditEntryInput {
  operationType: string;
  agent: string;
  inputs?: Record<string, unknown>;
  outputs?: Record<string, unknown>;
  citations?: readonly string[];
  status?: AuditStatus;
}

export interface AuditFilters {
  operationType?: string;
  agent?: string;
  status?: AuditStatus;
  since?: Date;
  until?: Date;
}

export interface DailyStats {
  date: string;
  totalOperations: number;
  byType: Record<string, number>;
  byAgent: Record<string, number>;
}

export interface AuditStatistics {
  totalOperations: number;
  uniqueAgents: number;
  byType: Record<string, number>;
  byAgent: Record<string, number>;
  byStatus: Record<string, number>;
  byDate: Record<string, number>;
}

export interface AuditTrailOptions {
  now?: () => Date;
  logger?: Logger;
  /** Days covered by a query without `since`. */
  defaultRangeDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const EXPORT_LIMIT = 10_000;

/** UTC day key, `YYYYMMDD`. */
export const dayKey = (date: Date): string => date.toISOString().slice(0, 10).replace(/-/g, '');

export const auditFileName = (date: Date): string => `audit_${dayKey(date)}.jsonl`;

const increment = (counts: Record<string, number>, key: string) => {
  counts[key] = (counts[key] ?? 0) + 1;
};

export class AuditTrail {
  private readonly mutex = new Mutex();
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly defaultRangeDays: number;

  constructor(
    readonly logDir: string,
    options: AuditTrailOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('AuditTrail');
    this.defaultRangeDays = options.defaultRangeDays ?? 30;
  }

  /** Durably appends one entry and returns its id. Throws AuditWriteError on any failure. */
  async append(input: AuditEntryInput): Promise<string> {
    const now = this.now();
    const timestamp = now.toISOString();
    const entry: AuditEntry = {
      id: createHash('sha256')
        .update(timestamp + randomBytes(8).toString('hex'))
        .digest('hex')
        .slice(0, 12),
      timestamp,
      operationType: input.operationType,
      agent: input.agent,
      inputs: input.inputs ?? {},
      outputs: input.outputs ?? {},
      citations: [...(input.citations ?? [])],
      status: input.status ?? 'completed',
    };

    const file = join(this.logDir, auditFileName(now));
    try {
      await this.mutex.runExclusive(() => this.withFileLock(file, () => this.writeLine(file, JSON.stringify(entry))));
    } catch (e) {
      this.logger.error(`Audit write failed for ${file}`, e);
      throw new AuditWriteError(file, { cause: e });
    }

    this.logger.debug(`Logged ${entry.operationType} by ${entry.agent} (${entry.id})`);
    return entry.id;
  }

  /** Matching entries, newest first. Only the day files inside the range are read. */
  async query(filters: AuditFilters = {}, limit = 100): Promise<AuditEntry[]> {
    const until = filters.until ?? this.now();
    const since = filters.since ?? new Date(until.getTime() - this.defaultRangeDays * DAY_MS);
    const results: AuditEntry[] = [];
    if (limit <= 0) return results;

    for (const file of this.filesInRange(since, until)) {
      const entries = await this.readDay(file);
      for (const entry of entries.reverse()) {
        if (!this.matches(entry, filters, since, until)) continue;
        results.push(entry);
        if (results.length >= limit) return results;
      }
    }
    return results;
  }

  async dailyStats(date: Date = this.now()): Promise<DailyStats> {
    const stats: DailyStats = { date: dayKey(date), totalOperations: 0, byType: {}, byAgent: {} };
    for (const entry of await this.readDay(join(this.logDir, auditFileName(date)))) {
      stats.totalOperations++;
      increment(stats.byType, entry.operationType);
      increment(stats.byAgent, entry.agent);
    }
    return stats;
  }

  async statistics(filters: AuditFilters = {}): Promise<AuditStatistics> {
    const entries = await this.query(filters, EXPORT_LIMIT);
    const stats: AuditStatistics = {
      totalOperations: entries.length,
      uniqueAgents: new Set(entries.map((e) => e.agent)).size,
      byType: {},
      byAgent: {},
      byStatus: {},
      byDate: {},
    };
    for (const entry of entries) {
      increment(stats.byType, entry.operationType);
      increment(stats.byAgent, entry.agent);
      increment(stats.byStatus, entry.status);
      increment(stats.byDate, entry.timestamp.slice(0, 10));
    }
    return stats;
  }

  /** Writes matching entries as a JSON array to a file that must not exist yet. Returns the entry count. */
  async export(outputFile: string, filters: AuditFilters = {}): Promise<number> {
    const entries = await this.query(filters, EXPORT_LIMIT);
    await writeFile(outputFile, JSON.stringify(entries, null, 2), { encoding: 'utf-8', flag: 'wx' });
    this.logger.info(`Exported ${entries.length} audit entries to ${outputFile}`);
    return entries.length;
  }

  private filesInRange(since: Date, until: Date): string[] {
    const files: string[] = [];
    const first = Date.UTC(since.getUTCFullYear(), since.getUTCMonth(), since.getUTCDate());
    for (
      let day = Date.UTC(until.getUTCFullYear(), until.getUTCMonth(), until.getUTCDate());
      day >= first;
      day -= DAY_MS
    ) {
      files.push(join(this.logDir, auditFileName(new Date(day))));
    }
    return files;
  }

  private matches(entry: AuditEntry, filters: AuditFilters, since: Date, until: Date): boolean {
    if (filters.operationType && entry.operationType !== filters.operationType) return false;
    if (filters.agent && entry.agent !== filters.agent) return false;
    if (filters.status && entry.status !== filters.status) return false;
    const at = Date.parse(entry.timestamp);
    return at >= since.getTime() && at <= until.getTime();
  }

  private async readDay(file: string): Promise<AuditEntry[]> {
    if (!existsSync(file)) return [];

    const entries: AuditEntry[] = [];
    const content = await readFile(file, 'utf-8');
    for (const [index, line] of content.split('\n').entries()) {
      if (!line.trim()) continue;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        this.logger.warn(`Skipping malformed audit line ${index + 1} in ${file}`);
        continue;
      }
      const parsed = AuditEntrySchema.safeParse(value);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        this.logger.warn(`Skipping invalid audit line ${index + 1} in ${file}`);
      }
    }
    return entries;
  }

  // In-process mutex first, then a cross-process lock on the day file.
  private async withFileLock<T>(file: string, action: () => Promise<T>): Promise<T> {
    if (!existsSync(this.logDir)) {
      await mkdir(this.logDir, { recursive: true });
    }
    await appendFile(file, '');

    const release = await lock(file, {
      retries: { retries: 20, factor: 2, minTimeout: 50, maxTimeout: 1000, randomize: true },
      stale: 10000,
    });
    try {
      return await action();
    } finally {
      await release();
    }
  }

  private async writeLine(file: string, line: string): Promise<void> {
    const handle = await open(file, 'a');
    try {
      await handle.write(line + '\n', null, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
