import fs from 'node:fs/promises';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { PICK_TYPES } from '../types/prediction.js';
import {
  CONFIDENCE_BANDS,
  INJURY_FLAGS,
  LEDGER_COLUMNS,
  VARIANCE_FLAGS,
} from '../types/record.js';
import type { PerformanceRecord } from '../types/record.js';
import type { ValidatedRecord } from './record-schema.js';
import { ledgerKey } from '../pipeline/dedup.js';
import { PersistenceError } from '../errors.js';
import { round2 } from '../utils/math.js';
import { logger } from '../utils/logger.js';

/** Append-only store for performance records. */
export interface LedgerStore {
  /** Create the ledger (directory + header row) if it is missing. */
  ensureStorage(): Promise<void>;
  append(record: ValidatedRecord): Promise<void>;
  /**
   * Append unless a row with the same ledgerKey() is already present.
   * The check and the write happen as one step. Resolves to false when nothing was written.
   */
  appendIfAbsent(record: ValidatedRecord): Promise<boolean>;
  exists(date: string, gameId: string, pickType: string): Promise<boolean>;
  /** ledgerKey() of every row already written */
  keys(): Promise<Set<string>>;
  readAll(): Promise<PerformanceRecord[]>;
}

const HEADER_LINE = LEDGER_COLUMNS.join(',');

const keyRowSchema = z.object({
  date: z.string(),
  game_id: z.string(),
  pick_type: z.string(),
});

const ledgerRowSchema = z
  .object({
    date: z.string(),
    game_id: z.string(),
    pick_type: z.enum(PICK_TYPES),
    edge_points: z.coerce.number().finite(),
    model_line: z.coerce.number().finite(),
    market_line: z.coerce.number().finite(),
    result_correct: z.enum(['TRUE', 'FALSE']),
    confidence_band: z.enum(CONFIDENCE_BANDS),
    variance_flag: z.enum(VARIANCE_FLAGS),
    injury_flag: z.enum(INJURY_FLAGS),
    notes: z.string(),
  })
  .transform(
    (row): PerformanceRecord => ({
      date: row.date,
      gameId: row.game_id,
      pickType: row.pick_type,
      edgePoints: row.edge_points,
      modelLine: row.model_line,
      marketLine: row.market_line,
      resultCorrect: row.result_correct === 'TRUE',
      confidenceBand: row.confidence_band,
      varianceFlag: row.variance_flag,
      injuryFlag: row.injury_flag,
      notes: row.notes,
    }),
  );

function rowKey(row: z.output<typeof keyRowSchema>): string {
  return ledgerKey({ date: row.date, gameId: row.game_id, pickType: row.pick_type });
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function toLedgerRow(record: PerformanceRecord): Array<string | number> {
  return [
    record.date,
    record.gameId,
    record.pickType,
    round2(record.edgePoints),
    round2(record.modelLine),
    round2(record.marketLine),
    record.resultCorrect ? 'TRUE' : 'FALSE',
    record.confidenceBand,
    record.varianceFlag,
    record.injuryFlag,
    record.notes,
  ];
}

/**
 * CSV ledger. Every write replaces the file through a flushed temporary sibling
 * and a rename, so an interrupted write leaves the previous file intact.
 * Writes from one process are serialized.
 */
export class CsvLedgerStore implements LedgerStore {
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  ensureStorage(): Promise<void> {
    return this.serialize(async () => {
      await this.prepare();
    });
  }

  append(record: ValidatedRecord): Promise<void> {
    return this.serialize(async () => {
      await this.writeRow(await this.prepare(), record);
    });
  }

  appendIfAbsent(record: ValidatedRecord): Promise<boolean> {
    return this.serialize(async () => {
      const current = await this.prepare();
      const key = ledgerKey(record);
      if (this.parseContent(current, keyRowSchema).some((r) => rowKey(r) === key)) return false;
      await this.writeRow(current, record);
      return true;
    });
  }

  async exists(date: string, gameId: string, pickType: string): Promise<boolean> {
    const keys = await this.keys();
    return keys.has(ledgerKey({ date, gameId, pickType }));
  }

  async keys(): Promise<Set<string>> {
    const rows = await this.parseRows(keyRowSchema);
    return new Set(rows.map(rowKey));
  }

  readAll(): Promise<PerformanceRecord[]> {
    return this.parseRows(ledgerRowSchema);
  }

  private async writeRow(current: string, record: ValidatedRecord): Promise<void> {
    const base = current.endsWith('\n') ? current : `${current}\n`;
    await this.writeAtomically(base + stringify([toLedgerRow(record)]));
    logger.debug(
      { gameId: record.gameId, pickType: record.pickType, date: record.date },
      'Ledger row appended',
    );
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // failures reach the caller through `run`; the queue only tracks ordering
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Ensures the file exists with the expected header and returns its content. */
  private async prepare(): Promise<string> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    } catch (err) {
      throw new PersistenceError(this.filePath, 'Cannot create ledger directory', { cause: err });
    }

    const content = await this.readIfExists();
    if (content === null || content.trim() === '') {
      const header = stringify([[...LEDGER_COLUMNS]]);
      await this.writeAtomically(header);
      logger.info({ path: this.filePath }, 'Created performance ledger');
      return header;
    }

    const [firstLine] = content.split(/\r?\n/, 1);
    if (firstLine !== HEADER_LINE) {
      throw new PersistenceError(this.filePath, `Unexpected ledger header: ${firstLine ?? ''}`);
    }
    return content;
  }

  private async readIfExists(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new PersistenceError(this.filePath, 'Cannot read ledger', { cause: err });
    }
  }

  private async writeAtomically(content: string): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;
    try {
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      // keep the write failure as the reported cause
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn({ err: rmErr, tmpPath }, 'Could not remove temporary ledger file');
      });
      throw new PersistenceError(this.filePath, 'Ledger write failed', { cause: err });
    }
  }

  private async parseRows<S extends z.ZodTypeAny>(schema: S): Promise<z.output<S>[]> {
    const content = await this.readIfExists();
    if (content === null) return [];
    return this.parseContent(content, schema);
  }

  private parseContent<S extends z.ZodTypeAny>(content: string, schema: S): z.output<S>[] {
    let rows: unknown;
    try {
      rows = parse(content, { columns: true, skip_empty_lines: true });
    } catch (err) {
      throw new PersistenceError(this.filePath, 'Ledger is not valid CSV', { cause: err });
    }

    const parsed = z.array(schema).safeParse(rows);
    if (!parsed.success) {
      const row = parsed.error.issues[0]?.path[0];
      throw new PersistenceError(this.filePath, `Malformed ledger row ${String(row)}`);
    }
    return parsed.data;
  }
}
