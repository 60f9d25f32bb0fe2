import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import {
  buildPartitionFile,
  type Candle,
  type CandleColumns,
  ConcurrentIngestionError,
  CorruptPartitionError,
  createInitialManifest,
  type DecodedPartition,
  decodePartition,
  DiscontinuityError,
  encodePartition,
  isAligned,
  isTempArtifact,
  MANIFEST_FILE,
  type PartitionEntry,
  parsePartitionFile,
  partitionPeriod,
  type RawCandle,
  type SeriesManifest,
  seriesDir,
  StaleWriteError,
  TEMP_MARKER,
  type Timeframe,
  TIMEFRAME_IDS,
  ValidationError,
} from "@candle-tape/candle-primitives";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { z } from "zod";
import { acquireWriterLock, hasErrorCode } from "./writerLock.ts";

interface CandleStoreOptions {
  root: string;
  logger: Logger;
  maxRowsPerPartition?: number;
}

export interface WriterLease {
  readonly symbol: string;
  readonly timeframe: Timeframe;
  release(): Promise<void>;
}

interface WriterState {
  lease: WriterLease;
  manifest: SeriesManifest;
  /** Committed rows of the unsealed partition, loaded on first use. */
  activeRows: RawCandle[] | null;
  limit: ReturnType<typeof pLimit>;
}

const DEFAULT_MAX_ROWS_PER_PARTITION = 100_000;

const manifestSchema = z.object({
  symbol: z.string(),
  timeframe: z.enum(TIMEFRAME_IDS),
  stepMs: z.number().int().positive(),
  watermark: z.number().int().nullable(),
  sequence: z.number().int().min(0),
  partitions: z.array(
    z.object({
      file: z.string(),
      sequence: z.number().int(),
      period: z.string(),
      firstOpenTime: z.number().int(),
      lastOpenTime: z.number().int(),
      rowCount: z.number().int().positive(),
      sealed: z.boolean(),
    }),
  ),
  updatedAtMs: z.number(),
});

/**
 * Append-only columnar store. One directory per (symbol, timeframe) holds
 * immutable partition files plus `manifest.json`, which records the
 * watermark and is replaced only after the partitions it lists are durable.
 */
export class CandleStore {
  private readonly root: string;
  private readonly logger: Logger;
  private readonly maxRowsPerPartition: number;
  private readonly writers = new Map<string, WriterState>();

  constructor(options: CandleStoreOptions) {
    this.root = path.resolve(options.root);
    this.logger = options.logger.child({ component: "candle-store" });
    this.maxRowsPerPartition =
      options.maxRowsPerPartition ?? DEFAULT_MAX_ROWS_PER_PARTITION;
  }

  /**
   * Takes the single-writer lock for a series and recovers it: leftover
   * temporary files are removed and complete partitions written after the
   * last manifest update are adopted or discarded.
   */
  async acquireWriter(symbol: string, timeframe: Timeframe): Promise<WriterLease> {
    const dir = this.seriesPath(symbol, timeframe);
    const lock = await acquireWriterLock(
      dir,
      { symbol, timeframe: timeframe.id },
      this.logger,
    );

    let manifest: SeriesManifest;
    try {
      manifest = await this.recover(dir, symbol, timeframe);
    } catch (error) {
      await lock.release();
      throw error;
    }

    const lease: WriterLease = {
      symbol,
      timeframe,
      release: async () => {
        if (this.writers.get(dir)?.lease === lease) {
          this.writers.delete(dir);
        }
        await lock.release();
      },
    };
    this.writers.set(dir, { lease, manifest, activeRows: null, limit: pLimit(1) });
    return lease;
  }

  async watermark(symbol: string, timeframe: Timeframe): Promise<number | null> {
    const dir = this.seriesPath(symbol, timeframe);
    const writer = this.writers.get(dir);
    if (writer) {
      return writer.manifest.watermark;
    }
    const manifest = await this.loadManifest(dir, timeframe);
    return manifest?.watermark ?? null;
  }

  /**
   * Last committed candle, used as the merge anchor.
   */
  async tail(symbol: string, timeframe: Timeframe): Promise<Candle | null> {
    const dir = this.seriesPath(symbol, timeframe);
    const writer = this.writers.get(dir);
    const manifest = writer?.manifest ?? (await this.loadManifest(dir, timeframe));
    const last = manifest?.partitions.at(-1);
    if (!manifest || !last) {
      return null;
    }

    let rows: RawCandle[];
    if (writer && !last.sealed) {
      rows = await this.loadActiveRows(dir, writer, timeframe);
    } else {
      rows = await this.readPartitionRows(dir, last, timeframe);
    }
    const row = rows.at(-1);
    return row ? toCandle(manifest.symbol, timeframe, row) : null;
  }

  /**
   * Durably appends a contiguous batch after the current watermark and
   * returns the new watermark. Without a lease the writer lock is taken for
   * the duration of the call.
   */
  async append(
    symbol: string,
    timeframe: Timeframe,
    batch: readonly Candle[],
    lease?: WriterLease,
  ): Promise<number | null> {
    const dir = this.seriesPath(symbol, timeframe);
    const writer = this.writers.get(dir);

    if (writer) {
      if (lease !== writer.lease) {
        throw new ConcurrentIngestionError(symbol, timeframe.id, "another writer holds the lease");
      }
      return writer.limit(() => this.commit(dir, writer, timeframe, batch));
    }
    if (lease) {
      throw new ConcurrentIngestionError(symbol, timeframe.id, "lease is no longer held");
    }

    const ownLease = await this.acquireWriter(symbol, timeframe);
    try {
      return await this.append(symbol, timeframe, batch, ownLease);
    } finally {
      await ownLease.release();
    }
  }

  /**
   * Streams committed candles with `start <= openTime < end`. Each
   * iteration re-reads from disk, and rows past the manifest's record are
   * never returned.
   */
  async *readRange(
    symbol: string,
    timeframe: Timeframe,
    start: number,
    end: number,
  ): AsyncGenerator<Candle> {
    const dir = this.seriesPath(symbol, timeframe);
    const manifest = await this.loadManifest(dir, timeframe);
    if (!manifest) {
      return;
    }

    for (const entry of manifest.partitions) {
      if (entry.lastOpenTime < start || entry.firstOpenTime >= end) {
        continue;
      }
      const rows = await this.readPartitionRows(dir, entry, timeframe);
      for (const row of rows) {
        if (row.openTime >= start && row.openTime < end) {
          yield toCandle(manifest.symbol, timeframe, row);
        }
      }
    }
  }

  async readColumns(
    symbol: string,
    timeframe: Timeframe,
    start: number,
    end: number,
  ): Promise<CandleColumns> {
    const columns: CandleColumns = {
      openTime: [],
      open: [],
      high: [],
      low: [],
      close: [],
      volume: [],
    };
    for await (const candle of this.readRange(symbol, timeframe, start, end)) {
      columns.openTime.push(candle.openTime);
      columns.open.push(candle.open);
      columns.high.push(candle.high);
      columns.low.push(candle.low);
      columns.close.push(candle.close);
      columns.volume.push(candle.volume);
    }
    return columns;
  }

  seriesPath(symbol: string, timeframe: Timeframe): string {
    return path.join(this.root, seriesDir(symbol, timeframe.id));
  }

  private async commit(
    dir: string,
    writer: WriterState,
    timeframe: Timeframe,
    batch: readonly Candle[],
  ): Promise<number | null> {
    const { manifest } = writer;
    if (batch.length === 0) {
      return manifest.watermark;
    }

    this.validateBatch(manifest, timeframe, batch);

    const partitions = manifest.partitions.map((entry) => ({ ...entry }));
    let sequence = manifest.sequence;
    let active = partitions.at(-1);
    if (active?.sealed) {
      active = undefined;
    }
    let activeRows = active ? [...(await this.loadActiveRows(dir, writer, timeframe))] : [];
    const writes: Array<{ entry: PartitionEntry; rows: RawCandle[] }> = [];

    for (const candle of batch) {
      const period = partitionPeriod(timeframe, candle.openTime);
      if (!active || active.period !== period || active.rowCount >= this.maxRowsPerPartition) {
        if (active) {
          active.sealed = true;
        }
        sequence += 1;
        active = {
          file: buildPartitionFile(period, sequence),
          sequence,
          period,
          firstOpenTime: candle.openTime,
          lastOpenTime: candle.openTime,
          rowCount: 0,
          sealed: false,
        };
        partitions.push(active);
        activeRows = [];
      }
      if (writes.at(-1)?.entry !== active) {
        writes.push({ entry: active, rows: activeRows });
      }
      activeRows.push(pickRow(candle));
      active.rowCount += 1;
      active.lastOpenTime = candle.openTime;
    }

    for (const { entry, rows } of writes) {
      await this.writeArtifact(dir, entry.file, encodePartition(timeframe.stepMs, rows));
    }

    const watermark = batch[batch.length - 1].openTime;
    const next: SeriesManifest = {
      ...manifest,
      watermark,
      sequence,
      partitions,
      updatedAtMs: Date.now(),
    };
    await this.writeManifest(dir, next);

    writer.manifest = next;
    writer.activeRows = activeRows;
    this.logger.debug(
      {
        symbol: manifest.symbol,
        timeframe: timeframe.id,
        rows: batch.length,
        watermark,
        partitions: writes.map(({ entry }) => entry.file),
      },
      "committed candles",
    );
    return watermark;
  }

  private validateBatch(
    manifest: SeriesManifest,
    timeframe: Timeframe,
    batch: readonly Candle[],
  ): void {
    const first = batch[0];
    const { watermark } = manifest;

    if (watermark !== null && first.openTime <= watermark) {
      throw new StaleWriteError(watermark, first.openTime);
    }
    if (watermark !== null && first.openTime !== watermark + timeframe.stepMs) {
      throw new DiscontinuityError(watermark + timeframe.stepMs, first.openTime);
    }
    if (!isAligned(timeframe, first.openTime)) {
      throw new ValidationError(`open time not aligned to ${timeframe.id}`, first.openTime);
    }

    batch.forEach((candle, index) => {
      if (candle.timeframe !== timeframe.id) {
        throw new ValidationError(`candle timeframe ${candle.timeframe} in ${timeframe.id} batch`, candle.openTime);
      }
      if (index > 0 && candle.openTime !== batch[index - 1].openTime + timeframe.stepMs) {
        throw new DiscontinuityError(batch[index - 1].openTime + timeframe.stepMs, candle.openTime);
      }
    });
  }

  private async recover(
    dir: string,
    symbol: string,
    timeframe: Timeframe,
  ): Promise<SeriesManifest> {
    const stored = await this.loadManifest(dir, timeframe);
    const manifest = stored ?? createInitialManifest(symbol, timeframe);
    const partitions = manifest.partitions.map((entry) => ({ ...entry }));
    let { watermark, sequence } = manifest;
    let adopted = 0;

    const files = await fs.readdir(dir);
    for (const file of files.filter(isTempArtifact)) {
      this.logger.warn({ dir, file }, "removing unfinished artifact");
      await fs.rm(path.join(dir, file), { force: true });
    }

    // The active partition may have been replaced before the manifest was.
    const last = partitions.at(-1);
    if (last) {
      const { header } = await this.decodeEntry(dir, last, timeframe);
      if (header.lastOpenTime > last.lastOpenTime) {
        last.lastOpenTime = header.lastOpenTime;
        last.rowCount = header.rowCount;
        watermark = header.lastOpenTime;
        adopted += 1;
      }
    }

    const orphans = files
      .map((file) => ({ file, parsed: parsePartitionFile(file) }))
      .filter(({ parsed }) => parsed !== null && parsed.sequence > manifest.sequence)
      .sort((a, b) => (a.parsed?.sequence ?? 0) - (b.parsed?.sequence ?? 0));

    for (const { file, parsed } of orphans) {
      if (!parsed) {
        continue;
      }
      const candidate = await this.inspectOrphan(dir, file, timeframe);
      const expectedFirst = watermark === null ? null : watermark + timeframe.stepMs;
      if (
        candidate &&
        (expectedFirst === null || candidate.firstOpenTime === expectedFirst) &&
        isAligned(timeframe, candidate.firstOpenTime)
      ) {
        const previous = partitions.at(-1);
        if (previous) {
          previous.sealed = true;
        }
        partitions.push({
          file,
          sequence: parsed.sequence,
          period: parsed.period,
          firstOpenTime: candidate.firstOpenTime,
          lastOpenTime: candidate.lastOpenTime,
          rowCount: candidate.rowCount,
          sealed: false,
        });
        sequence = parsed.sequence;
        watermark = candidate.lastOpenTime;
        adopted += 1;
      } else {
        this.logger.warn({ dir, file }, "discarding orphaned partition");
        await fs.rm(path.join(dir, file), { force: true });
      }
    }

    if (adopted === 0) {
      return manifest;
    }

    const recovered: SeriesManifest = {
      ...manifest,
      watermark,
      sequence,
      partitions,
      updatedAtMs: Date.now(),
    };
    await this.writeManifest(dir, recovered);
    this.logger.info(
      { symbol, timeframe: timeframe.id, adopted, watermark },
      "adopted partitions written before an interrupted commit",
    );
    return recovered;
  }

  private async inspectOrphan(
    dir: string,
    file: string,
    timeframe: Timeframe,
  ): Promise<{ firstOpenTime: number; lastOpenTime: number; rowCount: number } | null> {
    try {
      const { header } = decodePartition(await fs.readFile(path.join(dir, file)));
      if (header.stepMs !== timeframe.stepMs) {
        return null;
      }
      return header;
    } catch (error) {
      this.logger.warn({ dir, file, error }, "orphaned partition failed validation");
      return null;
    }
  }

  private async loadActiveRows(
    dir: string,
    writer: WriterState,
    timeframe: Timeframe,
  ): Promise<RawCandle[]> {
    if (!writer.activeRows) {
      const last = writer.manifest.partitions.at(-1);
      writer.activeRows =
        last && !last.sealed ? await this.readPartitionRows(dir, last, timeframe) : [];
    }
    return writer.activeRows;
  }

  private async readPartitionRows(
    dir: string,
    entry: PartitionEntry,
    timeframe: Timeframe,
  ): Promise<RawCandle[]> {
    const { rows } = await this.decodeEntry(dir, entry, timeframe);
    return rows.filter((row) => row.openTime <= entry.lastOpenTime);
  }

  private async decodeEntry(
    dir: string,
    entry: PartitionEntry,
    timeframe: Timeframe,
  ): Promise<DecodedPartition> {
    const filePath = path.join(dir, entry.file);
    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        throw new CorruptPartitionError(filePath, "listed in manifest but missing", { cause: error });
      }
      throw error;
    }

    let decoded: DecodedPartition;
    try {
      decoded = decodePartition(bytes);
    } catch (error) {
      throw new CorruptPartitionError(
        filePath,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    const { header } = decoded;
    if (header.stepMs !== timeframe.stepMs) {
      throw new CorruptPartitionError(filePath, `step ${header.stepMs} does not match ${timeframe.id}`);
    }
    if (header.firstOpenTime !== entry.firstOpenTime || header.lastOpenTime < entry.lastOpenTime) {
      throw new CorruptPartitionError(filePath, "rows do not cover the range recorded in the manifest");
    }
    return decoded;
  }

  private async loadManifest(dir: string, timeframe: Timeframe): Promise<SeriesManifest | null> {
    const manifestPath = path.join(dir, MANIFEST_FILE);
    let data: string;
    try {
      data = await fs.readFile(manifestPath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (error) {
      throw new CorruptPartitionError(manifestPath, "manifest is not valid JSON", { cause: error });
    }
    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) {
      throw new CorruptPartitionError(manifestPath, parsed.error.message, { cause: parsed.error });
    }
    if (parsed.data.stepMs !== timeframe.stepMs) {
      throw new CorruptPartitionError(manifestPath, `manifest step does not match ${timeframe.id}`);
    }
    return parsed.data;
  }

  private async writeManifest(dir: string, manifest: SeriesManifest): Promise<void> {
    await this.writeArtifact(
      dir,
      MANIFEST_FILE,
      Buffer.from(JSON.stringify(manifest, null, 2), "utf-8"),
    );
  }

  /**
   * Writes to a temporary sibling, fsyncs it and renames it into place, so
   * the target is either the old file or the complete new one.
   */
  private async writeArtifact(dir: string, file: string, bytes: Uint8Array): Promise<void> {
    await this.ensureDir(dir);
    const finalPath = path.join(dir, file);
    const tempPath = `${finalPath}${TEMP_MARKER}${process.pid}-${randomUUID().slice(0, 8)}`;

    try {
      const handle = await fs.open(tempPath, "w");
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, finalPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    await this.syncDir(dir);
  }

  private async syncDir(dir: string): Promise<void> {
    try {
      const handle = await fs.open(dir, "r");
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      // Directories cannot be opened for fsync on every platform.
      if (!hasErrorCode(error, "EISDIR") && !hasErrorCode(error, "EPERM")) {
        throw error;
      }
    }
  }

  private async ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

function pickRow({ openTime, open, high, low, close, volume }: Candle): RawCandle {
  return { openTime, open, high, low, close, volume };
}

function toCandle(symbol: string, timeframe: Timeframe, row: RawCandle): Candle {
  return Object.freeze({ symbol, timeframe: timeframe.id, ...row });
}
