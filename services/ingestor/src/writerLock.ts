import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import {
  ConcurrentIngestionError,
  type SeriesKey,
  WRITER_LOCK_FILE,
} from "@candle-tape/candle-primitives";
import type { Logger } from "pino";

export interface WriterLock {
  readonly path: string;
  release(): Promise<void>;
}

interface LockHolder {
  pid: number;
  acquiredAtMs: number;
}

type HolderRead =
  | { state: "missing" }
  | { state: "unreadable" }
  | { state: "held"; holder: LockHolder };

const MAX_LOCK_ATTEMPTS = 3;

// Series directories locked by this process.
const heldSeries = new Set<string>();

/**
 * Claims the single-writer lock for a series directory. The in-process
 * registry is claimed before the first await, so of two concurrent callers
 * the first always wins; the lock file excludes other processes.
 */
export async function acquireWriterLock(
  seriesDir: string,
  series: SeriesKey,
  logger: Logger,
): Promise<WriterLock> {
  const key = path.resolve(seriesDir);
  if (heldSeries.has(key)) {
    throw new ConcurrentIngestionError(series.symbol, series.timeframe, "held by this process");
  }
  heldSeries.add(key);

  const lockPath = path.join(key, WRITER_LOCK_FILE);
  try {
    await fs.mkdir(key, { recursive: true });
    await createLockFile(lockPath, series, logger);
  } catch (error) {
    heldSeries.delete(key);
    throw error;
  }

  let released = false;
  return {
    path: lockPath,
    async release() {
      if (released) {
        return;
      }
      released = true;
      try {
        await fs.rm(lockPath, { force: true });
      } finally {
        heldSeries.delete(key);
      }
    },
  };
}

async function createLockFile(
  lockPath: string,
  series: SeriesKey,
  logger: Logger,
): Promise<void> {
  for (let attempt = 0; attempt < MAX_LOCK_ATTEMPTS; attempt += 1) {
    if (await publishLock(lockPath)) {
      return;
    }

    const read = await readHolder(lockPath);
    if (read.state === "missing") {
      continue;
    }
    // An empty or partial file may belong to a writer that is still starting.
    if (read.state === "unreadable") {
      throw new ConcurrentIngestionError(
        series.symbol,
        series.timeframe,
        "lock file is unreadable",
      );
    }
    if (isProcessAlive(read.holder.pid)) {
      throw new ConcurrentIngestionError(
        series.symbol,
        series.timeframe,
        `locked by pid ${read.holder.pid}`,
      );
    }
    await reclaimStaleLock(lockPath, read.holder, series, logger);
  }

  throw new ConcurrentIngestionError(series.symbol, series.timeframe, "lock file contended");
}

/**
 * Writes the holder record beside the lock and hard-links it into place,
 * so the lock file never exists without its content. Returns `false` when
 * a lock is already present.
 */
async function publishLock(lockPath: string): Promise<boolean> {
  const pendingPath = `${lockPath}.pending-${process.pid}-${randomUUID().slice(0, 8)}`;
  const holder: LockHolder = { pid: process.pid, acquiredAtMs: Date.now() };
  await fs.writeFile(pendingPath, JSON.stringify(holder), { flag: "wx" });
  try {
    await fs.link(pendingPath, lockPath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      return false;
    }
    throw error;
  } finally {
    await fs.rm(pendingPath, { force: true });
  }
}

/**
 * Moves a dead holder's lock aside under a unique name and removes it only
 * if it is still the same record. A lock published by another process in
 * the meantime is put back.
 */
async function reclaimStaleLock(
  lockPath: string,
  stale: LockHolder,
  series: SeriesKey,
  logger: Logger,
): Promise<void> {
  const claimPath = `${lockPath}.stale-${process.pid}-${randomUUID().slice(0, 8)}`;
  try {
    await fs.rename(lockPath, claimPath);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return;
    }
    throw error;
  }

  const claimed = await readHolder(claimPath);
  if (
    claimed.state === "held" &&
    claimed.holder.pid === stale.pid &&
    claimed.holder.acquiredAtMs === stale.acquiredAtMs
  ) {
    logger.warn({ lockPath, holder: stale }, "reclaiming stale writer lock");
    await fs.rm(claimPath, { force: true });
    return;
  }

  try {
    await fs.link(claimPath, lockPath);
  } catch (error) {
    if (!hasErrorCode(error, "EEXIST")) {
      throw error;
    }
  } finally {
    await fs.rm(claimPath, { force: true });
  }
  throw new ConcurrentIngestionError(
    series.symbol,
    series.timeframe,
    "lock was taken over while reclaiming",
  );
}

async function readHolder(lockPath: string): Promise<HolderRead> {
  let data: string;
  try {
    data = await fs.readFile(lockPath, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return { state: "missing" };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { state: "unreadable" };
    }
    throw error;
  }
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "pid" in parsed &&
    typeof parsed.pid === "number" &&
    "acquiredAtMs" in parsed &&
    typeof parsed.acquiredAtMs === "number"
  ) {
    return { state: "held", holder: { pid: parsed.pid, acquiredAtMs: parsed.acquiredAtMs } };
  }
  return { state: "unreadable" };
}

function isProcessAlive(pid: number): boolean {
  // This process holds no registry entry for the series, so its own pid
  // in the file is left over from an abandoned lease.
  if (pid === process.pid) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return hasErrorCode(error, "EPERM");
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
