import { PARTITION_FORMAT_VERSION, type RawCandle } from "./types.ts";

const MAGIC = 0x434c484f; // "OHLC"
const HEADER_BYTES = 32;
const VALUE_BYTES = 8;
const COLUMNS = ["openTime", "open", "high", "low", "close", "volume"] as const;

export interface PartitionHeader {
  version: number;
  rowCount: number;
  stepMs: number;
  firstOpenTime: number;
  lastOpenTime: number;
}

export interface DecodedPartition {
  header: PartitionHeader;
  rows: RawCandle[];
}

export function getPartitionByteLength(rowCount: number): number {
  return HEADER_BYTES + rowCount * COLUMNS.length * VALUE_BYTES;
}

/**
 * Packs rows into the column-oriented partition layout: a fixed header
 * followed by one little-endian block per column, `openTime` as int64 and
 * prices and volume as float64.
 */
export function encodePartition(stepMs: number, rows: readonly RawCandle[]): Uint8Array {
  if (rows.length === 0) {
    throw new Error("Cannot encode empty partition");
  }
  if (!Number.isInteger(stepMs) || stepMs <= 0) {
    throw new Error("stepMs must be a positive integer");
  }

  const bytes = new Uint8Array(getPartitionByteLength(rows.length));
  const view = new DataView(bytes.buffer);

  // Header
  view.setUint32(0, MAGIC, true);
  view.setUint16(4, PARTITION_FORMAT_VERSION, true);
  view.setUint16(6, COLUMNS.length, true);
  view.setUint32(8, rows.length, true);
  view.setUint32(12, stepMs, true);
  view.setBigInt64(16, BigInt(rows[0].openTime), true);
  view.setBigInt64(24, BigInt(rows[rows.length - 1].openTime), true);

  COLUMNS.forEach((column, columnIndex) => {
    const base = HEADER_BYTES + columnIndex * rows.length * VALUE_BYTES;
    rows.forEach((row, index) => {
      const offset = base + index * VALUE_BYTES;
      if (column === "openTime") {
        view.setBigInt64(offset, BigInt(row.openTime), true);
      } else {
        view.setFloat64(offset, row[column], true);
      }
    });
  });

  return bytes;
}

export function readPartitionHeader(bytes: Uint8Array): PartitionHeader {
  if (bytes.byteLength < HEADER_BYTES) {
    throw new Error("Buffer too small to contain partition header");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.getUint32(0, true) !== MAGIC) {
    throw new Error("Missing partition magic");
  }

  const version = view.getUint16(4, true);
  if (version !== PARTITION_FORMAT_VERSION) {
    throw new Error(`Unsupported partition version ${version}`);
  }

  const columnCount = view.getUint16(6, true);
  if (columnCount !== COLUMNS.length) {
    throw new Error(`Expected ${COLUMNS.length} columns, found ${columnCount}`);
  }

  return {
    version,
    rowCount: view.getUint32(8, true),
    stepMs: view.getUint32(12, true),
    firstOpenTime: Number(view.getBigInt64(16, true)),
    lastOpenTime: Number(view.getBigInt64(24, true)),
  };
}

/**
 * Decodes a partition and checks that its open times are strictly
 * increasing by exactly one step and agree with the header.
 */
export function decodePartition(bytes: Uint8Array): DecodedPartition {
  const header = readPartitionHeader(bytes);

  const expectedLength = getPartitionByteLength(header.rowCount);
  if (bytes.byteLength !== expectedLength) {
    throw new Error(
      `Unexpected buffer length. Expected ${expectedLength}, received ${bytes.byteLength}`,
    );
  }
  if (header.rowCount === 0) {
    throw new Error("Partition holds no rows");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const { rowCount } = header;
  const column = (columnIndex: number, index: number) =>
    HEADER_BYTES + (columnIndex * rowCount + index) * VALUE_BYTES;

  const rows: RawCandle[] = [];
  for (let i = 0; i < rowCount; i += 1) {
    const openTime = Number(view.getBigInt64(column(0, i), true));
    const expected = header.firstOpenTime + i * header.stepMs;
    if (openTime !== expected) {
      throw new Error(`Row ${i} open time ${openTime} breaks the step sequence (expected ${expected})`);
    }
    rows.push({
      openTime,
      open: view.getFloat64(column(1, i), true),
      high: view.getFloat64(column(2, i), true),
      low: view.getFloat64(column(3, i), true),
      close: view.getFloat64(column(4, i), true),
      volume: view.getFloat64(column(5, i), true),
    });
  }

  if (rows[rows.length - 1].openTime !== header.lastOpenTime) {
    throw new Error("Last row does not match header lastOpenTime");
  }

  return { header, rows };
}
