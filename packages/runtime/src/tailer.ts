/**
 * Tailer
 *
 * Surfaces newly appended bytes of a growing file as newline-delimited
 * records. Polls while the source is still growing, then drains once more.
 *
 * Offset rules:
 * - the offset only moves past delimiters that were consumed, so a trailing
 *   partial record is re-read on the next poll instead of being split
 * - a failed read (file missing, I/O error) emits nothing more and leaves the
 *   offset after the last delivered record
 *
 * Records before one longer than `maxRecordBytes` are delivered; the tail
 * then stalls at the start of the oversized record until the process exits
 * and beyond. Each poll reads at most `maxRecordBytes + READ_CHUNK_BYTES`
 * bytes, so a stalled tail costs one bounded read per interval.
 */

import { open, type FileHandle } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import { Logger } from "./logger.js";

const log = Logger.for("Tailer");

export const DEFAULT_POLL_INTERVAL_MS = 100;

/** Maximum size of one record (5 MiB). */
export const DEFAULT_MAX_RECORD_BYTES = 5 * 1024 * 1024;

/** Read-ahead beyond one maximal record per window. */
export const READ_CHUNK_BYTES = 64 * 1024;

const LF = 0x0a;
const CR = 0x0d;

export type RecordHandler = (record: string) => void;

export interface SplitResult {
  records: string[];
  /** Bytes of `data` covered by `records` and their delimiters. */
  consumed: number;
  /** A record starting at `consumed` is longer than `maxRecordBytes`. */
  overflow: boolean;
}

/**
 * Split `data` into records on `\n`, `\r` or `\r\n`.
 *
 * Unless `atEOF` is set, a trailing record without delimiter is left
 * unconsumed, and so is a `\r` in the last byte, since the `\n` that may
 * follow it has not been read yet.
 *
 * Splitting stops at the first record (complete or pending) longer than
 * `maxRecordBytes`; the records before it are returned.
 */
export function splitRecords(data: Buffer, atEOF: boolean, maxRecordBytes: number): SplitResult {
  const records: string[] = [];
  let start = 0;

  const overflowed = (): SplitResult => ({ records, consumed: start, overflow: true });

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte !== LF && byte !== CR) continue;
    if (byte === CR && i + 1 === data.length && !atEOF) break;

    if (i - start > maxRecordBytes) return overflowed();
    records.push(data.toString("utf8", start, i));
    if (byte === CR && data[i + 1] === LF) i++;
    start = i + 1;
  }

  if (data.length - start > maxRecordBytes) return overflowed();
  if (atEOF && start < data.length) {
    records.push(data.toString("utf8", start));
    start = data.length;
  }

  return { records, consumed: start, overflow: false };
}

export interface ReadOptions {
  /** The file will not grow any further: flush the trailing partial record. */
  final: boolean;
  maxRecordBytes: number;
}

/**
 * Hand the complete records after `offset` to `onRecord` and return the
 * offset after the last one delivered.
 */
export async function readFromPosition(
  path: string,
  offset: number,
  onRecord: RecordHandler,
  options: ReadOptions,
): Promise<number> {
  const windowBytes = options.maxRecordBytes + READ_CHUNK_BYTES;
  let position = offset;

  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (err) {
    log.debug({ path, offset, err }, "tail open failed; retrying from same offset");
    return offset;
  }

  try {
    const { size } = await handle.stat();
    while (position < size) {
      const data = await readChunk(handle, position, Math.min(windowBytes, size - position));
      if (data.length === 0) break;
      const atEnd = position + data.length >= size;

      const split = splitRecords(data, options.final && atEnd, options.maxRecordBytes);
      deliver(path, split.records, onRecord);
      position += split.consumed;

      if (split.overflow) {
        log.debug({ path, position, maxRecordBytes: options.maxRecordBytes }, "record too long; tail stalled");
        break;
      }
      if (atEnd || split.consumed === 0) break;
    }
  } catch (err) {
    log.debug({ path, position, err }, "tail read failed; retrying from last record");
  } finally {
    await handle.close();
  }
  return position;
}

function deliver(path: string, records: string[], onRecord: RecordHandler): void {
  for (const record of records) {
    try {
      onRecord(record);
    } catch (err) {
      log.warn({ path, err }, "record handler threw");
    }
  }
}

async function readChunk(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

export interface TailOptions {
  /** Polled before each read; once false the tailer drains and returns. */
  isGrowing: () => boolean;
  intervalMs?: number;
  maxRecordBytes?: number;
}

/**
 * Tail `path` from the start until `isGrowing()` turns false, then perform the
 * final drain. Resolves with the offset after the last consumed byte.
 */
export async function tailFile(
  path: string,
  onRecord: RecordHandler,
  options: TailOptions,
): Promise<number> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxRecordBytes = options.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES;
  let offset = 0;

  while (options.isGrowing()) {
    await delay(intervalMs);
    if (!options.isGrowing()) break;
    offset = await readFromPosition(path, offset, onRecord, { final: false, maxRecordBytes });
  }

  return readFromPosition(path, offset, onRecord, { final: true, maxRecordBytes });
}

/**
 * Bytes from `offset` to the current end of file.
 */
export async function readFileRange(path: string, offset: number): Promise<Buffer> {
  const handle = await open(path, "r");
  try {
    const { size } = await handle.stat();
    if (size <= offset) return Buffer.alloc(0);
    return await readChunk(handle, offset, size - offset);
  } finally {
    await handle.close();
  }
}
