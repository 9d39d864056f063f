import { BufferByteSource, type ByteSource } from "./byteSource.js";
import { EventMatrix } from "./eventMatrix.js";
import { FormatError, errorMessage } from "../errors.js";

// Layout, little-endian throughout:
//   offset 0 : uint32 rowCount
//   offset 4 : rowCount rows of (columns + 2) uint16, row-major
// The 2 leading uint16 of each row are framing written by the acquisition
// software and never carry measurements.
export const HEADER_BYTES = 4;
export const FRAMING_COLUMNS = 2;
const DRAIN_CHUNK = 8192;

export function expectedPayloadBytes(rowCount: number, measurementColumns: number): number {
  return rowCount * (measurementColumns + FRAMING_COLUMNS) * 2;
}

function readUpTo(source: ByteSource, size: number): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (total < size) {
    const chunk = source.read(Math.min(size - total, 1 << 20));
    if (chunk.length === 0) break;
    chunks.push(chunk);
    total += chunk.length;
  }
  if (chunks.length === 1 && chunks[0]) return chunks[0];
  const out = new Uint8Array(total);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.length;
  }
  return out;
}

function readHeader(source: ByteSource): number {
  let header: Uint8Array;
  try {
    header = readUpTo(source, HEADER_BYTES);
  } catch (e) {
    throw new FormatError("TRUNCATED_HEADER", `event file header could not be read: ${errorMessage(e)}`);
  }
  if (header.length === 0) throw new FormatError("EMPTY_FILE", "event file is empty");
  if (header.length !== HEADER_BYTES) {
    throw new FormatError("TRUNCATED_HEADER", `event file has a ${header.length}-byte row count header`, {
      found: header.length
    });
  }
  return new DataView(header.buffer, header.byteOffset, HEADER_BYTES).getUint32(0, true);
}

/**
 * Decode one event file into a matrix of `measurementColumns` doubles per particle.
 *
 * The header's row count alone sizes the read; any byte beyond the declared
 * payload, or any byte missing from it, fails the whole decode.
 */
export function decodeEvents(source: ByteSource, columns: number | readonly string[]): EventMatrix {
  const columnNames = typeof columns === "number" ? undefined : columns;
  const measurementColumns = typeof columns === "number" ? columns : columns.length;
  if (!Number.isInteger(measurementColumns) || measurementColumns < 1) {
    throw new RangeError(`measurement column count must be a positive integer: ${measurementColumns}`);
  }

  const rowCount = readHeader(source);
  if (rowCount === 0) throw new FormatError("NO_DATA", "event file has no particle data", { rowCount });

  const expected = expectedPayloadBytes(rowCount, measurementColumns);
  let payload: Uint8Array;
  let extra = 0;
  try {
    payload = readUpTo(source, expected);
    for (;;) {
      const n = source.read(DRAIN_CHUNK).length;
      if (n === 0) break;
      extra += n;
    }
  } catch (e) {
    throw new FormatError("TRUNCATED_PAYLOAD", `event file payload could not be read: ${errorMessage(e)}`, {
      rowCount,
      expected
    });
  }

  const found = payload.length + extra;
  if (found !== expected) {
    throw new FormatError(
      "BYTE_COUNT_MISMATCH",
      `event file has incorrect number of data bytes: expected ${expected}, found ${found}`,
      { rowCount, expected, found }
    );
  }

  const stride = measurementColumns + FRAMING_COLUMNS;
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  const data = new Float64Array(rowCount * measurementColumns);
  for (let r = 0; r < rowCount; r++) {
    const rowOffset = r * stride * 2;
    for (let c = 0; c < measurementColumns; c++) {
      data[r * measurementColumns + c] = view.getUint16(rowOffset + (c + FRAMING_COLUMNS) * 2, true);
    }
  }
  return new EventMatrix({ rows: rowCount, columns: measurementColumns, data, columnNames });
}

export function decodeEventBytes(bytes: Uint8Array, columns: number | readonly string[]): EventMatrix {
  return decodeEvents(new BufferByteSource(bytes), columns);
}
