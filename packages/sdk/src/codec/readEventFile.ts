import fs from "node:fs/promises";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import { BufferByteSource, type ByteSource } from "./byteSource.js";
import { decodeEvents } from "./decode.js";
import type { EventMatrix } from "./eventMatrix.js";
import { FormatError, NamingError, errorMessage } from "../errors.js";
import { identify, type FileIdentity } from "../naming/identity.js";
import { defaultDataDictionary, namingOptionsFrom, type DataDictionary } from "../config/dataDictionary.js";
import { silentLogger, type Logger } from "../logging/logger.js";

const gunzipAsync = promisify(gunzip);

export type ReadEventFileOptions = {
  dictionary?: DataDictionary;
  // File contents as stored (gzipped when the name ends in .gz); skips reading `path`.
  bytes?: Uint8Array;
  // Already-open, already-decompressed source; takes precedence over `bytes`.
  source?: ByteSource;
  log?: Logger;
};

export type EventFile = {
  identity: FileIdentity;
  events: EventMatrix;
};

async function loadBytes(path: string, compressed: boolean, bytes: Uint8Array | undefined): Promise<Uint8Array> {
  let raw: Uint8Array;
  try {
    raw = bytes ?? (await fs.readFile(path));
  } catch (e) {
    throw new FormatError("UNREADABLE", `could not read ${path}: ${errorMessage(e)}`, { path });
  }
  if (!compressed) return raw;
  try {
    return await gunzipAsync(raw);
  } catch (e) {
    throw new FormatError("UNREADABLE", `could not decompress ${path}: ${errorMessage(e)}`, { path });
  }
}

/**
 * Identify `path` and decode its particle events.
 *
 * Only event files carry the row layout; filtered files are rejected with
 * `NamingError(UNSUPPORTED_KIND)`.
 */
export async function readEventFile(path: string, opts: ReadEventFileOptions = {}): Promise<EventFile> {
  const dictionary = opts.dictionary ?? defaultDataDictionary();
  const log = (opts.log ?? silentLogger()).child({ component: "codec" });
  const identity = identify(path, namingOptionsFrom(dictionary));
  if (identity.parsed.kind !== "event") {
    throw new NamingError("UNSUPPORTED_KIND", `not an event file: ${identity.filename}`, {
      path,
      kind: identity.parsed.kind
    });
  }

  const source = opts.source ?? new BufferByteSource(await loadBytes(path, identity.parsed.compressed, opts.bytes));
  try {
    const events = decodeEvents(source, dictionary.measurementColumns);
    log.debug("decoded event file", { path, fileId: identity.canonicalId, rows: events.rows });
    return { identity, events };
  } catch (e) {
    if (e instanceof FormatError) {
      log.warn("event file failed to decode", { path, code: e.code, ...e.details });
      throw new FormatError(e.code, `${path}: ${e.message}`, { ...e.details, path });
    }
    throw e;
  }
}
