import fg from "fast-glob";
import type { FileKind } from "../naming/filename.js";
import { filterByKind, sortChronological, type FileSetOptions } from "./fileSet.js";
import { silentLogger } from "../logging/logger.js";

/**
 * List instrument files beneath `root`, as root-relative posix paths in
 * chronological order. Files that are not instrument file names are skipped.
 */
export async function findInstrumentFiles(
  root: string,
  opts: FileSetOptions & { kind?: FileKind } = {}
): Promise<string[]> {
  const log = (opts.log ?? silentLogger()).child({ component: "discovery" });
  const found = await fg(["**/*"], { cwd: root, onlyFiles: true, dot: false });
  const candidates = opts.kind ? filterByKind(found, opts.kind, { ...opts, log }) : found;
  const sorted = sortChronological(candidates, { ...opts, log });
  log.debug("found instrument files", { root, scanned: found.length, kept: sorted.length });
  return sorted;
}
