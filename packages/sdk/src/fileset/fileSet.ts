import { NamingError } from "../errors.js";
import type { FileKind, NamingOptions } from "../naming/filename.js";
import { compareSortKeys, identify, tryIdentify, type FileIdentity } from "../naming/identity.js";
import { silentLogger, type Logger } from "../logging/logger.js";

export type FileSetOptions = NamingOptions & {
  log?: Logger;
};

// Identify every path, skipping (and logging) names that are not instrument files.
// Anything other than a NamingError still propagates.
export function identifyAll(paths: readonly string[], opts: FileSetOptions = {}): FileIdentity[] {
  const log = opts.log ?? silentLogger();
  const out: FileIdentity[] = [];
  for (const p of paths) {
    try {
      out.push(identify(p, opts));
    } catch (e) {
      if (!(e instanceof NamingError)) throw e;
      log.debug("skipping file", { path: p, code: e.code });
    }
  }
  return out;
}

export function sortIdentities(ids: readonly FileIdentity[]): FileIdentity[] {
  // Array.prototype.sort is stable, so equal keys keep input order.
  return [...ids].sort((a, b) => compareSortKeys(a.sortKey, b.sortKey));
}

export function sortChronological(paths: readonly string[], opts: FileSetOptions = {}): string[] {
  return sortIdentities(identifyAll(paths, opts)).map((id) => id.path);
}

export function filterByKind(paths: readonly string[], kind: FileKind, opts: FileSetOptions = {}): string[] {
  return identifyAll(paths, opts)
    .filter((id) => id.parsed.kind === kind)
    .map((id) => id.path);
}

/** Keep the `primary` paths whose canonical id also appears among `filterSet`, in chronological order. */
export function intersectByIdentity(
  primary: readonly string[],
  filterSet: readonly string[],
  opts: FileSetOptions = {}
): string[] {
  const wanted = new Set(identifyAll(filterSet, opts).map((id) => id.canonicalId));
  const kept = identifyAll(primary, opts).filter((id) => wanted.has(id.canonicalId));
  return sortIdentities(kept).map((id) => id.path);
}

// Canonical id for a path, or the path unchanged when it is not an instrument file name.
export function canonicalizePath(path: string, opts: NamingOptions = {}): string {
  return tryIdentify(path, opts)?.canonicalId ?? path;
}

export function findDuplicateIds(paths: readonly string[], opts: FileSetOptions = {}): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const id of identifyAll(paths, opts)) {
    counts.set(id.canonicalId, (counts.get(id.canonicalId) ?? 0) + 1);
  }
  return [...counts.entries()].filter(([, n]) => n > 1);
}
