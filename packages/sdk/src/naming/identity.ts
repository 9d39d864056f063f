import { NamingError } from "../errors.js";
import { classify, type NamingOptions, type ParsedFilename } from "./filename.js";
import { formatRfc3339, utcYearAndDayOfYear, type FilenameTimestamp } from "./timestamp.js";

export type SortKey = {
  year: number;
  dayOfYear: number;
  // Integer for old-style names (they are not zero-padded), the timestamp base name for new-style ones.
  tiebreak: bigint | string;
};

export type FileIdentity = {
  path: string;
  filename: string;
  parsed: Exclude<ParsedFilename, { style: "invalid" }>;
  // "<bucket>/<baseName>", or just the base name for old-style files outside a bucket directory.
  canonicalId: string;
  canonicalBucket?: string;
  // Bucket directory the path itself sits in, which may disagree with canonicalBucket.
  pathBucket?: string;
  pathId: string;
  sortKey: SortKey;
  timestamp?: FilenameTimestamp;
  rfc3339?: string;
};

export function splitPath(p: string): string[] {
  // Accept Windows separators as well; identity never depends on the separator style.
  return p.split(/[/\\]/).filter((s, i, all) => s.length > 0 || i === all.length - 1);
}

export function isBucketName(s: string): boolean {
  const us = s.indexOf("_");
  if (us < 1 || us > 4 || us === s.length - 1 || s.length - us - 1 > 3) return false;
  for (let i = 0; i < s.length; i++) {
    if (i === us) continue;
    const c = s[i];
    if (c === undefined || c < "0" || c > "9") return false;
  }
  return true;
}

export function bucketFromTimestamp(t: FilenameTimestamp): string {
  const { year, dayOfYear } = utcYearAndDayOfYear(t.epochMs);
  return `${year}_${String(dayOfYear).padStart(3, "0")}`;
}

export function parseBucket(bucket: string): { year: number; dayOfYear: number } {
  const [y, d] = bucket.split("_");
  return { year: Number(y), dayOfYear: Number(d) };
}

function joinId(bucket: string | undefined, baseName: string): string {
  return bucket ? `${bucket}/${baseName}` : baseName;
}

/**
 * Resolve the cross-generation identity of an instrument file from its path.
 *
 * Pure: only the leaf name and its immediate parent directory are consulted.
 */
export function identify(path: string, opts: NamingOptions = {}): FileIdentity {
  const parts = splitPath(path);
  const filename = parts[parts.length - 1] ?? "";
  const parent = parts.length > 1 ? parts[parts.length - 2] : undefined;
  const pathBucket = parent !== undefined && isBucketName(parent) ? parent : undefined;

  const parsed = classify(filename, opts);
  switch (parsed.style) {
    case "invalid":
      throw new NamingError("UNRECOGNIZED_FILENAME", `not an instrument file name: ${filename}`, { path });
    case "old": {
      // No date in the name, so the path's own bucket is the only bucket there is.
      const id = joinId(pathBucket, parsed.baseName);
      const loc = pathBucket ? parseBucket(pathBucket) : { year: 0, dayOfYear: 0 };
      return {
        path,
        filename,
        parsed,
        canonicalId: id,
        ...(pathBucket ? { canonicalBucket: pathBucket, pathBucket } : {}),
        pathId: id,
        sortKey: { ...loc, tiebreak: parsed.number }
      };
    }
    case "new": {
      const canonicalBucket = bucketFromTimestamp(parsed.timestamp);
      return {
        path,
        filename,
        parsed,
        canonicalId: joinId(canonicalBucket, parsed.baseName),
        canonicalBucket,
        ...(pathBucket ? { pathBucket } : {}),
        pathId: joinId(pathBucket, parsed.baseName),
        sortKey: { ...parseBucket(canonicalBucket), tiebreak: parsed.baseName },
        timestamp: parsed.timestamp,
        rfc3339: formatRfc3339(parsed.timestamp)
      };
    }
    default: {
      const unreachable: never = parsed;
      throw new Error(`unhandled filename style: ${JSON.stringify(unreachable)}`);
    }
  }
}

export function tryIdentify(path: string, opts: NamingOptions = {}): FileIdentity | undefined {
  try {
    return identify(path, opts);
  } catch (e) {
    if (e instanceof NamingError) return undefined;
    throw e;
  }
}

function compareTiebreak(a: bigint | string, b: bigint | string): number {
  if (typeof a === "bigint" && typeof b === "bigint") return a === b ? 0 : a < b ? -1 : 1;
  // Old-style numbers sort ahead of new-style timestamps sharing a day.
  if (typeof a === "bigint") return -1;
  if (typeof b === "bigint") return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.dayOfYear !== b.dayOfYear) return a.dayOfYear - b.dayOfYear;
  return compareTiebreak(a.tiebreak, b.tiebreak);
}
