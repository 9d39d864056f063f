import type { NamingOptions } from "../naming/filename.js";
import { compareSortKeys, tryIdentify, type FileIdentity } from "../naming/identity.js";

export type FileListEntry = {
  file: string;
  // RFC 3339 timestamp recorded alongside the file, if any.
  date?: string;
};

export type FileListIssueCode =
  | "INVALID_FILENAME"
  | "MISSING_BUCKET_DIRECTORY"
  | "DUPLICATE_FILE"
  | "OUT_OF_ORDER"
  | "FILE_DATE_MISMATCH";

export type FileListIssue = {
  code: FileListIssueCode;
  message: string;
  // Zero-based position of the entry in the checked list.
  index: number;
  value: string;
  level: "error";
};

function issue(code: FileListIssueCode, message: string, index: number, value: string): FileListIssue {
  return { code, message, index, value, level: "error" };
}

/**
 * Check a list of file entries, e.g. the file column of a metadata table.
 *
 * Entries must be instrument file names inside a bucket directory, unique,
 * chronologically ordered, and (for new-style names) agree with their date.
 * Issues come back grouped by check, in entry order within each group.
 */
export function checkFileList(entries: readonly FileListEntry[], opts: NamingOptions = {}): FileListIssue[] {
  const issues: FileListIssue[] = [];
  const good: Array<{ index: number; id: FileIdentity }> = [];

  entries.forEach((e, index) => {
    const id = tryIdentify(e.file, opts);
    if (!id) issues.push(issue("INVALID_FILENAME", "Invalid file name", index, e.file));
    else if (!id.pathBucket) issues.push(issue("MISSING_BUCKET_DIRECTORY", "File is not in a day-of-year directory", index, e.file));
    else good.push({ index, id });
  });

  const seen = new Map<string, number>();
  for (const e of entries) seen.set(e.file, (seen.get(e.file) ?? 0) + 1);
  entries.forEach((e, index) => {
    if ((seen.get(e.file) ?? 0) > 1) issues.push(issue("DUPLICATE_FILE", "Duplicate file", index, e.file));
  });

  const ordered = [...good].sort((a, b) => compareSortKeys(a.id.sortKey, b.id.sortKey));
  const firstMisplaced = good.findIndex((g, i) => ordered[i] !== g);
  const misplaced = good[firstMisplaced];
  if (misplaced) {
    issues.push(issue("OUT_OF_ORDER", "Files out of order", misplaced.index, `First out of order file ${misplaced.id.path}`));
  }

  for (const { index, id } of good) {
    const date = entries[index]?.date;
    if (id.rfc3339 !== undefined && date !== undefined && id.rfc3339 !== date) {
      issues.push(issue("FILE_DATE_MISMATCH", "File and date don't match", index, `${id.path} ${date}`));
    }
  }
  return issues;
}
