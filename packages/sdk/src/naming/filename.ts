import { NamingError } from "../errors.js";
import { formatRfc3339, offsetProblem, timestampProblem, toEpochMs, type FilenameTimestamp } from "./timestamp.js";

export type FileKind = "event" | "filtered" | "unknown";

export type NamingOptions = {
  // Extension segment that marks filtered-event files, without the dot.
  filteredSuffix?: string;
};

export const DEFAULT_FILTERED_SUFFIX = "opp";
export const EVENT_EXTENSION = "evt";
export const GZIP_EXTENSION = "gz";

// Filename examples:
//   42.evt, 42.evt.gz, 42.evt.opp.gz, 42.evt.vct.gz   (old style, no date)
//   2014-05-15T17-07-08-07-00, ...+00-00.opp.gz       (new style)
export type OldStyleFilename = {
  style: "old";
  name: string;
  baseName: string;
  // Arbitrary length; compared by value.
  number: bigint;
  suffix?: string;
  compressed: boolean;
  kind: FileKind;
};

export type NewStyleFilename = {
  style: "new";
  name: string;
  baseName: string;
  timestamp: FilenameTimestamp;
  suffix?: string;
  compressed: boolean;
  kind: FileKind;
};

export type InvalidFilename = {
  style: "invalid";
  name: string;
};

export type ParsedFilename = OldStyleFilename | NewStyleFilename | InvalidFilename;

const TIMESTAMP_LENGTH = 25;

function isDigit(c: string | undefined): boolean {
  return c !== undefined && c >= "0" && c <= "9";
}

function isAlnum(c: string): boolean {
  return isDigit(c) || (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
}

function kindFromSuffix(suffix: string | undefined, filteredSuffix: string): FileKind {
  if (suffix === undefined || suffix === EVENT_EXTENSION) return "event";
  return suffix === filteredSuffix ? "filtered" : "unknown";
}

class Scanner {
  pos = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string | undefined {
    return this.text[this.pos];
  }

  // Consumes exactly `n` digits and returns their value, or undefined without consuming.
  digits(n: number): number | undefined {
    for (let i = 0; i < n; i++) {
      if (!isDigit(this.text[this.pos + i])) return undefined;
    }
    const v = Number(this.text.slice(this.pos, this.pos + n));
    this.pos += n;
    return v;
  }

  digitRun(): string {
    const start = this.pos;
    while (isDigit(this.peek())) this.pos++;
    return this.text.slice(start, this.pos);
  }

  literal(s: string): boolean {
    if (!this.text.startsWith(s, this.pos)) return false;
    this.pos += s.length;
    return true;
  }

  oneOf(chars: string): string | undefined {
    const c = this.peek();
    if (c === undefined || !chars.includes(c)) return undefined;
    this.pos++;
    return c;
  }

  // The rest of the name as `.seg` segments; undefined if it is not made of non-empty alphanumeric segments.
  extensionSegments(): string[] | undefined {
    const rest = this.text.slice(this.pos);
    if (rest === "") return [];
    if (!rest.startsWith(".")) return undefined;
    const segs = rest.slice(1).split(".");
    for (const s of segs) {
      if (s.length === 0 || ![...s].every(isAlnum)) return undefined;
    }
    this.pos = this.text.length;
    return segs;
  }
}

function classifyOld(name: string, filteredSuffix: string): OldStyleFilename | undefined {
  const sc = new Scanner(name);
  const digits = sc.digitRun();
  if (digits.length === 0) return undefined;
  const segs = sc.extensionSegments();
  if (!segs) return undefined;

  let i = 0;
  const hasEvt = segs[i] === EVENT_EXTENSION;
  if (hasEvt) i++;
  const suffix = segs[i] !== undefined && segs[i] !== GZIP_EXTENSION ? segs[i] : undefined;
  if (suffix !== undefined) i++;
  const compressed = segs[i] === GZIP_EXTENSION;
  if (compressed) i++;
  if (i !== segs.length) return undefined;

  return {
    style: "old",
    name,
    baseName: hasEvt ? `${digits}.${EVENT_EXTENSION}` : digits,
    number: BigInt(digits),
    ...(suffix !== undefined ? { suffix } : {}),
    compressed,
    kind: kindFromSuffix(suffix, filteredSuffix)
  };
}

function classifyNew(name: string, filteredSuffix: string): NewStyleFilename | undefined {
  const sc = new Scanner(name);
  const year = sc.digits(4);
  if (year === undefined || !sc.literal("-")) return undefined;
  const month = sc.digits(2);
  if (month === undefined || !sc.literal("-")) return undefined;
  const day = sc.digits(2);
  if (day === undefined || !sc.literal("T")) return undefined;
  const hour = sc.digits(2);
  if (hour === undefined || !sc.literal("-")) return undefined;
  const minute = sc.digits(2);
  if (minute === undefined || !sc.literal("-")) return undefined;
  const second = sc.digits(2);
  if (second === undefined) return undefined;
  const sign = sc.oneOf("+-");
  if (sign === undefined) return undefined;
  const offHours = sc.digits(2);
  if (offHours === undefined || !sc.literal("-")) return undefined;
  const offMinutes = sc.digits(2);
  if (offMinutes === undefined) return undefined;

  const segs = sc.extensionSegments();
  if (!segs || segs.length > 2) return undefined;
  const compressed = segs[segs.length - 1] === GZIP_EXTENSION;
  const suffixSegs = compressed ? segs.slice(0, -1) : segs;
  if (suffixSegs.length > 1) return undefined;
  const suffix = suffixSegs[0];

  // From here on the name has the new-style shape; an impossible date is corrupt, not foreign.
  const problem =
    offsetProblem(offHours, offMinutes) ?? timestampProblem({ year, month, day, hour, minute, second, offsetMinutes: 0 });
  if (problem) {
    throw new NamingError("INVALID_TIMESTAMP", `invalid timestamp in filename ${name}: ${problem}`, { name });
  }
  const offsetMinutes = (sign === "-" ? -1 : 1) * (offHours * 60 + offMinutes);
  const fields = { year, month, day, hour, minute, second, offsetMinutes };
  const timestamp: FilenameTimestamp = { ...fields, epochMs: toEpochMs(fields) };

  return {
    style: "new",
    name,
    baseName: name.slice(0, TIMESTAMP_LENGTH),
    timestamp,
    ...(suffix !== undefined ? { suffix } : {}),
    compressed,
    kind: kindFromSuffix(suffix, filteredSuffix)
  };
}

/**
 * Classify a leaf filename as old-style, new-style or invalid.
 *
 * Never throws for foreign names. Throws `NamingError(INVALID_TIMESTAMP)` when
 * the name is shaped like a new-style name but its date, time or offset cannot
 * exist.
 */
export function classify(leafName: string, opts: NamingOptions = {}): ParsedFilename {
  const filteredSuffix = opts.filteredSuffix ?? DEFAULT_FILTERED_SUFFIX;
  return classifyOld(leafName, filteredSuffix) ?? classifyNew(leafName, filteredSuffix) ?? { style: "invalid", name: leafName };
}

export function rfc3339FromFilename(parsed: ParsedFilename): string | undefined {
  return parsed.style === "new" ? formatRfc3339(parsed.timestamp) : undefined;
}
